// Config loader: reads ~/.config/homebrew-probe/config.yaml (or an explicit path) and
// deep-merges it over DEFAULT_CONFIG. Arrays replace the default list wholesale.
// The merged result is validated, so unknown keys and malformed values are rejected.
import { readFileSync, existsSync } from "node:fs";
import { join, isAbsolute } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ProbeConfig } from "../types/config.js";
import { ProbeError, ProbeErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "homebrew-probe", "config.yaml");

/** Keg-only formulae are not linked into the prefix, so each opt/ dir must be searched. */
export const DEFAULT_KEG_ONLY_PACKAGES: readonly string[] = [
  "icu4c",
  "icu4c@76",
  "icu4c@77",
  "icu4c@78",
  "med-file@4.1.1",
  "qt@5",
  "python@3.11",
  "python@3.12",
  "python@3.13",
];

/** Newest first: the first version with the add-on installed wins. */
export const DEFAULT_PYTHON_VERSIONS: readonly string[] = ["3.13", "3.12", "3.11", "3.10"];

export const DEFAULT_CONFIG: ProbeConfig = {
  keg_only_packages: [...DEFAULT_KEG_ONLY_PACKAGES],
  python_versions: [...DEFAULT_PYTHON_VERSIONS],
  python_addon: "pivy",
  fallback_prefix: { arm64: "/opt/homebrew", default: "/usr/local" },
  preload: { libaec: true },
  command_timeout_ms: 0,
  cache_file: "homebrew-probe-cache.json",
};

const absolutePath = z.string().refine(isAbsolute, { message: "expected an absolute path" });

const configSchema = z
  .object({
    keg_only_packages: z.array(z.string().min(1)),
    python_versions: z.array(z.string().regex(/^\d+\.\d+$/, "expected <major>.<minor>")),
    python_addon: z.string().min(1),
    fallback_prefix: z.object({ arm64: absolutePath, default: absolutePath }).strict(),
    preload: z.object({ libaec: z.boolean() }).strict(),
    command_timeout_ms: z.number().int().min(0),
    cache_file: z.string().min(1),
  })
  .strict();

export interface ConfigResult {
  config: ProbeConfig;
  configPath: string;
  fromFile: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

/** Validate a raw config object merged over the defaults. */
export function resolveConfig(raw: unknown, configPath: string): ProbeConfig {
  if (raw !== null && raw !== undefined && !isRecord(raw)) {
    throw new ProbeError(ProbeErrorCode.INVALID_CONFIG, `Config must be a mapping: ${configPath}`);
  }
  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };
  const merged = deepMerge(defaults, isRecord(raw) ? raw : {});
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ProbeError(ProbeErrorCode.INVALID_CONFIG, `Invalid config ${configPath}: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

/**
 * Load configuration. A missing file at the default location means defaults;
 * a missing explicit path is an error.
 */
export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (explicitPath !== undefined) {
      throw new ProbeError(ProbeErrorCode.CONFIG_NOT_FOUND, `Config file not found: ${configPath}`);
    }
    logger.debug({ configPath }, "No config file, using defaults");
    return { config: resolveConfig(undefined, configPath), configPath, fromFile: false };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ProbeError(ProbeErrorCode.INVALID_CONFIG, `Could not parse config ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const config = resolveConfig(raw, configPath);
  logger.debug({ configPath }, "Configuration loaded");
  return { config, configPath, fromFile: true };
}
