import { join } from "node:path";
import type { Host } from "../host/host.js";
import type { ProbeConfig } from "../types/config.js";
import type { ProbeDiagnostic } from "../types/probe.js";
import { firstOf } from "./strategies.js";
import type { Strategy } from "./strategies.js";
import { logger } from "../logger.js";

export interface PrefixResolution {
  /** Empty when Homebrew could not be located. */
  readonly prefix: string;
  readonly source: "brew" | "fallback" | "none";
  readonly diagnostics: readonly ProbeDiagnostic[];
}

/** Default install root for the CPU architecture: Apple Silicon vs. Intel. */
export function fallbackPrefix(arch: string, config: ProbeConfig): string {
  return arch === "arm64" ? config.fallback_prefix.arm64 : config.fallback_prefix.default;
}

/** Ask Homebrew for its own root. Output is trusted verbatim once trimmed. */
export function brewPrefixStrategy(host: Host, diagnostics: ProbeDiagnostic[]): Strategy<PrefixResolution> {
  return async () => {
    const result = await host.run(["brew", "--prefix"]);
    if (result.exitCode !== 0) {
      diagnostics.push({ kind: "probe-unavailable", step: "prefix", detail: `brew --prefix exited with ${result.exitCode}` });
      return null;
    }
    return { prefix: result.stdout.trim(), source: "brew", diagnostics };
  };
}

/** Accept the architecture default only when the brew executable is actually there. */
export function fallbackPrefixStrategy(host: Host, config: ProbeConfig, diagnostics: ProbeDiagnostic[]): Strategy<PrefixResolution> {
  return async () => {
    const candidate = fallbackPrefix(host.arch, config);
    const brew = join(candidate, "bin", "brew");
    if (!(await host.exists(brew))) {
      diagnostics.push({ kind: "not-found", step: "prefix", detail: `${brew} does not exist` });
      return null;
    }
    return { prefix: candidate, source: "fallback", diagnostics };
  };
}

export async function resolvePrefix(host: Host, config: ProbeConfig): Promise<PrefixResolution> {
  const diagnostics: ProbeDiagnostic[] = [];
  const resolved = await firstOf([
    brewPrefixStrategy(host, diagnostics),
    fallbackPrefixStrategy(host, config, diagnostics),
  ]);

  if (resolved) {
    logger.info({ source: resolved.source }, `Homebrew detected at: ${resolved.prefix}`);
    return resolved;
  }
  logger.info("Homebrew not found");
  return { prefix: "", source: "none", diagnostics };
}
