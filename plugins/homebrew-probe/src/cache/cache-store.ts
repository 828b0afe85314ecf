import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { ProbeState } from "../types/probe.js";
import { ProbeError, ProbeErrorCode } from "../shared/errors.js";

/** Cache entries use the CMake variable names they stand for. */
const cacheSchema = z.object({
  HOMEBREW_PREFIX: z.string().optional(),
  Python3_EXECUTABLE: z.string().optional(),
  CMAKE_OSX_DEPLOYMENT_TARGET: z.string().optional(),
});

export type ProbeCache = z.infer<typeof cacheSchema>;

export function cachePath(buildDir: string, cacheFile: string): string {
  return path.resolve(buildDir, cacheFile);
}

export async function readCache(filePath: string): Promise<ProbeCache> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProbeError(ProbeErrorCode.INVALID_CACHE, `Cache file is not valid JSON: ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = cacheSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProbeError(ProbeErrorCode.INVALID_CACHE, `Unexpected cache contents: ${filePath}`, {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

/** Cache the resolved values. The prefix is only stored once Homebrew was found. */
export function cacheFromState(state: ProbeState): ProbeCache {
  const cache: ProbeCache = {};
  if (state.prefix) cache.HOMEBREW_PREFIX = state.prefix;
  if (state.pythonExecutable) cache.Python3_EXECUTABLE = state.pythonExecutable;
  if (state.deploymentTarget) cache.CMAKE_OSX_DEPLOYMENT_TARGET = state.deploymentTarget;
  return cache;
}

export async function writeCache(filePath: string, cache: ProbeCache): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(cache, null, 2) + "\n", "utf-8");
}

export async function clearCache(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}
