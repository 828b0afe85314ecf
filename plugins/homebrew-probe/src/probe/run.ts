import type { Host } from "../host/host.js";
import type { ProbeConfig } from "../types/config.js";
import type { ProbeResult } from "../types/probe.js";
import type { ProbeInputs } from "../inputs.js";
import type { ProbeCache } from "../cache/cache-store.js";
import { initialState, inputsFromEnv, resolveBuildGui } from "../inputs.js";
import { cacheFromState, cachePath, clearCache, readCache, writeCache } from "../cache/cache-store.js";
import { probeHomebrew } from "./prober.js";
import { logger } from "../logger.js";

export interface RunProbeOptions {
  host: Host;
  config: ProbeConfig;
  buildDir: string;
  env: NodeJS.ProcessEnv;
  flags: ProbeInputs;
  /** Forget cached values and probe again. */
  fresh: boolean;
}

export interface RunProbeResult extends ProbeResult {
  readonly buildGui: boolean;
  readonly cacheFile: string;
}

/** An unreadable or damaged cache is dropped; the next write replaces it. */
async function readCacheOrEmpty(cacheFile: string): Promise<ProbeCache> {
  try {
    return await readCache(cacheFile);
  } catch (err) {
    logger.warn({ cacheFile, error: err instanceof Error ? err.message : String(err) }, "Ignoring unreadable probe cache");
    return {};
  }
}

/**
 * Full probe cycle: cached and pinned values in, probe, resolved values back to the cache.
 * A second run over the same build directory reuses the cached prefix instead of calling brew.
 */
export async function runProbe(options: RunProbeOptions): Promise<RunProbeResult> {
  const { host, config, buildDir, env, flags } = options;
  const cacheFile = cachePath(buildDir, config.cache_file);

  if (options.fresh) {
    await clearCache(cacheFile);
    logger.debug({ cacheFile }, "Cache cleared");
  }

  const envInputs = inputsFromEnv(env);
  const buildGui = resolveBuildGui(envInputs, flags);
  const state = initialState(await readCacheOrEmpty(cacheFile), envInputs, flags);
  const result = await probeHomebrew(host, state, { buildGui }, config);

  const cache = cacheFromState(result.state);
  if (result.probed && Object.keys(cache).length > 0) {
    try {
      await writeCache(cacheFile, cache);
    } catch (err) {
      logger.warn({ cacheFile, error: err instanceof Error ? err.message : String(err) }, "Could not write probe cache");
    }
  }

  return { ...result, buildGui, cacheFile };
}
