import type { ProbeCache } from "./cache/cache-store.js";
import type { ProbeState } from "./types/probe.js";
import { parseSearchPath } from "./probe/search-path.js";

/**
 * Values pinned by the caller. An absent key means "not supplied"; an empty prefix
 * string is still a supplied value and stops the prober from asking brew.
 */
export interface ProbeInputs {
  prefix?: string;
  pythonExecutable?: string;
  deploymentTarget?: string;
  prefixPath?: string;
  buildGui?: boolean;
}

const TRUE_VALUES = new Set(["1", "on", "yes", "true", "y"]);
const FALSE_VALUES = new Set(["0", "off", "no", "false", "n", ""]);

/** CMake-style boolean. Unrecognised values count as unset. */
export function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}

export function inputsFromEnv(env: NodeJS.ProcessEnv): ProbeInputs {
  return {
    prefix: env.HOMEBREW_PREFIX,
    pythonExecutable: env.Python3_EXECUTABLE || undefined,
    deploymentTarget: env.MACOSX_DEPLOYMENT_TARGET || undefined,
    prefixPath: env.CMAKE_PREFIX_PATH,
    buildGui: parseFlag(env.BUILD_GUI),
  };
}

/** Later sources win: cache, then environment, then command-line flags. */
export function initialState(cache: ProbeCache, env: ProbeInputs, flags: ProbeInputs): ProbeState {
  return {
    prefix: flags.prefix ?? env.prefix ?? cache.HOMEBREW_PREFIX,
    searchPaths: parseSearchPath(flags.prefixPath ?? env.prefixPath),
    pythonExecutable: flags.pythonExecutable ?? env.pythonExecutable ?? cache.Python3_EXECUTABLE,
    deploymentTarget: flags.deploymentTarget ?? env.deploymentTarget ?? cache.CMAKE_OSX_DEPLOYMENT_TARGET,
    preloads: [],
  };
}

export function resolveBuildGui(env: ProbeInputs, flags: ProbeInputs): boolean {
  return flags.buildGui ?? env.buildGui ?? true;
}
