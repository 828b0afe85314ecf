import type { Host } from "../host/host.js";
import type { ProbeConfig } from "../types/config.js";
import type { ProbeDiagnostic, ProbeOptions, ProbeResult, ProbeState } from "../types/probe.js";
import { resolvePrefix } from "./prefix.js";
import { appendUnique } from "./search-path.js";
import { discoverKegOnlyPackages } from "./keg-only.js";
import { selectPythonWithAddon } from "./python.js";
import { LIBAEC_PACKAGE, libaecConfigDir, tryConfigPreload } from "./preload.js";
import { inferDeploymentTarget } from "./deployment-target.js";
import { attemptBestEffort } from "./strategies.js";
import { logger } from "../logger.js";

/**
 * Resolve the Homebrew-related build configuration for a macOS host.
 *
 * The incoming state is never modified; a new state is returned. Values already
 * present in it (a cached or pinned prefix, interpreter or deployment target) are
 * kept as they are. On any platform other than macOS the state is returned untouched.
 * Probe failures never throw: they are reported as diagnostics.
 */
export async function probeHomebrew(
  host: Host,
  state: ProbeState,
  options: ProbeOptions,
  config: ProbeConfig,
): Promise<ProbeResult> {
  if (host.platform !== "darwin") {
    logger.debug({ platform: host.platform }, "Not macOS, skipping Homebrew probe");
    return { state, diagnostics: [], kegOnlyAdded: [], probed: false };
  }

  const diagnostics: ProbeDiagnostic[] = [];

  // 1. Prefix
  let prefix = state.prefix;
  if (prefix === undefined) {
    const resolution = await resolvePrefix(host, config);
    diagnostics.push(...resolution.diagnostics);
    prefix = resolution.prefix;
  } else {
    logger.debug({ prefix }, "Using preset Homebrew prefix");
  }

  if (!prefix) {
    return { state: { ...state, prefix }, diagnostics, kegOnlyAdded: [], probed: true };
  }

  // 2. Prefix itself on the search path
  let searchPaths = appendUnique(state.searchPaths, prefix);

  // 3. Keg-only packages
  const kegs = await discoverKegOnlyPackages(host, prefix, config.keg_only_packages, searchPaths);
  searchPaths = kegs.searchPaths;

  // 4. Interpreter with the GUI add-on
  let pythonExecutable = state.pythonExecutable;
  if (options.buildGui && !pythonExecutable) {
    const selection = await selectPythonWithAddon(host, prefix, config.python_versions, config.python_addon);
    diagnostics.push(...selection.diagnostics);
    if (selection.executable !== null) pythonExecutable = selection.executable;
  }

  // 5. libaec preload; a failed attempt changes nothing and is deliberately ignored.
  let preloads = state.preloads;
  const configDir = libaecConfigDir(prefix);
  if (config.preload.libaec && !preloads.some((p) => p.package === LIBAEC_PACKAGE) && (await host.exists(configDir))) {
    const loaded = await attemptBestEffort(async () => {
      const preload = await tryConfigPreload(host, LIBAEC_PACKAGE, configDir);
      if (preload === null) return false;
      preloads = [...preloads, preload];
      return true;
    });
    if (!loaded) {
      diagnostics.push({ kind: "not-found", step: "preload", detail: `no ${LIBAEC_PACKAGE} package config in ${configDir}` });
    }
  }

  // 6. Deployment target
  let deploymentTarget = state.deploymentTarget;
  if (!deploymentTarget) {
    const inference = await inferDeploymentTarget(host);
    diagnostics.push(...inference.diagnostics);
    if (inference.target !== null) deploymentTarget = inference.target;
  }

  for (const diagnostic of diagnostics) {
    logger.debug({ ...diagnostic }, "Probe step skipped");
  }

  return {
    state: { prefix, searchPaths, pythonExecutable, deploymentTarget, preloads },
    diagnostics,
    kegOnlyAdded: kegs.added,
    probed: true,
  };
}
