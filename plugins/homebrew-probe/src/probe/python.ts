import { join } from "node:path";
import type { Host } from "../host/host.js";
import type { ProbeDiagnostic } from "../types/probe.js";
import { firstOf } from "./strategies.js";
import type { Strategy } from "./strategies.js";
import { logger } from "../logger.js";

export function sitePackagesDir(prefix: string, version: string): string {
  return join(prefix, "lib", `python${version}`, "site-packages");
}

export function pythonExecutablePath(prefix: string, version: string): string {
  return join(prefix, "bin", `python${version}`);
}

export interface PythonSelection {
  readonly executable: string | null;
  readonly version: string | null;
  readonly diagnostics: readonly ProbeDiagnostic[];
}

function versionStrategy(host: Host, prefix: string, addon: string, version: string, diagnostics: ProbeDiagnostic[]): Strategy<string> {
  return async () => {
    const addonPath = join(sitePackagesDir(prefix, version), addon);
    if (!(await host.exists(addonPath))) return null;
    const executable = pythonExecutablePath(prefix, version);
    if (!(await host.exists(executable))) {
      diagnostics.push({ kind: "not-found", step: "python", detail: `${addon} found for Python ${version} but ${executable} is missing` });
      return null;
    }
    logger.info(`  Found ${addon} for Python ${version}, using: ${executable}`);
    return version;
  };
}

/**
 * Pick the newest interpreter that already has the add-on installed.
 * Versions are tried in the order given and the first hit ends the search.
 */
export async function selectPythonWithAddon(
  host: Host,
  prefix: string,
  versions: readonly string[],
  addon: string,
): Promise<PythonSelection> {
  const diagnostics: ProbeDiagnostic[] = [];
  const version = await firstOf(versions.map((v) => versionStrategy(host, prefix, addon, v, diagnostics)));
  if (version === null) {
    diagnostics.push({ kind: "not-found", step: "python", detail: `no Python under ${prefix} has ${addon} installed` });
    return { executable: null, version: null, diagnostics };
  }
  return { executable: pythonExecutablePath(prefix, version), version, diagnostics };
}
