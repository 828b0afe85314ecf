import type { Host } from "../host/host.js";
import type { ProbeDiagnostic } from "../types/probe.js";
import { logger } from "../logger.js";

/** "15.7.1" -> "15.0". Null when the string has no leading digits. */
export function deploymentTargetFromVersion(productVersion: string): string | null {
  const match = /^[0-9]+/.exec(productVersion.trim());
  return match ? `${match[0]}.0` : null;
}

export interface DeploymentTargetInference {
  readonly target: string | null;
  readonly diagnostics: readonly ProbeDiagnostic[];
}

/**
 * Derive the minimum deployment target from the running macOS release.
 * Any failure leaves the target unset; no default is substituted.
 */
export async function inferDeploymentTarget(host: Host): Promise<DeploymentTargetInference> {
  const result = await host.run(["sw_vers", "-productVersion"]);
  if (result.exitCode !== 0) {
    return {
      target: null,
      diagnostics: [{ kind: "probe-unavailable", step: "deployment-target", detail: `sw_vers exited with ${result.exitCode}` }],
    };
  }

  const productVersion = result.stdout.trim();
  const target = deploymentTargetFromVersion(productVersion);
  if (target === null) {
    return {
      target: null,
      diagnostics: [{ kind: "parse-failure", step: "deployment-target", detail: `unusable product version "${productVersion}"` }],
    };
  }

  logger.info(`  Set deployment target: macOS ${target}`);
  return { target, diagnostics: [] };
}
