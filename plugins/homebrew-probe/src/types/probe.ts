/** Step of the probe that produced a diagnostic. */
export type ProbeStep =
  | "prefix"
  | "python"
  | "preload"
  | "deployment-target";

/**
 * Why an optional value stayed unresolved.
 * probe-unavailable: an external command was missing or exited non-zero.
 * not-found: an expected path was absent.
 * parse-failure: command output had no usable value.
 */
export type DiagnosticKind = "probe-unavailable" | "not-found" | "parse-failure";

export interface ProbeDiagnostic {
  readonly kind: DiagnosticKind;
  readonly step: ProbeStep;
  readonly detail: string;
}

/** A CMake package config to load quietly before the main configure. */
export interface ConfigPreload {
  readonly package: string;
  readonly configDir: string;
}

/**
 * Resolved build configuration, threaded through the prober explicitly.
 * `prefix` is undefined until resolved; an empty string means Homebrew was not found.
 */
export interface ProbeState {
  readonly prefix: string | undefined;
  readonly searchPaths: readonly string[];
  readonly pythonExecutable: string | undefined;
  readonly deploymentTarget: string | undefined;
  readonly preloads: readonly ConfigPreload[];
}

export interface ProbeOptions {
  /** Interpreter alignment only runs for GUI builds. */
  readonly buildGui: boolean;
}

export interface ProbeResult {
  readonly state: ProbeState;
  readonly diagnostics: readonly ProbeDiagnostic[];
  /** Keg-only package names whose opt/ directory was appended by this run. */
  readonly kegOnlyAdded: readonly string[];
  /** False when the host platform is not macOS and nothing was probed. */
  readonly probed: boolean;
}

export const EMPTY_STATE: ProbeState = {
  prefix: undefined,
  searchPaths: [],
  pythonExecutable: undefined,
  deploymentTarget: undefined,
  preloads: [],
};
