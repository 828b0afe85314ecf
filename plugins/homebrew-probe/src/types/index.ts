export type { ProbeStep, DiagnosticKind, ProbeDiagnostic, ConfigPreload, ProbeState, ProbeOptions, ProbeResult } from "./probe.js";
export { EMPTY_STATE } from "./probe.js";
export type { ProbeConfig } from "./config.js";
export type { Command } from "./command.js";
