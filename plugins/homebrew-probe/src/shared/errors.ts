export enum ProbeErrorCode {
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  CONFIG_NOT_FOUND = "CONFIG_NOT_FOUND",
  INVALID_CONFIG = "INVALID_CONFIG",
  INVALID_CACHE = "INVALID_CACHE",
  OUTPUT_FAILED = "OUTPUT_FAILED",
}

/**
 * Raised for caller mistakes only. Probe failures never surface as a ProbeError;
 * they are reported as diagnostics on the probe result.
 */
export class ProbeError extends Error {
  readonly code: ProbeErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ProbeErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ProbeError";
    this.code = code;
    this.context = context;
  }
}
