import pino from "pino";

function defaultLevel(): string {
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

// stdout carries the rendered cache script, so every log line goes to stderr.
export const logger = pino(
  {
    name: "homebrew-probe",
    level: process.env.LOG_LEVEL ?? defaultLevel(),
  },
  pino.destination(2),
);
