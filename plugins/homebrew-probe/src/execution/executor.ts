// Command execution layer. Every external query (brew, sw_vers) passes through here.
// Commands run via execFile without a shell; arguments are never interpolated.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Exit code reported when the executable could not be spawned at all. */
export const SPAWN_FAILED_EXIT_CODE = 127;

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  /** A timeoutMs of 0 waits for the command indefinitely. */
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

function exitCodeOf(error: { code?: unknown } | null): number {
  if (!error) return 0;
  // execFile puts the numeric exit status on `code`; spawn failures carry a string like "ENOENT".
  const code = error.code;
  if (typeof code === "number") return code;
  return code === "ENOENT" || code === "EACCES" ? SPAWN_FAILED_EXIT_CODE : 1;
}

export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      return { stdout: "", stderr: "empty command", exitCode: SPAWN_FAILED_EXIT_CODE, durationMs: 0 };
    }

    return new Promise<ExecResult>((resolve) => {
      execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          maxBuffer: 1024 * 1024,
          encoding: "utf-8",
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          const exitCode = exitCodeOf(error);
          logger.debug({ argv: command.argv, exitCode, durationMs }, "Command finished");
          resolve({ stdout, stderr, exitCode, durationMs });
        },
      );
    });
  }
}
