import fs from "node:fs/promises";
import type { Executor, ExecResult } from "../execution/executor.js";
import { LocalExecutor } from "../execution/executor.js";

/**
 * Everything the prober may observe about the machine: platform, CPU architecture,
 * command output and path existence. Nothing here writes to the filesystem.
 */
export interface Host {
  readonly platform: NodeJS.Platform;
  readonly arch: string;
  /** Never rejects; a missing executable yields SPAWN_FAILED_EXIT_CODE. */
  run(argv: readonly string[]): Promise<ExecResult>;
  exists(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
}

export interface NodeHostOptions {
  executor?: Executor;
  timeoutMs?: number;
  platform?: NodeJS.Platform;
  arch?: string;
}

export class NodeHost implements Host {
  readonly platform: NodeJS.Platform;
  readonly arch: string;
  private readonly executor: Executor;
  private readonly timeoutMs: number;

  constructor(options: NodeHostOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.arch = options.arch ?? process.arch;
    this.executor = options.executor ?? new LocalExecutor();
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  run(argv: readonly string[]): Promise<ExecResult> {
    return this.executor.execute({ argv }, this.timeoutMs);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await fs.stat(path)).isDirectory();
    } catch {
      return false;
    }
  }
}
