import { writeFile } from "node:fs/promises";
import type { Host } from "../host/host.js";
import { NodeHost } from "../host/host.js";
import { loadConfig } from "../config/loader.js";
import { runProbe } from "../probe/run.js";
import { render } from "../output/render.js";
import { ProbeError, ProbeErrorCode } from "../shared/errors.js";
import { parseCliArgs, USAGE } from "./args.js";
import { logger } from "../logger.js";

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  /** Receives rendered output when no --output file is given. */
  stdout: (text: string) => void;
  /** Built from the loaded config when omitted. */
  host?: Host;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE_ERRORS: ReadonlySet<ProbeErrorCode> = new Set([
  ProbeErrorCode.INVALID_ARGUMENT,
  ProbeErrorCode.CONFIG_NOT_FOUND,
  ProbeErrorCode.INVALID_CONFIG,
]);

/** Run the CLI and return the process exit code. Probe outcomes never fail the run. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      deps.stdout(USAGE);
      return EXIT_OK;
    }

    const { config, configPath, fromFile } = loadConfig(args.configPath ?? (deps.env.HOMEBREW_PROBE_CONFIG || undefined));
    logger.debug({ configPath, fromFile }, "Configuration resolved");

    const host = deps.host ?? new NodeHost({ timeoutMs: config.command_timeout_ms });
    const result = await runProbe({
      host,
      config,
      buildDir: args.buildDir,
      env: deps.env,
      flags: args.flags,
      fresh: args.fresh,
    });

    const output = render(result, args.format, { pythonAddon: config.python_addon });
    if (args.outputPath) {
      try {
        await writeFile(args.outputPath, output, "utf-8");
      } catch (err) {
        throw new ProbeError(ProbeErrorCode.OUTPUT_FAILED, `Could not write ${args.outputPath}`, {
          cause: err instanceof Error ? err.message : String(err),
        });
      }
      logger.info({ outputPath: args.outputPath, format: args.format }, "Probe output written");
    } else {
      deps.stdout(output);
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ProbeError) {
      logger.error({ code: err.code, context: err.context }, err.message);
      return USAGE_ERRORS.has(err.code) ? EXIT_USAGE : EXIT_FAILURE;
    }
    throw err;
  }
}
