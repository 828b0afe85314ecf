import { parseArgs } from "node:util";
import type { ProbeInputs } from "../inputs.js";
import type { OutputFormat } from "../output/render.js";
import { OUTPUT_FORMATS, isOutputFormat } from "../output/render.js";
import { ProbeError, ProbeErrorCode } from "../shared/errors.js";

export interface CliArgs {
  buildDir: string;
  format: OutputFormat;
  fresh: boolean;
  configPath?: string;
  outputPath?: string;
  help: boolean;
  flags: ProbeInputs;
}

export const USAGE = `Usage: homebrew-probe [options]

Detect Homebrew on macOS and write CMake configuration for it.

Options:
  --build-dir DIR            Directory holding the probe cache (default: .)
  --format cmake|json|env    Output format (default: cmake)
  --output FILE              Write output to FILE instead of stdout
  --gui / --no-gui           Whether a GUI build is requested (default: BUILD_GUI or on)
  --fresh                    Ignore cached values and probe again
  --config FILE              Config file (default: ~/.config/homebrew-probe/config.yaml)
  --prefix PATH              Use PATH as the Homebrew prefix
  --prefix-path LIST         Initial search path, ";" or ":" separated (default: CMAKE_PREFIX_PATH)
  --python PATH              Use PATH as the Python interpreter
  --deployment-target VER    Use VER as the macOS deployment target
  -h, --help                 Show this help
`;

const OPTIONS = {
  "build-dir": { type: "string" },
  format: { type: "string" },
  output: { type: "string" },
  gui: { type: "boolean" },
  "no-gui": { type: "boolean" },
  fresh: { type: "boolean" },
  config: { type: "string" },
  prefix: { type: "string" },
  "prefix-path": { type: "string" },
  python: { type: "string" },
  "deployment-target": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function parse(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false });
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    throw new ProbeError(ProbeErrorCode.INVALID_ARGUMENT, err instanceof Error ? err.message : String(err));
  }
  const { values } = parsed;

  const format = values.format ?? "cmake";
  if (!isOutputFormat(format)) {
    throw new ProbeError(ProbeErrorCode.INVALID_ARGUMENT, `Unknown format "${format}", expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  if (values.gui && values["no-gui"]) {
    throw new ProbeError(ProbeErrorCode.INVALID_ARGUMENT, "--gui and --no-gui are mutually exclusive");
  }

  let buildGui: boolean | undefined;
  if (values.gui) buildGui = true;
  else if (values["no-gui"]) buildGui = false;

  return {
    buildDir: values["build-dir"] ?? ".",
    format,
    fresh: values.fresh ?? false,
    configPath: values.config,
    outputPath: values.output,
    help: values.help ?? false,
    flags: {
      prefix: values.prefix,
      prefixPath: values["prefix-path"],
      pythonExecutable: values.python,
      deploymentTarget: values["deployment-target"],
      buildGui,
    },
  };
}
