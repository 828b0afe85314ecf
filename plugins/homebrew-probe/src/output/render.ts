import type { ProbeResult, ProbeState } from "../types/probe.js";

export const OUTPUT_FORMATS = ["cmake", "json", "env"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface RenderOptions {
  /** Name of the add-on used to pick the interpreter, for the cache doc string. */
  pythonAddon: string;
}

/** Quote a value as a CMake quoted argument. */
export function cmakeQuote(value: string): string {
  return `"${value.replace(/[\\"$]/g, (ch) => `\\${ch}`)}"`;
}

/** Quote a value for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function cacheEntry(name: string, value: string, type: "PATH" | "FILEPATH" | "STRING", doc: string): string {
  return `set(${name} ${cmakeQuote(value)} CACHE ${type} ${cmakeQuote(doc)})`;
}

/** Initial-cache script for `cmake -C <file>`. */
export function renderCMake(state: ProbeState, options: RenderOptions): string {
  const lines = ["# Generated by homebrew-probe. Load with: cmake -C <this file>"];

  if (state.prefix) {
    lines.push(cacheEntry("HOMEBREW_PREFIX", state.prefix, "PATH", "Homebrew installation prefix"));
  }
  if (state.searchPaths.length > 0) {
    lines.push(cacheEntry("CMAKE_PREFIX_PATH", state.searchPaths.join(";"), "STRING", "Prefix search path"));
  }
  if (state.pythonExecutable) {
    lines.push(cacheEntry("Python3_EXECUTABLE", state.pythonExecutable, "FILEPATH", `Python interpreter with ${options.pythonAddon}`));
  }
  if (state.deploymentTarget) {
    lines.push(cacheEntry("CMAKE_OSX_DEPLOYMENT_TARGET", state.deploymentTarget, "STRING", "Minimum macOS deployment version"));
  }
  if (state.preloads.length > 0) {
    lines.push("# Load these with find_package(<pkg> CONFIG QUIET) before any other package");
    for (const preload of state.preloads) {
      lines.push(cacheEntry(`${preload.package}_DIR`, preload.configDir, "PATH", `${preload.package} package config directory`));
    }
    lines.push(
      cacheEntry("HOMEBREW_PROBE_PRELOADS", state.preloads.map((p) => p.package).join(";"), "STRING", "Packages to preload quietly"),
    );
  }

  return lines.join("\n") + "\n";
}

export function renderJson(result: ProbeResult): string {
  const { state } = result;
  const document = {
    probed: result.probed,
    prefix: state.prefix ?? null,
    searchPaths: state.searchPaths,
    pythonExecutable: state.pythonExecutable ?? null,
    deploymentTarget: state.deploymentTarget ?? null,
    preloads: state.preloads,
    kegOnlyAdded: result.kegOnlyAdded,
    diagnostics: result.diagnostics,
  };
  return JSON.stringify(document, null, 2) + "\n";
}

/** `export` lines using the variable names CMake reads from the environment. */
export function renderEnv(state: ProbeState): string {
  const lines: string[] = [];
  if (state.prefix) lines.push(`export HOMEBREW_PREFIX=${shellQuote(state.prefix)}`);
  if (state.searchPaths.length > 0) lines.push(`export CMAKE_PREFIX_PATH=${shellQuote(state.searchPaths.join(":"))}`);
  if (state.pythonExecutable) lines.push(`export Python3_EXECUTABLE=${shellQuote(state.pythonExecutable)}`);
  if (state.deploymentTarget) lines.push(`export MACOSX_DEPLOYMENT_TARGET=${shellQuote(state.deploymentTarget)}`);
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}

export function render(result: ProbeResult, format: OutputFormat, options: RenderOptions): string {
  switch (format) {
    case "cmake":
      return renderCMake(result.state, options);
    case "json":
      return renderJson(result);
    case "env":
      return renderEnv(result.state);
  }
}
