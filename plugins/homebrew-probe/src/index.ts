export { probeHomebrew } from "./probe/prober.js";
export { runProbe } from "./probe/run.js";
export type { RunProbeOptions, RunProbeResult } from "./probe/run.js";
export { firstOf, attemptBestEffort } from "./probe/strategies.js";
export type { Strategy } from "./probe/strategies.js";
export { appendUnique, parseSearchPath } from "./probe/search-path.js";
export { deploymentTargetFromVersion } from "./probe/deployment-target.js";
export { NodeHost } from "./host/host.js";
export type { Host, NodeHostOptions } from "./host/host.js";
export { LocalExecutor } from "./execution/executor.js";
export type { Executor, ExecResult } from "./execution/executor.js";
export { loadConfig, DEFAULT_CONFIG } from "./config/loader.js";
export { readCache, writeCache, clearCache } from "./cache/cache-store.js";
export type { ProbeCache } from "./cache/cache-store.js";
export { render, renderCMake, renderEnv, renderJson } from "./output/render.js";
export type { OutputFormat } from "./output/render.js";
export { ProbeError, ProbeErrorCode } from "./shared/errors.js";
export * from "./types/index.js";
