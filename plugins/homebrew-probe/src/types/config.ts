/** Full prober configuration, loaded from config.yaml over the defaults. */
export interface ProbeConfig {
  keg_only_packages: string[];
  python_versions: string[];
  python_addon: string;
  fallback_prefix: {
    arm64: string;
    default: string;
  };
  preload: {
    libaec: boolean;
  };
  command_timeout_ms: number;
  cache_file: string;
}
