import { join } from "node:path";
import type { Host } from "../host/host.js";
import type { ConfigPreload } from "../types/probe.js";
import { logger } from "../logger.js";

// Workaround for Homebrew's hdf5: its CMake package config references the
// libaec::sz target without calling find_package(libaec) itself, so libaec must be
// loaded before VTK or HDF5. Drop this once hdf5's config finds libaec on its own.
export const LIBAEC_PACKAGE = "libaec";

export function libaecConfigDir(prefix: string): string {
  return join(prefix, "lib", "cmake", LIBAEC_PACKAGE);
}

function configFileNames(pkg: string): string[] {
  return [`${pkg}-config.cmake`, `${pkg}Config.cmake`];
}

/**
 * Register a quiet CONFIG-mode preload for `pkg` when its package config file is present.
 * Returns null when the package cannot be loaded; callers treat that as a no-op.
 */
export async function tryConfigPreload(host: Host, pkg: string, configDir: string): Promise<ConfigPreload | null> {
  for (const fileName of configFileNames(pkg)) {
    if (await host.exists(join(configDir, fileName))) {
      logger.info(`  Found ${pkg} (required by HDF5)`);
      return { package: pkg, configDir };
    }
  }
  logger.debug({ configDir }, `No package config for ${pkg}`);
  return null;
}
