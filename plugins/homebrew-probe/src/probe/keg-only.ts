import { join } from "node:path";
import type { Host } from "../host/host.js";
import { appendUnique } from "./search-path.js";
import { logger } from "../logger.js";

export interface KegOnlyDiscovery {
  readonly searchPaths: readonly string[];
  readonly added: readonly string[];
}

export function kegPath(prefix: string, name: string): string {
  return join(prefix, "opt", name);
}

/**
 * Append <prefix>/opt/<name> for every listed package whose opt/ entry is a directory.
 * Packages are visited in list order; entries already on the search path are left alone.
 */
export async function discoverKegOnlyPackages(
  host: Host,
  prefix: string,
  packages: readonly string[],
  searchPaths: readonly string[],
): Promise<KegOnlyDiscovery> {
  let paths = searchPaths;
  const added: string[] = [];

  for (const name of packages) {
    const pkgPath = kegPath(prefix, name);
    if (!(await host.isDirectory(pkgPath))) continue;
    if (paths.includes(pkgPath)) continue;
    paths = appendUnique(paths, pkgPath);
    added.push(name);
    logger.info(`  Added keg-only package: ${name}`);
  }

  return { searchPaths: paths, added };
}
