import { delimiter } from "node:path";

/** Append `entry` unless the list already holds it. The input list is not modified. */
export function appendUnique(list: readonly string[], entry: string): readonly string[] {
  return list.includes(entry) ? list : [...list, entry];
}

/**
 * Split a prefix path list into entries. Accepts CMake lists (";") as well as
 * PATH-style lists; empty and repeated entries are dropped.
 */
export function parseSearchPath(value: string | undefined): readonly string[] {
  if (!value) return [];
  const separator = value.includes(";") ? ";" : delimiter;
  let entries: readonly string[] = [];
  for (const raw of value.split(separator)) {
    const entry = raw.trim();
    if (entry) entries = appendUnique(entries, entry);
  }
  return entries;
}
