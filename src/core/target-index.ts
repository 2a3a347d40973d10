import { readdirSync, statSync, type Dirent } from "node:fs";
import { join } from "node:path";
import type { TargetIndex } from "./types.js";

/** Lowercase and strip all whitespace: "Acme Corp" → "acmecorp" */
export function normalizeName(name: string): string {
  return name.replace(/\s+/g, "").toLowerCase();
}

/** Directory test that follows symlinks; a dangling link is not a directory. */
export function isDirectoryEntry(dir: string, entry: Dirent): boolean {
  if (!entry.isSymbolicLink()) return entry.isDirectory();
  try {
    return statSync(join(dir, entry.name)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Index the immediate sub-directories of the target root.
 * Folders whose name contains an ignore substring are left out.
 */
export function buildTargetIndex(
  targetRoot: string,
  opts?: { ignore?: readonly string[] }
): TargetIndex {
  const ignore = opts?.ignore ?? [];

  return readdirSync(targetRoot, { withFileTypes: true })
    .filter((entry) => isDirectoryEntry(targetRoot, entry))
    .filter((entry) => !ignore.some((pattern) => entry.name.includes(pattern)))
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ key: normalizeName(name), name, path: join(targetRoot, name) }));
}
