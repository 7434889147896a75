import fs from "node:fs";
import path from "node:path";
import { comparePaths } from "../utils/path.js";

export type ChangedFile = {
  /** Relative to the repository root, POSIX separators. */
  relativePath: string;
  absolutePath: string;
  /** Filesystem modification time in nanoseconds. */
  mtimeNs: bigint;
};

export type OwnedChange<Owner> = {
  file: ChangedFile;
  owner: Owner;
};

/**
 * Stats a path reported by the diff. Returns null when it no longer exists
 * (deleted files show up in the diff too) or is not a regular file.
 */
export function statChangedFile(repoRoot: string, relativePath: string): ChangedFile | null {
  const absolutePath = path.resolve(repoRoot, relativePath);
  const st = fs.statSync(absolutePath, { bigint: true, throwIfNoEntry: false });
  if (!st || !st.isFile()) return null;
  return { relativePath, absolutePath, mtimeNs: st.mtimeNs };
}

/** Orders newer files first; equal times fall back to ascending absolute path. */
export function compareRecency(a: ChangedFile, b: ChangedFile): number {
  if (a.mtimeNs !== b.mtimeNs) return a.mtimeNs > b.mtimeNs ? -1 : 1;
  return comparePaths(a.absolutePath, b.absolutePath);
}

/**
 * The entry holding the single newest file. How many other files a package
 * owns has no bearing on the result.
 */
export function selectMostRecent<Owner>(entries: Iterable<OwnedChange<Owner>>): OwnedChange<Owner> | null {
  let best: OwnedChange<Owner> | null = null;
  for (const entry of entries) {
    if (!best || compareRecency(entry.file, best.file) < 0) best = entry;
  }
  return best;
}
