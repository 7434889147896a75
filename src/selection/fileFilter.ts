import { Minimatch } from "minimatch";
import type { ManifestKind, ManifestKindId } from "../manifest/index.js";
import { toPosix } from "../utils/path.js";

/** Decides whether a changed file counts, given the kind of package that owns it. */
export type FileFilter = (relativePath: string, owner: ManifestKind) => boolean;

function compileMatchers(patterns: readonly string[]): Minimatch[] {
  return patterns.map((p) => new Minimatch(p, { dot: true, nocase: false }));
}

function matchesAny(p: string, ms: Minimatch[]): boolean {
  return ms.some((m) => m.match(p));
}

/**
 * A non-empty `include` applies to every file. Without one, each file is held
 * to the default globs of the manifest kind that owns it, so a README inside
 * a crate does not count even when npm is enabled too.
 */
export function createFileFilter(opts: { include?: readonly string[]; exclude?: readonly string[] } = {}): FileFilter {
  const includeMatchers = opts.include?.length ? compileMatchers(opts.include) : null;
  const excludeMatchers = compileMatchers(opts.exclude ?? []);
  const byKind = new Map<ManifestKindId, Minimatch[]>();

  const defaultsFor = (kind: ManifestKind): Minimatch[] => {
    let ms = byKind.get(kind.id);
    if (!ms) {
      ms = compileMatchers(kind.defaultInclude);
      byKind.set(kind.id, ms);
    }
    return ms;
  };

  return (relativePath, owner) => {
    const rel = toPosix(relativePath);
    if (!matchesAny(rel, includeMatchers ?? defaultsFor(owner))) return false;
    return !matchesAny(rel, excludeMatchers);
  };
}
