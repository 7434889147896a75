import { defaultConfig, type RecentConfig } from "./config.js";
import { NoManifestFoundError } from "./errors.js";
import { PackageLocator, requirePackage, type Package, type PackageCandidate } from "./locator/packageLocator.js";
import { resolveManifestKinds } from "./manifest/index.js";
import { createFileFilter } from "./selection/fileFilter.js";
import {
  selectMostRecent,
  statChangedFile,
  type ChangedFile,
  type OwnedChange,
} from "./selection/recencySelector.js";
import type { CommandRunner } from "./utils/exec.js";
import { listChangedFiles } from "./utils/git.js";
import { silentLogger, type Logger } from "./utils/status.js";

export type SelectionResult =
  | { kind: "none" }
  | { kind: "selected"; package: Package; file: ChangedFile };

export const NO_SELECTION: SelectionResult = { kind: "none" };

export type FindRecentOptions = {
  /** Absolute workspace root; every lookup is scoped to it. */
  repoRoot: string;
  config?: RecentConfig;
  run?: CommandRunner;
  logger?: Logger;
};

/**
 * Package owning the most recently modified uncommitted file under
 * `repoRoot`, or `none` when nothing relevant changed.
 *
 * Throws MalformedManifestError when the winning package's manifest has no
 * usable name. Malformed manifests of packages that lose are never read
 * for a name.
 */
export async function findRecentPackage(opts: FindRecentOptions): Promise<SelectionResult> {
  const log = opts.logger ?? silentLogger;
  const cfg = opts.config ?? defaultConfig();
  const kinds = resolveManifestKinds(cfg.manifests, cfg.tools);

  const changed = await listChangedFiles(opts.repoRoot, { run: opts.run, logger: log });
  if (changed.length === 0) {
    log.debug("No changes detected");
    return NO_SELECTION;
  }

  const accept = createFileFilter({ include: cfg.include, exclude: cfg.exclude });
  const locator = new PackageLocator({ repoRoot: opts.repoRoot, kinds, logger: log });
  const owned: OwnedChange<PackageCandidate>[] = [];

  for (const rel of changed) {
    const file = statChangedFile(opts.repoRoot, rel);
    if (!file) {
      log.debug(`Skipping missing file: ${rel}`);
      continue;
    }
    const owner = locator.locate(file.absolutePath);
    if (!owner) {
      log.debug(new NoManifestFoundError(rel).message);
      continue;
    }
    if (!accept(rel, owner.kind)) {
      log.debug(`Skipping filtered file: ${rel}`);
      continue;
    }
    owned.push({ file, owner });
  }

  const best = selectMostRecent(owned);
  if (!best) {
    log.debug("No changed file belongs to a package");
    return NO_SELECTION;
  }

  log.debug(`Most recent change: ${best.file.relativePath} (mtime ${best.file.mtimeNs}ns)`);
  return { kind: "selected", package: requirePackage(best.owner), file: best.file };
}
