import fs from "node:fs";
import path from "node:path";
import { MalformedManifestError } from "../errors.js";
import type { ManifestKind, ParsedManifest } from "../manifest/index.js";
import { isSameOrUnderDir } from "../utils/path.js";
import { silentLogger, type Logger } from "../utils/status.js";

export type ManifestStatus = { ok: true; name: string } | { ok: false; reason: string; cause?: unknown };

/** A directory that owns files through its manifest, whether or not that manifest is valid. */
export type PackageCandidate = {
  dir: string;
  manifestPath: string;
  kind: ManifestKind;
  manifest: ManifestStatus;
};

export type Package = {
  dir: string;
  manifestPath: string;
  kind: ManifestKind;
  name: string;
};

export function readManifest(manifestPath: string, kind: ManifestKind): ParsedManifest {
  let raw: string;
  try {
    raw = fs.readFileSync(manifestPath, "utf8");
  } catch (e) {
    return { type: "malformed", reason: `unreadable (${e instanceof Error ? e.message : String(e)})`, cause: e };
  }
  return kind.parse(raw);
}

/** Declared package name of a manifest; never falls back to the directory name. */
export function extractPackageName(manifestPath: string, kind: ManifestKind): string {
  const parsed = readManifest(manifestPath, kind);
  switch (parsed.type) {
    case "package":
      return parsed.name;
    case "workspace":
      throw new MalformedManifestError(manifestPath, "declares a workspace but no package");
    case "malformed":
      throw new MalformedManifestError(manifestPath, parsed.reason, parsed.cause);
  }
}

export function requirePackage(candidate: PackageCandidate): Package {
  if (!candidate.manifest.ok) {
    throw new MalformedManifestError(candidate.manifestPath, candidate.manifest.reason, candidate.manifest.cause);
  }
  return {
    dir: candidate.dir,
    manifestPath: candidate.manifestPath,
    kind: candidate.kind,
    name: candidate.manifest.name,
  };
}

export class PackageLocator {
  private repoRoot: string;
  private kinds: ManifestKind[];
  private log: Logger;
  // directory -> owner of the files directly inside it
  private owners = new Map<string, PackageCandidate | null>();

  constructor(opts: { repoRoot: string; kinds: ManifestKind[]; logger?: Logger }) {
    this.repoRoot = path.resolve(opts.repoRoot);
    this.kinds = opts.kinds;
    this.log = opts.logger ?? silentLogger;
  }

  /**
   * Nearest package enclosing `filePath`, searching no higher than the
   * repository root. Returns null when no manifest claims the file.
   */
  locate(filePath: string): PackageCandidate | null {
    const abs = path.resolve(this.repoRoot, filePath);
    let current = path.dirname(abs);
    if (!isSameOrUnderDir(current, this.repoRoot)) {
      this.log.debug(`Outside repository root, ignoring: ${abs}`);
      return null;
    }

    const visited: string[] = [];
    let owner: PackageCandidate | null = null;

    for (;;) {
      const cached = this.owners.get(current);
      if (cached !== undefined) {
        owner = cached;
        break;
      }
      visited.push(current);

      const found = this.ownerIn(current);
      if (found) {
        owner = found;
        break;
      }

      const parent = path.dirname(current);
      if (current === this.repoRoot || parent === current) break;
      current = parent;
    }

    for (const dir of visited) this.owners.set(dir, owner);
    return owner;
  }

  private ownerIn(dir: string): PackageCandidate | null {
    for (const kind of this.kinds) {
      const manifestPath = path.join(dir, kind.fileName);
      if (!isFile(manifestPath)) continue;

      const parsed = readManifest(manifestPath, kind);
      switch (parsed.type) {
        case "workspace":
          this.log.debug(`Workspace-only manifest, trying the next kind: ${manifestPath}`);
          continue;
        case "package":
          this.log.debug(`Found ${kind.fileName} for package "${parsed.name}" at ${dir}`);
          return { dir, manifestPath, kind, manifest: { ok: true, name: parsed.name } };
        case "malformed":
          this.log.debug(`Malformed ${kind.fileName} at ${dir}: ${parsed.reason}`);
          return { dir, manifestPath, kind, manifest: { ok: false, reason: parsed.reason, cause: parsed.cause } };
      }
    }
    return null;
  }
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}
