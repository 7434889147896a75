import fs from "node:fs";
import path from "node:path";
import { Minimatch } from "minimatch";
import { isSameOrUnderDir, toPosix } from "../utils/path.js";
import { insertBeforeSeparator, isRecord, type ManifestKind, type ParsedManifest } from "./types.js";

function parseJson(raw: string): { ok: true; doc: unknown } | { ok: false; error: unknown } {
  try {
    return { ok: true, doc: JSON.parse(raw) };
  } catch (e) {
    return { ok: false, error: e };
  }
}

export function parseNpmManifest(raw: string): ParsedManifest {
  const parsed = parseJson(raw);
  if (!parsed.ok) {
    const e = parsed.error;
    return { type: "malformed", reason: `invalid JSON (${e instanceof Error ? e.message : String(e)})`, cause: e };
  }
  const doc = parsed.doc;
  if (!isRecord(doc)) return { type: "malformed", reason: "expected a JSON object" };

  const name = typeof doc.name === "string" ? doc.name.trim() : "";
  if (name) return { type: "package", name };

  // an unnamed root that only lists workspaces is not a package of its own
  if (doc.workspaces !== undefined) return { type: "workspace" };

  return { type: "malformed", reason: 'missing "name"' };
}

/** `workspaces` globs of the package.json in `dir`, empty when it declares none. */
export function readWorkspaceGlobs(dir: string): string[] {
  let raw: string;
  try {
    raw = fs.readFileSync(path.join(dir, "package.json"), "utf8");
  } catch {
    return [];
  }
  const parsed = parseJson(raw);
  if (!parsed.ok || !isRecord(parsed.doc)) return [];

  const ws = parsed.doc.workspaces;
  const list: unknown[] = Array.isArray(ws) ? ws : isRecord(ws) && Array.isArray(ws.packages) ? ws.packages : [];
  return list.filter((p): p is string => typeof p === "string");
}

/** Whether `globs`, relative to `rootDir`, list `packageDir`. A later `!glob` removes earlier matches. */
export function listsWorkspaceMember(rootDir: string, globs: readonly string[], packageDir: string): boolean {
  const rel = toPosix(path.relative(rootDir, packageDir));
  let member = false;
  for (const glob of globs) {
    const negated = glob.startsWith("!");
    const pattern = (negated ? glob.slice(1) : glob).replace(/^\.\//, "").replace(/\/+$/, "");
    if (new Minimatch(pattern, { dot: true }).match(rel)) member = !negated;
  }
  return member;
}

/**
 * Nearest directory above `packageDir`, up to `repoRoot`, whose package.json
 * lists the package under `workspaces`.
 */
export function findWorkspaceRoot(packageDir: string, repoRoot: string): string | null {
  const root = path.resolve(repoRoot);
  let dir = path.dirname(path.resolve(packageDir));
  while (isSameOrUnderDir(dir, root)) {
    const globs = readWorkspaceGlobs(dir);
    if (globs.length > 0 && listsWorkspaceMember(dir, globs, packageDir)) return dir;
    const parent = path.dirname(dir);
    if (dir === root || parent === dir) break;
    dir = parent;
  }
  return null;
}

export const npmManifest: ManifestKind = {
  id: "npm",
  fileName: "package.json",
  tool: "npm",
  defaultInclude: ["**/*"],
  parse: parseNpmManifest,
  // a workspace member is addressed from its workspace root; any other package runs in place
  forward: ({ command, args, packageName, packageDir, repoRoot }) => {
    const workspaceRoot = findWorkspaceRoot(packageDir, repoRoot);
    if (!workspaceRoot) return { args: [command, ...args], cwd: packageDir };
    return { args: insertBeforeSeparator([command, ...args], ["--workspace", packageName]), cwd: workspaceRoot };
  },
};
