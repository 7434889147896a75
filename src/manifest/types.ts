export type ManifestKindId = "cargo" | "npm";

export const MANIFEST_KIND_IDS = ["cargo", "npm"] as const satisfies readonly ManifestKindId[];

export type ParsedManifest =
  | { type: "package"; name: string }
  // declares workspace members only; the locator looks at the next kind, then upward
  | { type: "workspace" }
  | { type: "malformed"; reason: string; cause?: unknown };

export type ForwardRequest = {
  command: string;
  args: string[];
  packageName: string;
  packageDir: string;
  repoRoot: string;
};

export type ForwardInvocation = {
  args: string[];
  cwd: string;
};

export interface ManifestKind {
  readonly id: ManifestKindId;
  readonly fileName: string;
  /** Build tool the `<command> [args...]` form is forwarded to. */
  readonly tool: string;
  /** Repo-relative globs of changed files this ecosystem cares about. */
  readonly defaultInclude: readonly string[];
  parse(raw: string): ParsedManifest;
  forward(req: ForwardRequest): ForwardInvocation;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Puts `flags` in front of a `--` separator so they reach the build tool
 * rather than the program it runs.
 */
export function insertBeforeSeparator(args: string[], flags: string[]): string[] {
  const sep = args.indexOf("--");
  if (sep === -1) return [...args, ...flags];
  return [...args.slice(0, sep), ...flags, ...args.slice(sep)];
}
