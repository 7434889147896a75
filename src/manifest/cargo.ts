import TOML from "@iarna/toml";
import { insertBeforeSeparator, isRecord, type ManifestKind, type ParsedManifest } from "./types.js";

export function parseCargoManifest(raw: string): ParsedManifest {
  let doc: unknown;
  try {
    doc = TOML.parse(raw);
  } catch (e) {
    return { type: "malformed", reason: `invalid TOML (${e instanceof Error ? e.message : String(e)})`, cause: e };
  }
  if (!isRecord(doc)) return { type: "malformed", reason: "invalid TOML" };

  const pkg = doc.package;
  if (isRecord(pkg)) {
    const name = typeof pkg.name === "string" ? pkg.name.trim() : "";
    if (!name) return { type: "malformed", reason: "missing [package].name" };
    return { type: "package", name };
  }

  // virtual manifest: [workspace] with no [package]
  if (isRecord(doc.workspace)) return { type: "workspace" };

  return { type: "malformed", reason: "no [package] section" };
}

export const cargoManifest: ManifestKind = {
  id: "cargo",
  fileName: "Cargo.toml",
  tool: "cargo",
  defaultInclude: ["**/*.rs", "**/Cargo.toml", "**/Cargo.lock"],
  parse: parseCargoManifest,
  // cargo finds the enclosing workspace itself, so run from inside the package
  forward: ({ command, args, packageName, packageDir }) => ({
    args: insertBeforeSeparator([command, ...args], ["--package", packageName]),
    cwd: packageDir,
  }),
};
