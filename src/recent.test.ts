import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { defaultConfig } from "./config.js";
import { MalformedManifestError } from "./errors.js";
import { findRecentPackage, type SelectionResult } from "./recent.js";
import {
  cargoToml,
  createCargoWorkspace,
  createFakeRunner,
  makeTempDir,
  removeDir,
  setMtime,
  writeFile,
} from "./testing/workspace.js";

let root: string;
let changed: string[];

function find(config = defaultConfig()) {
  const { run, calls } = createFakeRunner({ toplevel: root, changed: () => changed });
  return { result: findRecentPackage({ repoRoot: root, config, run }), calls };
}

function selectedDir(r: SelectionResult): string | null {
  return r.kind === "selected" ? r.package.dir : null;
}

function selectedName(r: SelectionResult): string | null {
  return r.kind === "selected" ? r.package.name : null;
}

beforeEach(() => {
  root = makeTempDir();
  changed = [];
  createCargoWorkspace(root);
  setMtime(root, "crate-a/src/main.rs", 1_000);
  setMtime(root, "crate-b/src/main.rs", 1_000);
});

afterEach(() => {
  removeDir(root);
});

describe("findRecentPackage", () => {
  it("selects nothing when there are no changes", async () => {
    await expect(find().result).resolves.toEqual({ kind: "none" });
  });

  it("selects the only changed crate", async () => {
    changed = ["crate-a/src/main.rs"];

    const r = await find().result;

    expect(r).toMatchObject({
      kind: "selected",
      package: { dir: path.join(root, "crate-a"), name: "crate-a", manifestPath: path.join(root, "crate-a/Cargo.toml") },
      file: { relativePath: "crate-a/src/main.rs", mtimeNs: 1_000_000_000_000n },
    });
  });

  it("follows the later edit to another crate", async () => {
    changed = ["crate-a/src/main.rs"];
    expect(selectedName(await find().result)).toBe("crate-a");

    writeFile(root, "crate-b/src/main.rs", 'fn main() {\n    println!("Hello, recent from crate-b!");\n}\n');
    setMtime(root, "crate-b/src/main.rs", 2_000);
    changed = ["crate-a/src/main.rs", "crate-b/src/main.rs"];

    expect(selectedName(await find().result)).toBe("crate-b");
  });

  it("returns to no selection once everything is committed", async () => {
    changed = ["crate-a/src/main.rs"];
    expect(selectedName(await find().result)).toBe("crate-a");

    changed = [];
    await expect(find().result).resolves.toEqual({ kind: "none" });
  });

  it("runs the diff at the repository root", async () => {
    changed = ["crate-b/src/main.rs"];
    const { result, calls } = find();

    expect(selectedDir(await result)).toBe(path.join(root, "crate-b"));
    const diff = calls.find((c) => c.args.includes("diff"));
    expect(diff?.opts.cwd).toBe(root);
  });

  it("picks the same crate on every run when times tie", async () => {
    changed = ["crate-b/src/main.rs", "crate-a/src/main.rs"];

    const picks: (string | null)[] = [];
    for (let i = 0; i < 5; i++) picks.push(selectedName(await find().result));
    changed = ["crate-a/src/main.rs", "crate-b/src/main.rs"];
    picks.push(selectedName(await find().result));

    expect(picks).toEqual(Array(6).fill("crate-a"));
  });

  it("only counts the newest file, not how many files a crate has", async () => {
    for (const f of ["one", "two", "three"]) {
      writeFile(root, `crate-a/src/${f}.rs`);
      setMtime(root, `crate-a/src/${f}.rs`, 1_500);
    }
    setMtime(root, "crate-b/src/main.rs", 1_600);
    changed = ["crate-a/src/one.rs", "crate-a/src/two.rs", "crate-a/src/three.rs", "crate-b/src/main.rs"];

    expect(selectedName(await find().result)).toBe("crate-b");
  });

  it("ignores a changed file outside any package", async () => {
    writeFile(root, "tools/gen.rs");
    setMtime(root, "tools/gen.rs", 9_000);
    changed = ["tools/gen.rs", "crate-a/src/main.rs"];

    expect(selectedName(await find().result)).toBe("crate-a");
  });

  it("selects nothing when no changed file has a package", async () => {
    writeFile(root, "tools/gen.rs");
    changed = ["tools/gen.rs"];

    await expect(find().result).resolves.toEqual({ kind: "none" });
  });

  it("skips deleted files", async () => {
    changed = ["crate-b/src/removed.rs", "crate-a/src/main.rs"];
    expect(selectedName(await find().result)).toBe("crate-a");
  });

  it("skips files the filter does not accept", async () => {
    writeFile(root, "crate-b/README.md");
    setMtime(root, "crate-b/README.md", 5_000);
    changed = ["crate-b/README.md", "crate-a/src/main.rs"];

    expect(selectedName(await find({ ...defaultConfig(), manifests: ["cargo"] }).result)).toBe("crate-a");
  });

  it("holds a crate to Rust files by default even with npm enabled", async () => {
    writeFile(root, "crate-b/README.md");
    setMtime(root, "crate-b/README.md", 5_000);
    changed = ["crate-b/README.md", "crate-a/src/main.rs"];

    expect(defaultConfig().manifests).toEqual(["cargo", "npm"]);
    expect(selectedName(await find().result)).toBe("crate-a");
  });

  it("counts any file of an npm package by default", async () => {
    writeFile(root, "web/package.json", JSON.stringify({ name: "web" }));
    writeFile(root, "web/README.md");
    setMtime(root, "web/README.md", 5_000);
    changed = ["web/README.md", "crate-a/src/main.rs"];

    expect(selectedName(await find().result)).toBe("web");
  });

  it("applies configured include globs to every package kind", async () => {
    writeFile(root, "crate-b/README.md");
    setMtime(root, "crate-b/README.md", 5_000);
    changed = ["crate-b/README.md", "crate-a/src/main.rs"];

    expect(selectedName(await find({ ...defaultConfig(), include: ["**/*.md"] }).result)).toBe("crate-b");
  });

  it("fails when the newest file's crate has a malformed manifest", async () => {
    writeFile(root, "crate-b/Cargo.toml", '[package]\nversion = "0.1.0"\n');
    setMtime(root, "crate-b/src/main.rs", 3_000);
    changed = ["crate-a/src/main.rs", "crate-b/src/main.rs"];

    const p = find().result;
    await expect(p).rejects.toBeInstanceOf(MalformedManifestError);
    await expect(p).rejects.toMatchObject({ manifestPath: path.join(root, "crate-b/Cargo.toml") });
  });

  it("ignores a malformed manifest of a crate that is not the newest", async () => {
    writeFile(root, "crate-b/Cargo.toml", "not toml at all [");
    setMtime(root, "crate-a/src/main.rs", 3_000);
    changed = ["crate-a/src/main.rs", "crate-b/src/main.rs"];

    expect(selectedName(await find().result)).toBe("crate-a");
  });

  it("attributes a change to the nearest of nested crates", async () => {
    writeFile(root, "crate-a/plugins/extra/Cargo.toml", cargoToml("extra"));
    writeFile(root, "crate-a/plugins/extra/src/lib.rs");
    setMtime(root, "crate-a/plugins/extra/src/lib.rs", 4_000);
    changed = ["crate-a/src/main.rs", "crate-a/plugins/extra/src/lib.rs"];

    const r = await find().result;
    expect(selectedDir(r)).toBe(path.join(root, "crate-a/plugins/extra"));
    expect(selectedName(r)).toBe("extra");
  });

  it("selects a manifest-only change", async () => {
    setMtime(root, "crate-b/Cargo.toml", 8_000);
    changed = ["crate-a/src/main.rs", "crate-b/Cargo.toml"];

    expect(selectedName(await find().result)).toBe("crate-b");
  });
});
