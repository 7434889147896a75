import fs from "node:fs";
import path from "node:path";
import { GitCommandError, NotARepositoryError } from "../errors.js";
import { execCmd, SPAWN_FAILED_CODE, type CommandRunner } from "./exec.js";
import { silentLogger, type Logger } from "./status.js";

export type GitOptions = {
  run?: CommandRunner;
  logger?: Logger;
};

/**
 * Resolves the top-level directory of the working tree containing `startDir`.
 */
export async function findRepoRoot(startDir: string, opts: GitOptions = {}): Promise<string> {
  // spawning in a missing cwd fails like a missing git executable
  if (!fs.statSync(startDir, { throwIfNoEntry: false })?.isDirectory()) {
    throw new NotARepositoryError(startDir, "no such directory");
  }

  const run = opts.run ?? execCmd;
  const r = await run("git", ["rev-parse", "--show-toplevel"], { cwd: startDir });

  if (r.code === SPAWN_FAILED_CODE) {
    throw new GitCommandError("Failed to run git", r.code, r.stderr);
  }
  if (r.code !== 0) {
    throw new NotARepositoryError(startDir, r.stderr.trim() || undefined);
  }

  const top = r.stdout.trim();
  if (!top) throw new NotARepositoryError(startDir);
  return path.resolve(top);
}

async function hasHead(repoRoot: string, run: CommandRunner): Promise<boolean> {
  const r = await run("git", ["rev-parse", "--verify", "--quiet", "HEAD"], { cwd: repoRoot });
  return r.code === 0;
}

export function parseNameList(stdout: string): string[] {
  return stdout
    .split("\0")
    .map((s) => s.replace(/\r?\n$/, ""))
    .filter(Boolean);
}

/**
 * Paths (relative to `repoRoot`, POSIX separators) that differ between the
 * working tree and the last commit. Always runs at the root so changes in
 * sibling packages are visible no matter where the tool was started.
 */
export async function listChangedFiles(repoRoot: string, opts: GitOptions = {}): Promise<string[]> {
  const run = opts.run ?? execCmd;
  const log = opts.logger ?? silentLogger;

  const args = ["-c", "core.quotepath=off", "diff", "--name-only", "-z"];
  if (await hasHead(repoRoot, run)) {
    args.push("HEAD");
  } else {
    log.debug("Repository has no commits yet; diffing against the index");
  }

  const r = await run("git", args, { cwd: repoRoot });
  if (r.code !== 0) {
    throw new GitCommandError("git diff failed", r.code, r.stderr);
  }

  const files = parseNameList(r.stdout);
  log.debug(`git diff reported ${files.length} changed file(s)`);
  return files;
}
