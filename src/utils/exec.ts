import { spawn } from "node:child_process";
import os from "node:os";

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  // "inherit" hands the terminal to the child; stdout/stderr come back empty
  stdio?: "pipe" | "inherit";
};

export type CommandRunner = (cmd: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

/** Exit code reported when the executable could not be started at all. */
export const SPAWN_FAILED_CODE = 127;

export async function execCmd(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return await new Promise((resolve) => {
    const p = spawn(cmd, args, {
      cwd: opts.cwd,
      env: { ...process.env, ...(opts.env ?? {}) },
      stdio: opts.stdio === "inherit" ? "inherit" : ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    p.stdout?.on("data", (d: Buffer) => (stdout += d.toString()));
    p.stderr?.on("data", (d: Buffer) => (stderr += d.toString()));

    let settled = false;
    p.on("error", (err) => {
      if (settled) return;
      settled = true;
      resolve({ code: SPAWN_FAILED_CODE, stdout, stderr: stderr + `${cmd}: ${err.message}` });
    });
    p.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      if (code === null && signal) {
        resolve({ code: exitCodeForSignal(signal), stdout, stderr });
        return;
      }
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}

/** Shell convention for a child killed by `signal`: 128 + the platform's signal number. */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  for (const [name, num] of Object.entries(os.constants.signals)) {
    if (name === signal && typeof num === "number") return 128 + num;
  }
  return 128;
}
