import type { Package } from "../locator/packageLocator.js";
import { execCmd, type CommandRunner, type ExecResult } from "../utils/exec.js";

export type ForwardPlan = {
  tool: string;
  args: string[];
  cwd: string;
};

export function planForward(opts: {
  pkg: Package;
  repoRoot: string;
  command: string;
  args: string[];
}): ForwardPlan {
  const { args, cwd } = opts.pkg.kind.forward({
    command: opts.command,
    args: opts.args,
    packageName: opts.pkg.name,
    packageDir: opts.pkg.dir,
    repoRoot: opts.repoRoot,
  });
  return { tool: opts.pkg.kind.tool, args, cwd };
}

export function formatCommandLine(plan: ForwardPlan): string {
  return ["run:", plan.tool, ...plan.args].join(" ");
}

/**
 * Runs the build tool on the caller's terminal. Only `code` (and `stderr`,
 * when the tool could not be started) carries anything.
 */
export async function forwardCommand(plan: ForwardPlan, run: CommandRunner = execCmd): Promise<ExecResult> {
  return await run(plan.tool, plan.args, { cwd: plan.cwd, stdio: "inherit" });
}
