import path from "node:path";
import { Command, CommanderError } from "commander";
import { loadConfig } from "./config.js";
import { formatCommandLine, forwardCommand, planForward } from "./dispatch/forward.js";
import { RecentError } from "./errors.js";
import { findRecentPackage, type SelectionResult } from "./recent.js";
import { execCmd, SPAWN_FAILED_CODE, type CommandRunner } from "./utils/exec.js";
import { findRepoRoot } from "./utils/git.js";
import { createLogger, isDebugEnv, type Logger } from "./utils/status.js";

export type CliDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  run?: CommandRunner;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
};

type GlobalOpts = {
  cwd?: string;
  config?: string;
  verbose?: boolean;
};

type Resolved = {
  repoRoot: string;
  result: SelectionResult;
  logger: Logger;
};

export const NO_COMMAND_HINT = "No command specified. Try 'recent path' or 'recent show'";

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const baseCwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const run = deps.run ?? execCmd;
  const out = deps.stdout ?? ((t: string) => void process.stdout.write(t));
  const err = deps.stderr ?? ((t: string) => void process.stderr.write(t));

  let exitCode = 0;
  const program = new Command();

  const resolveSelection = async (): Promise<Resolved> => {
    const opts = program.opts<GlobalOpts>();
    const logger = createLogger({ verbose: !!opts.verbose || isDebugEnv(env), write: err });

    const startDir = path.resolve(baseCwd, opts.cwd ?? ".");
    logger.debug(`Starting directory: ${startDir}`);

    const repoRoot = await findRepoRoot(startDir, { run, logger });
    logger.debug(`Repository root: ${repoRoot}`);

    const config = loadConfig(repoRoot, opts.config ? path.resolve(baseCwd, opts.config) : undefined);
    if (config.source) logger.debug(`Loaded config from ${config.source}`);

    const result = await findRecentPackage({ repoRoot, config, run, logger });
    return { repoRoot, result, logger };
  };

  program
    .name("recent")
    .description("Show and operate on the most recently changed package")
    .option("-C, --cwd <dir>", "directory to look for the repository from")
    .option("-c, --config <path>", "config yaml path (default: <repo root>/recent.config.yaml)")
    .option("-v, --verbose", "print debug logs to stderr")
    .enablePositionalOptions()
    .passThroughOptions()
    .argument("[command]", "build command to forward to the package's build tool")
    .argument("[args...]", "arguments passed through to the build command")
    .exitOverride()
    .configureOutput({ writeOut: out, writeErr: err })
    .action(async (command: string | undefined, args: string[]) => {
      if (!command) {
        out(`${NO_COMMAND_HINT}\n`);
        return;
      }

      const { repoRoot, result, logger } = await resolveSelection();
      if (result.kind === "none") return;

      const plan = planForward({ pkg: result.package, repoRoot, command, args });
      out(`${formatCommandLine(plan)}\n`);

      const r = await forwardCommand(plan, run);
      if (r.code === SPAWN_FAILED_CODE && r.stderr) logger.error(r.stderr.trim());
      else if (r.code !== 0) logger.debug(`${plan.tool} exited with code ${r.code}`);
      exitCode = r.code;
    });

  program
    .command("path")
    .description("Show the path of the most recently changed package")
    .action(async () => {
      const { result } = await resolveSelection();
      if (result.kind === "selected") out(`${result.package.dir}\n`);
    });

  program
    .command("show")
    .description("Show the name of the most recently changed package")
    .action(async () => {
      const { result } = await resolveSelection();
      if (result.kind === "selected") out(`${result.package.name}\n`);
    });

  try {
    await program.parseAsync(argv, { from: "user" });
    return exitCode;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    if (e instanceof RecentError) {
      err(`error: ${e.message}\n`);
      return 1;
    }
    const verbose = !!program.opts<GlobalOpts>().verbose || isDebugEnv(env);
    err(`error: ${verbose && e instanceof Error && e.stack ? e.stack : String(e)}\n`);
    return 1;
  }
}
