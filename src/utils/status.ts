export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export type LoggerOptions = {
  verbose?: boolean;
  write?: (line: string) => void;
  now?: () => Date;
};

export function formatStatusLine(level: LogLevel, message: string, at: Date): string {
  return `${at.toISOString()} [${level.toUpperCase()}] ${message}\n`;
}

/**
 * Status lines go to stderr so stdout stays reserved for command output
 * (`path`, `show`, and whatever the forwarded build tool prints).
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const write = opts.write ?? ((line: string) => void process.stderr.write(line));
  const now = opts.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string) => {
    if (level === "debug" && !opts.verbose) return;
    write(formatStatusLine(level, message, now()));
  };

  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function isDebugEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const v = env.RECENT_DEBUG?.trim().toLowerCase();
  return !!v && v !== "0" && v !== "false";
}
