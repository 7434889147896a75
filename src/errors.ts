export class RecentError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "RecentError";
  }
}

export class NotARepositoryError extends RecentError {
  constructor(public startDir: string, cause?: unknown) {
    super(`Not a git repository (or any parent directory): ${startDir}`, cause);
    this.name = "NotARepositoryError";
  }
}

export class GitCommandError extends RecentError {
  constructor(message: string, public exitCode: number, public stderr: string) {
    super(stderr.trim() ? `${message}: ${stderr.trim()}` : message);
    this.name = "GitCommandError";
  }
}

export class MalformedManifestError extends RecentError {
  constructor(public manifestPath: string, reason: string, cause?: unknown) {
    super(`Malformed manifest ${manifestPath}: ${reason}`, cause);
    this.name = "MalformedManifestError";
  }
}

export class ConfigError extends RecentError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/** Not thrown: describes a changed file that no package claims. */
export class NoManifestFoundError extends RecentError {
  constructor(public filePath: string) {
    super(`No package manifest encloses ${filePath}`);
    this.name = "NoManifestFoundError";
  }
}
