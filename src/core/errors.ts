export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class RepositoryTaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RepositoryTaskError";
  }
}

export class UnsupportedRepositoryError extends Error {
  constructor(readonly repoDir: string) {
    super(`non-generaldelta repo not supported: ${repoDir}`);
    this.name = "UnsupportedRepositoryError";
  }
}

export class VcsCommandError extends Error {
  constructor(
    readonly argv: readonly string[],
    readonly exitCode: number,
    readonly stderr: string
  ) {
    const detail = stderr.trim();
    super(`${argv.join(" ")} failed (exit ${exitCode})${detail ? `: ${detail}` : ""}`);
    this.name = "VcsCommandError";
  }
}

/** Thrown by a backend to mark a failure as worth another attempt. */
export class TransientStorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientStorageError";
  }
}

export class UploadExhaustedError extends Error {
  constructor(
    readonly backend: string,
    readonly key: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`upload of ${backend}:${key} not successful after ${attempts} attempts, giving up`, options);
    this.name = "UploadExhaustedError";
  }
}
