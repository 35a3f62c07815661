/**
 * Base class for every failure the checker reports to the user.
 * The CLI prints `message` and exits non-zero.
 */
export abstract class PyStyleError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class TargetNotFoundError extends PyStyleError {
  constructor(public readonly target: string) {
    super(`Target path not found: ${target}`);
  }
}

export class SourceReadError extends PyStyleError {
  constructor(public readonly file: string, cause: unknown) {
    super(`Cannot read ${file}: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
  }
}

export class SourceParseError extends PyStyleError {
  constructor(
    public readonly reason: string,
    public readonly line: number,
    public readonly file?: string,
  ) {
    super(file ? `${file}:${line}: ${reason}` : `line ${line}: ${reason}`);
  }

  /** Same error, attributed to a file. */
  inFile(file: string): SourceParseError {
    return new SourceParseError(this.reason, this.line, file);
  }
}

export class ConfigError extends PyStyleError {
  constructor(public readonly source: string, detail: string) {
    super(`Invalid configuration in ${source}: ${detail}`);
  }
}
