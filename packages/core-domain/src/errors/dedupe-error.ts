export type DedupeErrorCode =
  | "UNREADABLE_FILE"
  | "UNSUPPORTED_FORMAT"
  | "MOVE_FAILED"
  | "INVALID_CONFIGURATION";

export class DedupeError extends Error {
  constructor(
    public readonly code: DedupeErrorCode,
    message: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = "DedupeError";
  }
}

export class UnreadableFileError extends DedupeError {
  constructor(public readonly path: string, message: string, cause?: unknown) {
    super("UNREADABLE_FILE", message, cause);
    this.name = "UnreadableFileError";
  }
}

export class UnsupportedFormatError extends DedupeError {
  constructor(public readonly path: string, message: string) {
    super("UNSUPPORTED_FORMAT", message);
    this.name = "UnsupportedFormatError";
  }
}

export class MoveFailedError extends DedupeError {
  constructor(
    public readonly source: string,
    public readonly destination: string,
    message: string,
    cause?: unknown
  ) {
    super("MOVE_FAILED", message, cause);
    this.name = "MoveFailedError";
  }
}

/** Fatal: raised before any work starts, listing every problem found. */
export class ConfigurationError extends DedupeError {
  constructor(public readonly issues: string[]) {
    super("INVALID_CONFIGURATION", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

export function isDedupeError(err: unknown): err is DedupeError {
  return err instanceof DedupeError;
}
