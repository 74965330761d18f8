/**
 * Error handling for delimited-text scanning, sniffing and writing
 *
 * Every error raised by the toolkit derives from {@link DsvError}, which
 * carries a machine-readable code and, where known, the byte offset in the
 * input at which the problem was detected.
 */

/**
 * Base error class for all dsvkit errors
 */
export class DsvError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly offset?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "DsvError";
  }

  /**
   * Render the error with its offset and context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.offset !== undefined) {
      msg += ` (offset ${this.offset})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid or conflicting options, raised by constructors before any read
 */
export class ConfigurationError extends DsvError {
  constructor(
    message: string,
    public readonly component: "scanner" | "sniffer" | "writer" | "file",
    context?: string
  ) {
    super(message, "CONFIGURATION_ERROR", undefined, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Failure of the underlying byte source
 *
 * Once a scanner has recorded one of these it stays failed: every later
 * `scan()` returns false and `error` keeps returning the same instance.
 */
export class SourceReadError extends DsvError {
  constructor(
    message: string,
    offset?: number,
    public override readonly cause?: unknown
  ) {
    super(message, "SOURCE_READ_ERROR", offset);
    this.name = "SourceReadError";
  }

  /**
   * Wrap whatever a source threw
   */
  static fromCause(cause: unknown, offset?: number): SourceReadError {
    if (cause instanceof SourceReadError) {
      return cause;
    }
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SourceReadError(`read failed: ${reason}`, offset, cause);
  }
}

/**
 * A single piece (bytes up to the next separator or line break) outgrew the
 * splitter's limit
 */
export class PieceTooLongError extends SourceReadError {
  constructor(
    public readonly pieceLength: number,
    public readonly maxPieceSize: number,
    offset?: number
  ) {
    super(`piece of ${pieceLength} bytes exceeds maximum of ${maxPieceSize} bytes`, offset);
    this.name = "PieceTooLongError";
  }
}

/**
 * Failure of the sink a writer flushes to
 */
export class WriteError extends DsvError {
  constructor(
    message: string,
    public override readonly cause?: unknown
  ) {
    super(message, "WRITE_ERROR");
    this.name = "WriteError";
  }
}

/**
 * File I/O errors with the failed operation and the underlying system error
 */
export class FileError extends DsvError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}
