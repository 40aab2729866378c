/**
 * Error handling for promoter extraction
 *
 * Input contract violations, cross-file inconsistencies and I/O failures are
 * fatal and surface as one of the classes below. Per-record anomalies are
 * routed to a warning handler instead and never reach this hierarchy.
 */

/**
 * Base error class for all promoterkit errors
 */
export class PromoterKitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PromoterKitError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed configuration or values
 */
export class ValidationError extends PromoterKitError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends PromoterKitError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Tabular input errors with column context (BLAST tables, file lists, synonyms)
 */
export class TabularParseError extends ParseError {
  constructor(
    message: string,
    format: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(context ? `${message} (${context})` : message, format, line);
    this.name = "TabularParseError";
  }

  /** The message already carries the position */
  override toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * Sequence-specific validation errors
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Sequence '${sequenceId}': ${message}`, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * Inputs that are individually valid but disagree with each other
 */
export class ConsistencyError extends PromoterKitError {
  constructor(
    message: string,
    public readonly onlyInFirst: readonly string[] = [],
    public readonly onlyInSecond: readonly string[] = [],
    context?: string
  ) {
    super(message, "CONSISTENCY_ERROR", undefined, context);
    this.name = "ConsistencyError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.onlyInFirst.length > 0) {
      msg += `\nOnly in annotation list: ${this.onlyInFirst.join(", ")}`;
    }
    if (this.onlyInSecond.length > 0) {
      msg += `\nOnly in sequence list: ${this.onlyInSecond.join(", ")}`;
    }
    return msg;
  }
}

/**
 * Decompression errors with detailed context
 */
export class CompressionError extends PromoterKitError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("header") || msg.includes("magic")
        ? `File may be corrupted or not actually ${format} compressed`
        : msg.includes("unexpected end") || msg.includes("truncated")
          ? "File appears to be truncated or incomplete"
          : undefined;

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with operation context
 */
export class FileError extends PromoterKitError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open",
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
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
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
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output location";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends PromoterKitError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer overflow while splitting a stream into lines
 */
export class BufferError extends PromoterKitError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Format a caught value for the command line, keeping the class-specific
 * context that `toString()` adds for promoterkit errors
 */
export function formatError(error: unknown): string {
  if (error instanceof PromoterKitError) {
    return error.toString();
  }
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
