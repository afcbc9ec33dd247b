/**
 * Error handling for dialect detection
 *
 * The trial parser and cell classifier never throw; everything here is
 * raised (or returned) by the selector, the configuration layer and the
 * input layer.
 */

/**
 * Base error class for all tabsniff errors
 */
export class SniffError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SniffError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Malformed options, configuration or dialect members
 */
export class ValidationError extends SniffError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Text that is not well-formed Unicode, or bytes that are not UTF-8
 */
export class InvalidInputError extends SniffError {
  constructor(
    message: string,
    public readonly offset?: number,
    context?: string
  ) {
    super(message, "INVALID_INPUT", context);
    this.name = "InvalidInputError";
  }
}

/**
 * Why the selector could not produce a dialect
 */
export type NoDialectReason = "empty-input" | "below-floor" | "timed-out";

/**
 * No candidate cleared the minimum score, or there were no candidates
 */
export class NoDialectFoundError extends SniffError {
  constructor(
    message: string,
    public readonly reason: NoDialectReason,
    public readonly candidatesEvaluated: number,
    context?: string
  ) {
    super(message, "NO_DIALECT_FOUND", context);
    this.name = "NoDialectFoundError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nCandidates evaluated: ${this.candidatesEvaluated}`;
    return msg;
  }
}

/**
 * The caller's overall budget elapsed between two candidates
 */
export class DetectionTimedOutError extends NoDialectFoundError {
  constructor(
    public readonly timeoutMs: number,
    candidatesEvaluated: number,
    public readonly candidatesTotal: number
  ) {
    super(
      `Dialect detection exceeded ${timeoutMs}ms after ${candidatesEvaluated} of ${candidatesTotal} candidates`,
      "timed-out",
      candidatesEvaluated
    );
    this.name = "DetectionTimedOutError";
  }
}

/**
 * Anything the selector can hand back instead of a dialect
 */
export type DetectionFailure = NoDialectFoundError | InvalidInputError;

/**
 * Decompression errors for gzip input
 */
export class CompressionError extends SniffError {
  constructor(
    message: string,
    public readonly format: "gzip",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from a decoder failure
   */
  static fromSystemError(
    format: CompressionError["format"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(errorMessage);

    return new CompressionError(
      `decompress operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("header") || msg.includes("invalid")) {
      return "Input may be corrupted or not actually gzip compressed";
    }
    if (msg.includes("unexpected eof") || msg.includes("truncated")) {
      return "Input appears to be truncated; pass the whole compressed stream";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors with the failing operation and system error attached
 */
export class FileError extends SniffError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
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

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Recovery suggestions for detection failures
 */
export const ERROR_SUGGESTIONS = {
  EMPTY_INPUT: "Input contains no characters to analyse; check the file is not empty",
  BELOW_FLOOR: "No candidate parse looked tabular; retry with a delimiter restriction or fall back to a default dialect",
  TIMED_OUT: "Raise the timeout or lower maxRowSample to bound the work per candidate",
  INVALID_INPUT: "Decode the input as UTF-8 (or transcode it) before detection",
} as const;

/**
 * Get a recovery suggestion for an error raised by detection
 */
export function getErrorSuggestion(error: SniffError): string | undefined {
  if (error instanceof NoDialectFoundError) {
    switch (error.reason) {
      case "empty-input":
        return ERROR_SUGGESTIONS.EMPTY_INPUT;
      case "below-floor":
        return ERROR_SUGGESTIONS.BELOW_FLOOR;
      case "timed-out":
        return ERROR_SUGGESTIONS.TIMED_OUT;
    }
  }
  if (error instanceof InvalidInputError) {
    return ERROR_SUGGESTIONS.INVALID_INPUT;
  }
  return undefined;
}
