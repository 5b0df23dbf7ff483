/**
 * Error handling for file access primitives
 *
 * Every failure surfaced by this package is a FastFileError subclass with a
 * stable `code`, so callers can branch on `instanceof` or on the code string.
 * Two of them are sentinels meant to be checked rather than reported:
 * FileNotFoundError and FileEmptyError.
 */

/**
 * Base error class for all fastfile errors
 */
export class FastFileError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FastFileError";
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid arguments or option objects
 */
export class ValidationError extends FastFileError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Path syntax errors, always raised before touching the filesystem
 */
export class PathError extends FastFileError {
  constructor(
    message: string,
    public readonly attemptedPath: string
  ) {
    super(message, "PATH_ERROR", `Attempted path: "${attemptedPath}"`);
    this.name = "PathError";
  }
}

/**
 * Write mode other than APPEND or OVERWRITE
 */
export class WriteModeError extends FastFileError {
  constructor(public readonly mode: string) {
    super(`Not supported mode: ${mode}. Only APPEND and OVERWRITE are supported`, "WRITE_MODE_ERROR");
    this.name = "WriteModeError";
  }
}

/**
 * Operations a FileError can be attributed to
 */
export type FileOperation = "read" | "write" | "stat" | "open" | "close" | "seek" | "mkdir";

/**
 * Message of an Error or of any error-like object with a string `message`
 * (platform errors are not Error instances)
 */
function describeSystemError(systemError: unknown): string {
  if (systemError instanceof Error) return systemError.message;
  if (
    typeof systemError === "object" &&
    systemError !== null &&
    "message" in systemError &&
    typeof systemError.message === "string"
  ) {
    return systemError.message;
  }
  return String(systemError);
}

/**
 * File I/O errors carrying the path, the operation and the system error
 */
export class FileError extends FastFileError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: FileOperation,
    public readonly systemError?: unknown,
    context?: string,
    code = "FILE_ERROR"
  ) {
    super(message, code, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileOperation,
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = describeSystemError(systemError);
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
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nPath: ${this.filePath}`;
    msg += `\nOperation: ${this.operation}`;

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * The file does not exist although the operation requires it to
 */
export class FileNotFoundError extends FileError {
  constructor(filePath: string, operation: FileOperation = "stat", systemError?: unknown) {
    super(
      `File does not exist: ${filePath}`,
      filePath,
      operation,
      systemError,
      undefined,
      "FILE_NOT_FOUND"
    );
    this.name = "FileNotFoundError";
  }
}

/**
 * A line load produced zero lines and the caller asked for this to be an error
 *
 * @example
 * ```typescript
 * try {
 *   lines = await fastLoadLines("cache.txt", false, true);
 * } catch (error) {
 *   if (isFileEmpty(error) || isFileNotFound(error)) {
 *     lines = await rebuildCache();
 *   } else {
 *     throw error;
 *   }
 * }
 * ```
 */
export class FileEmptyError extends FastFileError {
  constructor(public readonly filePath: string) {
    super(`File empty: ${filePath}`, "FILE_EMPTY");
    this.name = "FileEmptyError";
  }
}

/**
 * One chunk that could not be read
 */
export interface ChunkFailure {
  readonly index: number;
  readonly startOffset: number;
  readonly requestedLength: number;
  readonly cause: unknown;
}

/**
 * Aggregate of every chunk read that failed during one parallel read
 *
 * `failures` is ordered by chunk index regardless of completion order.
 */
export class ChunkReadError extends FastFileError {
  public readonly failures: readonly ChunkFailure[];

  constructor(failures: readonly ChunkFailure[], public readonly chunkCount: number) {
    const sorted = [...failures].sort((a, b) => a.index - b.index);
    super(
      `${sorted.length} of ${chunkCount} chunk reads failed: ${sorted.map(describeFailure).join("; ")}`,
      "CHUNK_READ_ERROR"
    );
    this.name = "ChunkReadError";
    this.failures = sorted;
  }

  override toString(): string {
    let msg = super.toString();
    for (const failure of this.failures) {
      msg += `\n  chunk ${failure.index}: bytes ${failure.startOffset}..${failure.startOffset + failure.requestedLength}`;
    }
    return msg;
  }
}

function describeFailure(failure: ChunkFailure): string {
  const message = failure.cause instanceof Error ? failure.cause.message : String(failure.cause);
  return `chunk ${failure.index} at offset ${failure.startOffset}: ${message}`;
}

/**
 * Reassembled data does not match what was planned
 */
export class AssemblyError extends FastFileError {
  constructor(
    message: string,
    public readonly expectedBytes: number,
    public readonly actualBytes: number,
    context?: string
  ) {
    super(message, "ASSEMBLY_ERROR", context);
    this.name = "AssemblyError";
  }

  static forSizeMismatch(expectedBytes: number, actualBytes: number): AssemblyError {
    return new AssemblyError(
      `File size error: expected [${expectedBytes}], got [${actualBytes}] bytes`,
      expectedBytes,
      actualBytes,
      "The file changed size while it was being read, or a chunk read returned fewer bytes than planned"
    );
  }

  static forMissingChunk(index: number, expectedBytes: number, actualBytes: number): AssemblyError {
    return new AssemblyError(
      `Chunk ${index} is missing or duplicated in read results`,
      expectedBytes,
      actualBytes
    );
  }
}

/**
 * Write offset beyond the current end of file
 */
export class GapError extends FastFileError {
  constructor(
    public readonly filePath: string,
    public readonly fromByte: number,
    public readonly fileSize: number
  ) {
    super(
      `Gap not allowed: offset ${fromByte} is beyond end of file (${fileSize} bytes)`,
      "GAP_ERROR",
      `Path: ${filePath}`
    );
    this.name = "GapError";
  }
}

export function isFileNotFound(error: unknown): error is FileNotFoundError {
  return error instanceof FileNotFoundError;
}

export function isFileEmpty(error: unknown): error is FileEmptyError {
  return error instanceof FileEmptyError;
}
