/**
 * Error handling for 2DM mesh reading and writing
 *
 * Every fatal condition raised by the format engine is a subclass of
 * {@link MeshError}. Recoverable format issues are not errors; they are
 * reported through the `onWarning` callback of the reader/writer options.
 */

/**
 * Base error class for all mesh-related errors
 */
export class MeshError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "MeshError";
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
 * Invalid reader or writer configuration
 */
export class ValidationError extends MeshError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * File-level structural failure (not a 2DM file, empty file)
 */
export class ReadError extends MeshError {
  constructor(
    message: string,
    public readonly filePath: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "READ_ERROR", lineNumber, context);
    this.name = "ReadError";
  }

  override toString(): string {
    return `${super.toString()}\nFile: ${this.filePath}`;
  }
}

/**
 * A record violates field-count or value-range rules
 */
export class FormatError extends MeshError {
  constructor(message: string, lineNumber?: number, context?: string, code = "FORMAT_ERROR") {
    super(message, code, lineNumber, context);
    this.name = "FormatError";
  }

  /**
   * Attach line information to an error raised without it
   *
   * Grammar functions work on single lines and do not know where the line
   * came from; the reader re-throws through this helper once it does.
   */
  static withLine(error: FormatError, lineNumber: number, line: string): FormatError {
    if (error.lineNumber !== undefined) {
      return error;
    }
    if (error instanceof CardError) {
      return new CardError(error.message, error.card, lineNumber, line);
    }
    return new FormatError(error.message, lineNumber, line);
  }
}

/**
 * Wrong card for the requested entity, or a node count that does not fit the card
 */
export class CardError extends FormatError {
  constructor(
    message: string,
    public readonly card: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, lineNumber, context, "CARD_ERROR");
    this.name = "CardError";
  }

  override toString(): string {
    return `${super.toString()}\nCard: ${this.card}`;
  }
}

/**
 * Writer sequencing violation (header written twice, interleaved entity blocks)
 */
export class WriteError extends MeshError {
  constructor(message: string, context?: string) {
    super(message, "WRITE_ERROR", undefined, context);
    this.name = "WriteError";
  }

  /**
   * Create error for an entity kind written again after another kind was flushed
   */
  static forInterleavedBlocks(kind: string, lastFlushed: string): WriteError {
    return new WriteError(
      `Entities must be written in blocks, not interleaved (found ${kind}-${lastFlushed}-${kind} sequence)`,
      `Last flushed block: ${lastFlushed}`
    );
  }
}

/**
 * Lookup miss on a valid mesh
 */
export class EntityNotFoundError extends MeshError {
  constructor(
    message: string,
    public readonly entityKind: "node" | "element" | "node string",
    public readonly key: number | string
  ) {
    super(message, "NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}

/**
 * Range view bounds outside the mesh
 */
export class IndexRangeError extends MeshError {
  constructor(
    message: string,
    public readonly start: number,
    public readonly end: number
  ) {
    super(message, "INDEX_RANGE_ERROR");
    this.name = "IndexRangeError";
  }
}

/**
 * Operation on a reader or writer that has already been closed
 */
export class FileClosedError extends MeshError {
  constructor(public readonly filePath: string) {
    super(`File is closed: ${filePath}`, "FILE_CLOSED");
    this.name = "FileClosedError";
  }
}

/**
 * File I/O errors with system error context
 */
export class FileError extends MeshError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close",
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
    if (systemError instanceof FileError) {
      return systemError;
    }
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

  /**
   * Get helpful suggestion based on system error
   */
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
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = `${super.toString()}\nFile: ${this.filePath}`;
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Recovery suggestions for common 2DM issues
 */
export const ERROR_SUGGESTIONS = {
  MISSING_MESH2D: 'A 2DM file must start with a "MESH2D" line',
  ZERO_INDEX: "The mesh uses zero-based IDs; open it with { zeroIndex: true }",
  ID_GAPS: "Node and element IDs must be contiguous; renumber the mesh before loading it",
  MATERIAL_COUNT: "Every element needs NUM_MATERIALS_PER_ELEM material values",
  INTERLEAVED: "Write all nodes, then all elements, then all node strings",
  MALFORMED_LINE: "Check the card tag and the number of fields on the line",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: MeshError): string {
  const message = error.message.toLowerCase();

  if (error instanceof ReadError && message.includes("mesh2d")) {
    return ERROR_SUGGESTIONS.MISSING_MESH2D;
  }
  if (message.includes("zero index")) {
    return ERROR_SUGGESTIONS.ZERO_INDEX;
  }
  if (message.includes("holes") || message.includes("contiguous")) {
    return ERROR_SUGGESTIONS.ID_GAPS;
  }
  if (message.includes("material")) {
    return ERROR_SUGGESTIONS.MATERIAL_COUNT;
  }
  if (error instanceof WriteError && message.includes("interleaved")) {
    return ERROR_SUGGESTIONS.INTERLEAVED;
  }

  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}
