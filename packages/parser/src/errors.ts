/**
 * Parser Errors
 */

export type ParseErrorCode = "IO_ERROR" | "INSUFFICIENT_DATA" | "MALFORMED_ROW";

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseErrorCode,
    /** File path, or a label for in-memory input */
    public readonly source: string,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * A file could not be read or listed.
 */
export class IOError extends ParseError {
  constructor(
    source: string,
    message: string,
    /** System error code such as ENOENT, when known */
    public readonly errno?: string,
    cause?: unknown
  ) {
    super(message, "IO_ERROR", source, cause);
    this.name = "IOError";
  }

  static fromCause(source: string, action: string, cause: unknown): IOError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const errno =
      cause instanceof Error && "code" in cause && typeof cause.code === "string"
        ? cause.code
        : undefined;
    return new IOError(source, `Couldn't ${action} ${source}: ${detail}`, errno, cause);
  }
}

/**
 * A file holds fewer lines than a real export ever does.
 */
export class InsufficientDataError extends ParseError {
  constructor(
    source: string,
    public readonly minimumLines: number,
    public readonly lineCount?: number
  ) {
    const found = lineCount === undefined ? "" : ` (found ${lineCount})`;
    super(
      `${source} doesn't contain valid data: expected at least ${minimumLines} lines${found}`,
      "INSUFFICIENT_DATA",
      source
    );
    this.name = "InsufficientDataError";
  }
}

/**
 * A row has no field at a configured column.
 */
export class MalformedRowError extends ParseError {
  constructor(
    source: string,
    /** 1-based line number in the input */
    public readonly lineNumber: number,
    public readonly column: number,
    public readonly fieldCount: number
  ) {
    super(
      `Malformed row at ${source}:${lineNumber}: column ${column} requested but the row has ${fieldCount} field(s)`,
      "MALFORMED_ROW",
      source
    );
    this.name = "MalformedRowError";
  }
}
