import type { BookmarkField } from "./models/types";

export class BookmarkParseError extends Error {
  public readonly kind: "malformed_line" | "empty_field";
  public readonly lineNumber: number;
  public readonly line: string;
  public readonly field: BookmarkField | undefined;

  private constructor(
    kind: "malformed_line" | "empty_field",
    lineNumber: number,
    line: string,
    field: BookmarkField | undefined,
    message: string
  ) {
    super(message);
    this.name = "BookmarkParseError";
    this.kind = kind;
    this.lineNumber = lineNumber;
    this.line = line;
    this.field = field;
  }

  static malformedLine(lineNumber: number, line: string): BookmarkParseError {
    return new BookmarkParseError(
      "malformed_line",
      lineNumber,
      line,
      undefined,
      `Line ${lineNumber} is not a bookmark: ${line}`
    );
  }

  static emptyField(lineNumber: number, line: string, field: BookmarkField): BookmarkParseError {
    return new BookmarkParseError(
      "empty_field",
      lineNumber,
      line,
      field,
      `Line ${lineNumber} has an empty ${field}: ${line}`
    );
  }
}

export class BookmarkValidationError extends Error {
  public readonly kind = "validation";

  constructor(
    public readonly field: BookmarkField,
    reason: string
  ) {
    super(`Invalid ${field}: ${reason}`);
    this.name = "BookmarkValidationError";
  }
}

export class IndexOutOfRangeError extends Error {
  public readonly kind = "index_out_of_range";

  constructor(
    public readonly index: number,
    public readonly size: number
  ) {
    super(`Bookmark index ${index} is out of range (collection has ${size}).`);
    this.name = "IndexOutOfRangeError";
  }
}

export class CollaboratorSpawnError extends Error {
  public readonly kind = "spawn";

  constructor(
    public readonly collaborator: "menu" | "browser",
    public readonly program: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to launch ${collaborator} program "${program}": ${detail}`, { cause });
    this.name = "CollaboratorSpawnError";
  }
}

export class BookmarkFileError extends Error {
  public readonly kind = "file";

  constructor(
    public readonly operation: "read" | "write" | "create",
    public readonly path: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const message =
      operation === "write"
        ? `Bookmark change was applied but NOT saved to ${path}: ${detail}`
        : `Failed to ${operation} bookmark file ${path}: ${detail}`;
    super(message, { cause });
    this.name = "BookmarkFileError";
  }
}

export class SettingsError extends Error {
  public readonly kind = "settings";

  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}
