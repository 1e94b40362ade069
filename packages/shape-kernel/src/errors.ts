export type ShapeParseErrorCode =
  | "MALFORMED_JSON"
  | "INVALID_DOCUMENT"
  | "INVALID_RECORD"
  | "UNKNOWN_TYPE"
  | "BAD_ARITY"
  | "INVALID_GEOMETRY";

export class ShapeParseError extends Error {
  override readonly name = "ShapeParseError";

  constructor(
    readonly code: ShapeParseErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type DocumentIOErrorCode = "READ_FAILED" | "WRITE_FAILED";

export class DocumentIOError extends Error {
  override readonly name = "DocumentIOError";

  constructor(
    readonly code: DocumentIOErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class InvalidGeometryError extends Error {
  override readonly name = "InvalidGeometryError";
  readonly code = "INVALID_GEOMETRY";
}

/** A color or stroke width the model cannot hold. */
export class InvalidStyleError extends Error {
  override readonly name = "InvalidStyleError";
  readonly code = "INVALID_STYLE";
}

export type EditorError = ShapeParseError | DocumentIOError | InvalidGeometryError | InvalidStyleError;

export function isEditorError(error: unknown): error is EditorError {
  return (
    error instanceof ShapeParseError ||
    error instanceof DocumentIOError ||
    error instanceof InvalidGeometryError ||
    error instanceof InvalidStyleError
  );
}
