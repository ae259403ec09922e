/**
 * QPACK error taxonomy.
 *
 * Every QPACK failure desynchronizes the encoder and decoder tables, so
 * callers must close the whole connection with `code`, not just the stream.
 */
import { ErrorCode } from "./constants.js";

export type QpackErrorKind =
  | "INTEGER_OVERFLOW"
  | "HUFFMAN_DECODING_ERROR"
  | "UNKNOWN_INDEX"
  | "CAPACITY_VIOLATION"
  | "INSUFFICIENT_CAPACITY"
  | "TOO_MANY_BLOCKED_STREAMS"
  | "MALFORMED_INSTRUCTION"
  | "MALFORMED_FIELD_SECTION"
  | "FIELD_SECTION_TOO_LARGE";

export class QpackError extends Error {
  readonly kind: QpackErrorKind;
  /** HTTP/3 connection error code to close with */
  readonly code: ErrorCode;

  constructor(
    kind: QpackErrorKind,
    message: string,
    code: ErrorCode = ErrorCode.DECOMPRESSION_FAILED,
    cause?: unknown,
  ) {
    super(message);
    this.name = "QpackError";
    this.kind = kind;
    this.code = code;
    this.cause = cause;
  }

  /**
   * Re-attribute an error to the instruction stream it surfaced on.
   * Non-QPACK errors are wrapped as malformed instructions.
   */
  static onStream(err: unknown, code: ErrorCode): QpackError {
    if (err instanceof QpackError) {
      return err.code === code ? err : new QpackError(err.kind, err.message, code, err);
    }
    const message = err instanceof Error ? err.message : String(err);
    return new QpackError("MALFORMED_INSTRUCTION", message, code, err);
  }
}
