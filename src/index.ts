/**
 * qpack-engine: QPACK field compression for HTTP/3 (RFC 9204).
 */

// Encoder / decoder
export { QpackEncoder } from "./qpack/encoder.js";
export type { EncoderHandler, EncoderOptions } from "./qpack/encoder.js";
export { QpackDecoder } from "./qpack/decoder.js";
export type { DecoderHandler, DecoderOptions } from "./qpack/decoder.js";

// Instruction streams
export { EncoderInstructionParser, DecoderInstructionParser } from "./qpack/instruction-parser.js";
export type {
  EncoderInstructionHandler,
  DecoderInstructionHandler,
} from "./qpack/instruction-parser.js";
export { InstructionQueue } from "./qpack/instruction-queue.js";
export {
  encodeInstruction,
  decodeEncoderInstruction,
  decodeDecoderInstruction,
} from "./qpack/instructions.js";
export type {
  Instruction,
  EncoderInstruction,
  DecoderInstruction,
  SetCapacityInstruction,
  InsertWithNameReferenceInstruction,
  InsertWithLiteralNameInstruction,
  DuplicateInstruction,
  SectionAcknowledgmentInstruction,
  StreamCancellationInstruction,
  InsertCountIncrementInstruction,
} from "./qpack/instructions.js";

// Tables
export { DynamicTable } from "./qpack/dynamic-table.js";
export type { Entry } from "./qpack/dynamic-table.js";
export { staticEntry, findStatic, findStaticName } from "./qpack/static-table.js";

// Codecs (advanced usage)
export { encodeInteger, decodeInteger, integerLength } from "./qpack/integer.js";
export type { Decoded } from "./qpack/integer.js";
export { huffmanEncode, huffmanDecode, huffmanEncodedLength } from "./qpack/huffman.js";
export {
  encodeFieldSection,
  decodeFieldSectionPrefix,
  decodeFieldLine,
  encodeRequiredInsertCount,
  decodeRequiredInsertCount,
} from "./qpack/field-lines.js";
export type { FieldLine, FieldSectionPrefix } from "./qpack/field-lines.js";

// Errors and constants
export { QpackError } from "./qpack/errors.js";
export type { QpackErrorKind } from "./qpack/errors.js";
export {
  ErrorCode,
  DEFAULT_MAX_TABLE_CAPACITY,
  DEFAULT_BLOCKED_STREAMS,
  OPTIMIZED_MAX_TABLE_CAPACITY,
  OPTIMIZED_BLOCKED_STREAMS,
  DEFAULT_MAX_FIELD_SECTION_SIZE,
} from "./qpack/constants.js";
export type { HeaderField } from "./qpack/types.js";
