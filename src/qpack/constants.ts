/**
 * QPACK protocol constants (RFC 9204).
 */

/** Per-entry overhead added to name and value lengths (RFC 9204 Section 3.2.1) */
export const ENTRY_OVERHEAD = 32;

/** Number of entries in the static table (RFC 9204 Appendix A) */
export const STATIC_TABLE_SIZE = 99;

/** HTTP/3 error codes for QPACK failures (RFC 9204 Section 6) */
export const enum ErrorCode {
  DECOMPRESSION_FAILED = 0x200,
  ENCODER_STREAM_ERROR = 0x201,
  DECODER_STREAM_ERROR = 0x202,
}

/** Leading bit patterns of encoder instructions (RFC 9204 Section 4.3) */
export const EncoderInstructionFlags = {
  INSERT_WITH_NAME_REFERENCE: 0x80,
  INSERT_WITH_NAME_REFERENCE_STATIC: 0x40,
  INSERT_WITH_LITERAL_NAME: 0x40,
  SET_CAPACITY: 0x20,
  DUPLICATE: 0x00,
} as const;

/** Leading bit patterns of decoder instructions (RFC 9204 Section 4.4) */
export const DecoderInstructionFlags = {
  SECTION_ACKNOWLEDGMENT: 0x80,
  STREAM_CANCELLATION: 0x40,
  INSERT_COUNT_INCREMENT: 0x00,
} as const;

/** Leading bit patterns of field line representations (RFC 9204 Section 4.5) */
export const FieldLineFlags = {
  INDEXED: 0x80,
  INDEXED_STATIC: 0x40,
  LITERAL_NAME_REFERENCE: 0x40,
  LITERAL_NAME_REFERENCE_NEVER_INDEX: 0x20,
  LITERAL_NAME_REFERENCE_STATIC: 0x10,
  LITERAL_LITERAL_NAME: 0x20,
  LITERAL_LITERAL_NAME_NEVER_INDEX: 0x10,
  INDEXED_POST_BASE: 0x10,
  LITERAL_POST_BASE_NAME_REFERENCE: 0x00,
  LITERAL_POST_BASE_NEVER_INDEX: 0x08,
  DELTA_BASE_SIGN: 0x80,
} as const;

/** SETTINGS defaults (RFC 9204 Section 5) */
export const DEFAULT_MAX_TABLE_CAPACITY = 0;
export const DEFAULT_BLOCKED_STREAMS = 0;

/** Dynamic table capacity advertised and assumed by this library (4 KB) */
export const OPTIMIZED_MAX_TABLE_CAPACITY = 4096;

/** Streams allowed to block on the decoder at once */
export const OPTIMIZED_BLOCKED_STREAMS = 16;

/** Limit on a decoded field section, summed as entry sizes (80 KB) */
export const DEFAULT_MAX_FIELD_SECTION_SIZE = 81920;

/** Upper bound on string literals carried by encoder instructions (64 KB) */
export const DEFAULT_MAX_INSTRUCTION_STRING_LENGTH = 65536;

/** Share of the capacity kept free at the old end of the table for eviction */
export const DRAINING_RATIO = 0.25;
