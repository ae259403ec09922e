/**
 * QPACK encoder and decoder stream instructions (RFC 9204 Sections 4.3, 4.4).
 *
 * Encoder stream:
 *   001xxxxx  Set Dynamic Table Capacity   capacity (5+)
 *   1Txxxxxx  Insert With Name Reference   name index (6+), value (H, 7+)
 *   01Hxxxxx  Insert With Literal Name     name (5+), value (H, 7+)
 *   000xxxxx  Duplicate                    relative index (5+)
 *
 * Decoder stream:
 *   1xxxxxxx  Section Acknowledgment       stream id (7+)
 *   01xxxxxx  Stream Cancellation          stream id (6+)
 *   00xxxxxx  Insert Count Increment       increment (6+)
 */
import { Buffer } from "node:buffer";
import { EncoderInstructionFlags, DecoderInstructionFlags } from "./constants.js";
import { encodeInteger, decodeInteger, type Decoded } from "./integer.js";
import { encodeStringLiteral, decodeStringLiteral } from "./string-literal.js";
import { QpackError } from "./errors.js";

export interface SetCapacityInstruction {
  type: "set-capacity";
  capacity: number;
}

export interface InsertWithNameReferenceInstruction {
  type: "insert-with-name-reference";
  isStatic: boolean;
  /** Static table index, or dynamic index relative to the insert count */
  index: number;
  value: string;
}

export interface InsertWithLiteralNameInstruction {
  type: "insert-with-literal-name";
  name: string;
  value: string;
}

export interface DuplicateInstruction {
  type: "duplicate";
  /** Dynamic index relative to the insert count */
  index: number;
}

export interface SectionAcknowledgmentInstruction {
  type: "section-acknowledgment";
  streamId: number;
}

export interface StreamCancellationInstruction {
  type: "stream-cancellation";
  streamId: number;
}

export interface InsertCountIncrementInstruction {
  type: "insert-count-increment";
  increment: number;
}

/** Instructions sent by the encoder, applied to the decoder's table */
export type EncoderInstruction =
  | SetCapacityInstruction
  | InsertWithNameReferenceInstruction
  | InsertWithLiteralNameInstruction
  | DuplicateInstruction;

/** Instructions sent by the decoder, consumed by the encoder */
export type DecoderInstruction =
  | SectionAcknowledgmentInstruction
  | StreamCancellationInstruction
  | InsertCountIncrementInstruction;

export type Instruction = EncoderInstruction | DecoderInstruction;

/** Encode an instruction into its wire format */
export function encodeInstruction(instruction: Instruction, huffman = false): Buffer {
  const out: number[] = [];

  switch (instruction.type) {
    case "set-capacity":
      encodeInteger(out, EncoderInstructionFlags.SET_CAPACITY, 5, instruction.capacity);
      break;
    case "insert-with-name-reference": {
      const flags = instruction.isStatic
        ? EncoderInstructionFlags.INSERT_WITH_NAME_REFERENCE |
          EncoderInstructionFlags.INSERT_WITH_NAME_REFERENCE_STATIC
        : EncoderInstructionFlags.INSERT_WITH_NAME_REFERENCE;
      encodeInteger(out, flags, 6, instruction.index);
      encodeStringLiteral(out, 0, 7, instruction.value, huffman);
      break;
    }
    case "insert-with-literal-name":
      encodeStringLiteral(
        out,
        EncoderInstructionFlags.INSERT_WITH_LITERAL_NAME,
        5,
        instruction.name,
        huffman,
      );
      encodeStringLiteral(out, 0, 7, instruction.value, huffman);
      break;
    case "duplicate":
      encodeInteger(out, EncoderInstructionFlags.DUPLICATE, 5, instruction.index);
      break;
    case "section-acknowledgment":
      encodeInteger(out, DecoderInstructionFlags.SECTION_ACKNOWLEDGMENT, 7, instruction.streamId);
      break;
    case "stream-cancellation":
      encodeInteger(out, DecoderInstructionFlags.STREAM_CANCELLATION, 6, instruction.streamId);
      break;
    case "insert-count-increment":
      encodeInteger(
        out,
        DecoderInstructionFlags.INSERT_COUNT_INCREMENT,
        6,
        instruction.increment,
      );
      break;
    default: {
      const unknown: never = instruction;
      throw new Error(`Unknown instruction: ${JSON.stringify(unknown)}`);
    }
  }

  return Buffer.from(out);
}

/**
 * Decode one encoder instruction starting at `offset`.
 * Returns null if the buffer ends before the instruction does.
 */
export function decodeEncoderInstruction(
  buf: Uint8Array,
  offset: number,
  maxStringLength: number,
): Decoded<EncoderInstruction> | null {
  if (offset >= buf.length) return null;
  const first = buf[offset];

  if (first & EncoderInstructionFlags.INSERT_WITH_NAME_REFERENCE) {
    const index = decodeInteger(buf, offset, 6);
    if (!index) return null;
    const value = decodeStringLiteral(
      buf,
      index.offset,
      7,
      maxStringLength,
      "INSUFFICIENT_CAPACITY",
    );
    if (!value) return null;
    return {
      value: {
        type: "insert-with-name-reference",
        isStatic: (first & EncoderInstructionFlags.INSERT_WITH_NAME_REFERENCE_STATIC) !== 0,
        index: index.value,
        value: value.value,
      },
      offset: value.offset,
    };
  }

  if (first & EncoderInstructionFlags.INSERT_WITH_LITERAL_NAME) {
    const name = decodeStringLiteral(buf, offset, 5, maxStringLength, "INSUFFICIENT_CAPACITY");
    if (!name) return null;
    const value = decodeStringLiteral(
      buf,
      name.offset,
      7,
      maxStringLength,
      "INSUFFICIENT_CAPACITY",
    );
    if (!value) return null;
    return {
      value: { type: "insert-with-literal-name", name: name.value, value: value.value },
      offset: value.offset,
    };
  }

  const operand = decodeInteger(buf, offset, 5);
  if (!operand) return null;
  if (first & EncoderInstructionFlags.SET_CAPACITY) {
    return { value: { type: "set-capacity", capacity: operand.value }, offset: operand.offset };
  }
  return { value: { type: "duplicate", index: operand.value }, offset: operand.offset };
}

/**
 * Decode one decoder instruction starting at `offset`.
 * Returns null if the buffer ends before the instruction does.
 */
export function decodeDecoderInstruction(
  buf: Uint8Array,
  offset: number,
): Decoded<DecoderInstruction> | null {
  if (offset >= buf.length) return null;
  const first = buf[offset];

  if (first & DecoderInstructionFlags.SECTION_ACKNOWLEDGMENT) {
    const streamId = decodeInteger(buf, offset, 7);
    if (!streamId) return null;
    return {
      value: { type: "section-acknowledgment", streamId: streamId.value },
      offset: streamId.offset,
    };
  }

  const operand = decodeInteger(buf, offset, 6);
  if (!operand) return null;

  if (first & DecoderInstructionFlags.STREAM_CANCELLATION) {
    return {
      value: { type: "stream-cancellation", streamId: operand.value },
      offset: operand.offset,
    };
  }

  if (operand.value === 0) {
    throw new QpackError("MALFORMED_INSTRUCTION", "Insert Count Increment of zero");
  }
  return {
    value: { type: "insert-count-increment", increment: operand.value },
    offset: operand.offset,
  };
}
