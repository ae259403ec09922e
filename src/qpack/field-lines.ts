/**
 * Encoded field sections (RFC 9204 Section 4.5).
 *
 * Field section layout:
 *   +---+---+---+---+---+---+---+---+
 *   |   Required Insert Count (8+)  |
 *   +---+---------------------------+
 *   | S |      Delta Base (7+)      |
 *   +---+---------------------------+
 *   |      Encoded Field Lines     ...
 *   +-------------------------------+
 *
 * Field lines:
 *   1Txxxxxx  Indexed                              index (6+)
 *   0001xxxx  Indexed, post-base                   index (4+)
 *   01NTxxxx  Literal, name reference              index (4+), value (H, 7+)
 *   0000Nxxx  Literal, post-base name reference    index (3+), value (H, 7+)
 *   001NHxxx  Literal, literal name                name (3+), value (H, 7+)
 *
 * Dynamic references are stored here as absolute indices; relative and
 * post-base forms only exist on the wire.
 */
import { Buffer } from "node:buffer";
import { FieldLineFlags } from "./constants.js";
import { encodeInteger, decodeInteger, type Decoded } from "./integer.js";
import { encodeStringLiteral, decodeStringLiteral } from "./string-literal.js";
import { QpackError } from "./errors.js";

export interface FieldSectionPrefix {
  requiredInsertCount: number;
  base: number;
}

export interface IndexedFieldLine {
  type: "indexed";
  isStatic: boolean;
  /** Static index, or absolute dynamic index */
  index: number;
}

export interface NameReferenceFieldLine {
  type: "name-reference";
  isStatic: boolean;
  /** Static index, or absolute dynamic index */
  index: number;
  value: string;
  neverIndex: boolean;
}

export interface LiteralFieldLine {
  type: "literal";
  name: string;
  value: string;
  neverIndex: boolean;
}

export type FieldLine = IndexedFieldLine | NameReferenceFieldLine | LiteralFieldLine;

/** Encode a Required Insert Count for the wire (RFC 9204 Section 4.5.1.1) */
export function encodeRequiredInsertCount(requiredInsertCount: number, maxEntries: number): number {
  if (requiredInsertCount === 0) return 0;
  if (maxEntries === 0) {
    throw new Error("Dynamic references require a non-zero maximum table capacity");
  }
  return (requiredInsertCount % (2 * maxEntries)) + 1;
}

/** Recover a Required Insert Count from its wire value (RFC 9204 Section 4.5.1.1) */
export function decodeRequiredInsertCount(
  encoded: number,
  maxEntries: number,
  totalInserts: number,
): number {
  if (encoded === 0) return 0;

  const fullRange = 2 * maxEntries;
  if (encoded > fullRange) {
    throw new QpackError(
      "MALFORMED_FIELD_SECTION",
      `Encoded Required Insert Count ${encoded} exceeds ${fullRange}`,
    );
  }

  const maxValue = totalInserts + maxEntries;
  const maxWrapped = Math.floor(maxValue / fullRange) * fullRange;
  let requiredInsertCount = maxWrapped + encoded - 1;

  if (requiredInsertCount > maxValue) {
    if (requiredInsertCount <= fullRange) {
      throw new QpackError(
        "MALFORMED_FIELD_SECTION",
        `Encoded Required Insert Count ${encoded} is out of range`,
      );
    }
    requiredInsertCount -= fullRange;
  }

  if (requiredInsertCount === 0) {
    throw new QpackError("MALFORMED_FIELD_SECTION", "Required Insert Count wrapped to zero");
  }
  return requiredInsertCount;
}

/** Encode a complete field section */
export function encodeFieldSection(
  prefix: FieldSectionPrefix,
  lines: FieldLine[],
  maxEntries: number,
  huffman: boolean,
): Buffer {
  const out: number[] = [];
  const { requiredInsertCount, base } = prefix;

  encodeInteger(out, 0, 8, encodeRequiredInsertCount(requiredInsertCount, maxEntries));
  if (requiredInsertCount === 0) {
    encodeInteger(out, 0, 7, 0);
  } else if (base >= requiredInsertCount) {
    encodeInteger(out, 0, 7, base - requiredInsertCount);
  } else {
    encodeInteger(out, FieldLineFlags.DELTA_BASE_SIGN, 7, requiredInsertCount - base - 1);
  }

  for (const line of lines) {
    encodeFieldLine(out, line, base, huffman);
  }
  return Buffer.from(out);
}

function encodeFieldLine(out: number[], line: FieldLine, base: number, huffman: boolean): void {
  switch (line.type) {
    case "indexed":
      if (line.isStatic) {
        encodeInteger(out, FieldLineFlags.INDEXED | FieldLineFlags.INDEXED_STATIC, 6, line.index);
      } else if (line.index < base) {
        encodeInteger(out, FieldLineFlags.INDEXED, 6, base - 1 - line.index);
      } else {
        encodeInteger(out, FieldLineFlags.INDEXED_POST_BASE, 4, line.index - base);
      }
      return;

    case "name-reference": {
      const neverIndexBit = line.neverIndex ? FieldLineFlags.LITERAL_NAME_REFERENCE_NEVER_INDEX : 0;
      if (line.isStatic) {
        encodeInteger(
          out,
          FieldLineFlags.LITERAL_NAME_REFERENCE | neverIndexBit | FieldLineFlags.LITERAL_NAME_REFERENCE_STATIC,
          4,
          line.index,
        );
      } else if (line.index < base) {
        encodeInteger(out, FieldLineFlags.LITERAL_NAME_REFERENCE | neverIndexBit, 4, base - 1 - line.index);
      } else {
        const postBaseNever = line.neverIndex ? FieldLineFlags.LITERAL_POST_BASE_NEVER_INDEX : 0;
        encodeInteger(
          out,
          FieldLineFlags.LITERAL_POST_BASE_NAME_REFERENCE | postBaseNever,
          3,
          line.index - base,
        );
      }
      encodeStringLiteral(out, 0, 7, line.value, huffman);
      return;
    }

    case "literal": {
      const neverIndexBit = line.neverIndex ? FieldLineFlags.LITERAL_LITERAL_NAME_NEVER_INDEX : 0;
      encodeStringLiteral(out, FieldLineFlags.LITERAL_LITERAL_NAME | neverIndexBit, 3, line.name, huffman);
      encodeStringLiteral(out, 0, 7, line.value, huffman);
      return;
    }

    default: {
      const unknown: never = line;
      throw new Error(`Unknown field line: ${JSON.stringify(unknown)}`);
    }
  }
}

function truncated(): QpackError {
  return new QpackError("MALFORMED_FIELD_SECTION", "Field section ends inside a field line");
}

function integerAt(buf: Uint8Array, offset: number, prefixBits: number): Decoded<number> {
  const decoded = decodeInteger(buf, offset, prefixBits);
  if (!decoded) throw truncated();
  return decoded;
}

function stringAt(
  buf: Uint8Array,
  offset: number,
  prefixBits: number,
  maxLength: number,
): Decoded<string> {
  const decoded = decodeStringLiteral(buf, offset, prefixBits, maxLength, "FIELD_SECTION_TOO_LARGE");
  if (!decoded) throw truncated();
  return decoded;
}

/** Absolute index of a base-relative reference */
function relativeToAbsolute(base: number, relative: number): number {
  const index = base - 1 - relative;
  if (index < 0) {
    throw new QpackError(
      "UNKNOWN_INDEX",
      `Relative index ${relative} reaches below the table (base ${base})`,
    );
  }
  return index;
}

/** Parse the Required Insert Count and Base at the start of a field section */
export function decodeFieldSectionPrefix(
  buf: Uint8Array,
  maxEntries: number,
  totalInserts: number,
): Decoded<FieldSectionPrefix> {
  const encoded = integerAt(buf, 0, 8);
  const requiredInsertCount = decodeRequiredInsertCount(encoded.value, maxEntries, totalInserts);

  if (encoded.offset >= buf.length) throw truncated();
  const negative = (buf[encoded.offset] & FieldLineFlags.DELTA_BASE_SIGN) !== 0;
  const delta = integerAt(buf, encoded.offset, 7);

  let base: number;
  if (negative) {
    if (delta.value >= requiredInsertCount) {
      throw new QpackError(
        "MALFORMED_FIELD_SECTION",
        `Negative Delta Base ${delta.value} with Required Insert Count ${requiredInsertCount}`,
      );
    }
    base = requiredInsertCount - delta.value - 1;
  } else {
    base = requiredInsertCount + delta.value;
  }

  return { value: { requiredInsertCount, base }, offset: delta.offset };
}

/**
 * Parse one field line starting at `offset`. Strings longer than
 * `maxLength` fail with FIELD_SECTION_TOO_LARGE.
 */
export function decodeFieldLine(
  buf: Uint8Array,
  offset: number,
  base: number,
  maxLength: number,
): Decoded<FieldLine> {
  const first = buf[offset];

  if (first & FieldLineFlags.INDEXED) {
    const isStatic = (first & FieldLineFlags.INDEXED_STATIC) !== 0;
    const index = integerAt(buf, offset, 6);
    return {
      value: {
        type: "indexed",
        isStatic,
        index: isStatic ? index.value : relativeToAbsolute(base, index.value),
      },
      offset: index.offset,
    };
  }

  if (first & FieldLineFlags.LITERAL_NAME_REFERENCE) {
    const isStatic = (first & FieldLineFlags.LITERAL_NAME_REFERENCE_STATIC) !== 0;
    const index = integerAt(buf, offset, 4);
    const value = stringAt(buf, index.offset, 7, maxLength);
    return {
      value: {
        type: "name-reference",
        isStatic,
        index: isStatic ? index.value : relativeToAbsolute(base, index.value),
        value: value.value,
        neverIndex: (first & FieldLineFlags.LITERAL_NAME_REFERENCE_NEVER_INDEX) !== 0,
      },
      offset: value.offset,
    };
  }

  if (first & FieldLineFlags.LITERAL_LITERAL_NAME) {
    const name = stringAt(buf, offset, 3, maxLength);
    const value = stringAt(buf, name.offset, 7, maxLength);
    return {
      value: {
        type: "literal",
        name: name.value,
        value: value.value,
        neverIndex: (first & FieldLineFlags.LITERAL_LITERAL_NAME_NEVER_INDEX) !== 0,
      },
      offset: value.offset,
    };
  }

  if (first & FieldLineFlags.INDEXED_POST_BASE) {
    const index = integerAt(buf, offset, 4);
    return {
      value: { type: "indexed", isStatic: false, index: base + index.value },
      offset: index.offset,
    };
  }

  const index = integerAt(buf, offset, 3);
  const value = stringAt(buf, index.offset, 7, maxLength);
  return {
    value: {
      type: "name-reference",
      isStatic: false,
      index: base + index.value,
      value: value.value,
      neverIndex: (first & FieldLineFlags.LITERAL_POST_BASE_NEVER_INDEX) !== 0,
    },
    offset: value.offset,
  };
}
