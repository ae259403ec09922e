/**
 * Prefixed integer codec (RFC 7541 Section 5.1, reused by RFC 9204 Section 4.1.1).
 *
 *     0   1   2   3   4   5   6   7
 *   +---+---+---+---+---+---+---+---+
 *   | ? | ? | ? |       Value       |   N-bit prefix
 *   +---+---+---+-------------------+
 *   | 1 |    Value-(2^N-1) LSB      |   continuation octets,
 *   +---+---------------------------+   7 bits each, least
 *   | 0 |    Value-(2^N-1) MSB      |   significant first
 *   +---+---------------------------+
 */
import { QpackError } from "./errors.js";

/** Largest integer the decoder accepts */
export const MAX_INTEGER = Number.MAX_SAFE_INTEGER;

/** Continuation octets needed for MAX_INTEGER; more is always an overflow */
const MAX_CONTINUATION_OCTETS = 8;

export interface Decoded<T> {
  value: T;
  /** Offset in the buffer immediately after the decoded item */
  offset: number;
}

function checkPrefix(prefixBits: number): void {
  if (!Number.isInteger(prefixBits) || prefixBits < 1 || prefixBits > 8) {
    throw new RangeError(`Invalid integer prefix size: ${prefixBits}`);
  }
}

/**
 * Append a prefixed integer to `out`. `flags` supplies the bits above the
 * prefix in the first octet.
 */
export function encodeInteger(
  out: number[],
  flags: number,
  prefixBits: number,
  value: number,
): void {
  checkPrefix(prefixBits);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot encode integer: ${value}`);
  }

  const max = (1 << prefixBits) - 1;
  const high = flags & ~max & 0xff;
  if (value < max) {
    out.push(high | value);
    return;
  }

  out.push(high | max);
  let rest = value - max;
  while (rest >= 0x80) {
    out.push((rest % 0x80) | 0x80);
    rest = Math.floor(rest / 0x80);
  }
  out.push(rest);
}

/** Number of octets encodeInteger() writes for `value` */
export function integerLength(prefixBits: number, value: number): number {
  checkPrefix(prefixBits);
  const max = (1 << prefixBits) - 1;
  if (value < max) return 1;
  let length = 2;
  for (let rest = value - max; rest >= 0x80; rest = Math.floor(rest / 0x80)) {
    length++;
  }
  return length;
}

/**
 * Decode a prefixed integer starting at `offset`.
 * Returns null if the buffer ends before the integer does.
 */
export function decodeInteger(
  buf: Uint8Array,
  offset: number,
  prefixBits: number,
): Decoded<number> | null {
  checkPrefix(prefixBits);
  if (offset >= buf.length) return null;

  const max = (1 << prefixBits) - 1;
  let value = buf[offset] & max;
  let pos = offset + 1;
  if (value < max) {
    return { value, offset: pos };
  }

  let multiplier = 1;
  for (let octets = 0; ; octets++) {
    if (octets === MAX_CONTINUATION_OCTETS) {
      throw new QpackError("INTEGER_OVERFLOW", "Prefixed integer has too many continuation octets");
    }
    if (pos >= buf.length) return null;

    const b = buf[pos++];
    value += (b & 0x7f) * multiplier;
    if (value > MAX_INTEGER) {
      throw new QpackError("INTEGER_OVERFLOW", `Prefixed integer exceeds ${MAX_INTEGER}`);
    }
    if ((b & 0x80) === 0) {
      return { value, offset: pos };
    }
    multiplier *= 0x80;
  }
}
