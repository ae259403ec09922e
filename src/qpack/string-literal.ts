/**
 * String literals (RFC 9204 Section 4.1.2).
 *
 *   +---+---+---+---+---+---+---+---+
 *   | ? | ? | H |     Length (N+)   |
 *   +---+---+---+-------------------+
 *   |  String Data (Length octets)  |
 *   +-------------------------------+
 *
 * H sits immediately above the N-bit length prefix.
 */
import { Buffer } from "node:buffer";
import hpack from "hpack.js";
import { decodeInteger, type Decoded } from "./integer.js";
import { huffmanDecode, huffmanEncodedLength } from "./huffman.js";
import { QpackError, type QpackErrorKind } from "./errors.js";

/** Length of a field name or value in octets, as counted by entry sizes */
export function octetLength(value: string): number {
  return Buffer.byteLength(value, "utf8");
}

/**
 * Append a string literal. With `huffman` set, the Huffman form is used
 * only when it is shorter than the raw octets.
 *
 * hpack.js writes H and the length into whatever bits remain in the
 * current octet, so the bits of `flags` above H go out first.
 */
export function encodeStringLiteral(
  out: number[],
  flags: number,
  prefixBits: number,
  value: string,
  huffman: boolean,
): void {
  const raw = Buffer.from(value, "utf8");
  const useHuffman = huffman && huffmanEncodedLength(raw) < raw.length;

  const enc = hpack.encoder.create();
  const highBits = 7 - prefixBits;
  if (highBits > 0) {
    enc.encodeBits(flags >> (prefixBits + 1), highBits);
  }
  enc.encodeStr(Array.from(raw), useHuffman);

  for (const chunk of enc.render()) {
    for (const b of chunk) {
      out.push(b);
    }
  }
}

/**
 * Decode a string literal starting at `offset`.
 * Returns null if the buffer ends before the literal does.
 * A declared length above `maxLength` fails with `overLimit`.
 */
export function decodeStringLiteral(
  buf: Uint8Array,
  offset: number,
  prefixBits: number,
  maxLength: number,
  overLimit: QpackErrorKind,
): Decoded<string> | null {
  const length = decodeInteger(buf, offset, prefixBits);
  if (!length) return null;
  if (length.value > maxLength) {
    throw new QpackError(overLimit, `String literal of ${length.value} octets exceeds ${maxLength}`);
  }

  const end = length.offset + length.value;
  if (end > buf.length) return null;

  const data = buf.subarray(length.offset, end);
  const isHuffman = (buf[offset] & (1 << prefixBits)) !== 0;
  const octets = isHuffman ? huffmanDecode(data) : Buffer.from(data);
  return { value: octets.toString("utf8"), offset: end };
}
