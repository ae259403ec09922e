/**
 * Static Huffman code for string literals (RFC 7541 Appendix B, shared by RFC 9204).
 *
 * Coding goes through hpack.js: its encoder writes a string literal with
 * the H flag and a 7-bit length prefix, which is stripped again here, and
 * its decoder reads one back. Its assertion errors (EOS in the data,
 * padding that is not the EOS prefix) become HUFFMAN_DECODING_ERROR, as
 * does padding longer than 7 bits.
 */
import { Buffer } from "node:buffer";
import hpack from "hpack.js";
import { encodeInteger, decodeInteger } from "./integer.js";
import { QpackError } from "./errors.js";

/** Huffman-encode octets, padding the last octet with the EOS prefix */
export function huffmanEncode(data: Uint8Array): Buffer {
  const enc = hpack.encoder.create();
  enc.encodeStr(Array.from(data), true);
  const chunks = enc.render();
  const literal = chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);

  const length = decodeInteger(literal, 0, 7);
  if (!length) {
    throw new Error("hpack.js rendered an incomplete string literal");
  }
  return literal.subarray(length.offset);
}

/** Length in octets of the Huffman encoding of `data` */
export function huffmanEncodedLength(data: Uint8Array): number {
  return huffmanEncode(data).length;
}

/** Decode a complete Huffman-encoded string literal */
export function huffmanDecode(data: Uint8Array): Buffer {
  if (data.length === 0) return Buffer.alloc(0);

  const prefix: number[] = [];
  encodeInteger(prefix, 0x80, 7, data.length);

  const dec = hpack.decoder.create();
  dec.push(Buffer.concat([Buffer.from(prefix), data]));
  let decoded: Buffer;
  try {
    decoded = Buffer.from(dec.decodeStr());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new QpackError(
      "HUFFMAN_DECODING_ERROR",
      `Invalid Huffman-encoded string: ${message}`,
      undefined,
      err,
    );
  }

  // Any whole octet beyond the canonical encoding is padding longer than 7 bits
  const extra = data.length - huffmanEncodedLength(decoded);
  if (extra > 0) {
    throw new QpackError(
      "HUFFMAN_DECODING_ERROR",
      `Huffman padding longer than 7 bits (${extra} extra octets)`,
    );
  }
  return decoded;
}
