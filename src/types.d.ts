/** Type declarations for modules without types */

declare module "hpack.js" {
  import type { Buffer } from "node:buffer";

  /** Bit writer; integers and strings take the bits left in the current octet as prefix */
  interface Encoder {
    encodeBit(bit: number): void;
    encodeBits(bits: number, len: number): void;
    encodeStr(value: number[], isHuffman: boolean): void;
    render(): Buffer[];
  }

  interface Decoder {
    push(chunk: Buffer): void;
    isEmpty(): boolean;
    decodeBit(): number;
    decodeStr(): number[];
  }

  const hpack: {
    encoder: { create(): Encoder };
    decoder: { create(): Decoder };
  };

  export = hpack;
}
