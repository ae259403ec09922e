/**
 * Buffers instructions emitted by an encoder or decoder until the transport
 * layer writes them to the instruction stream.
 */
import { Buffer } from "node:buffer";
import { encodeInstruction, type Instruction } from "./instructions.js";

export class InstructionQueue<T extends Instruction> {
  private queue: T[] = [];

  constructor(private readonly huffman = false) {}

  get size(): number {
    return this.queue.length;
  }

  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  onInstruction(instruction: T): void {
    this.queue.push(instruction);
  }

  /** Take the oldest queued instruction */
  poll(): T | undefined {
    return this.queue.shift();
  }

  /** Serialize and remove every queued instruction, in order */
  drain(): Buffer {
    const chunks = this.queue.map((instruction) => encodeInstruction(instruction, this.huffman));
    this.queue = [];
    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
  }
}
