import { Buffer } from "node:buffer";
import { InstructionQueue } from "../../../src/qpack/instruction-queue.js";
import type { DecoderHandler } from "../../../src/qpack/decoder.js";
import type { DecoderInstruction } from "../../../src/qpack/instructions.js";
import type { HeaderField } from "../../../src/qpack/types.js";

/** Buffer from a hex string; whitespace is ignored */
export function hex(value: string): Buffer {
  return Buffer.from(value.replace(/\s+/g, ""), "hex");
}

/** Decoder handler recording decoded sections and queued instructions */
export class RecordingDecoderHandler implements DecoderHandler {
  sections: Array<[number, HeaderField[]]> = [];
  instructions = new InstructionQueue<DecoderInstruction>();

  onHeaderFieldSet(streamId: number, fields: HeaderField[]): void {
    this.sections.push([streamId, fields]);
  }

  onInstruction(instruction: DecoderInstruction): void {
    this.instructions.onInstruction(instruction);
  }
}
