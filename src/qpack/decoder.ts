/**
 * QPACK decoder (RFC 9204 Section 2.2).
 *
 * Field sections that reference entries the encoder stream has not
 * delivered yet are parked per stream and completed, in order, as soon as
 * the inserts arrive. Blocking is normal operation, not an error.
 */
import { Buffer } from "node:buffer";
import {
  ENTRY_OVERHEAD,
  OPTIMIZED_MAX_TABLE_CAPACITY,
  OPTIMIZED_BLOCKED_STREAMS,
  DEFAULT_MAX_FIELD_SECTION_SIZE,
} from "./constants.js";
import { DynamicTable, type Entry } from "./dynamic-table.js";
import { QpackError } from "./errors.js";
import { decodeFieldSectionPrefix, decodeFieldLine, type FieldLine } from "./field-lines.js";
import type { EncoderInstructionHandler } from "./instruction-parser.js";
import type { EncoderInstruction, DecoderInstruction } from "./instructions.js";
import { staticEntry } from "./static-table.js";
import type { HeaderField } from "./types.js";

export interface DecoderHandler {
  /** A field section was decoded, immediately or after unblocking */
  onHeaderFieldSet(streamId: number, fields: HeaderField[]): void;
  onInstruction(instruction: DecoderInstruction): void;
}

export interface DecoderOptions {
  /** Local SETTINGS_QPACK_MAX_TABLE_CAPACITY (default: 4096) */
  maxTableCapacity?: number;
  /** Local SETTINGS_QPACK_BLOCKED_STREAMS (default: 16) */
  maxBlockedStreams?: number;
  /** Largest decoded field section, summed as entry sizes (default: 80 KB) */
  maxFieldSectionSize?: number;
}

interface PendingSection {
  requiredInsertCount: number;
  base: number;
  data: Buffer;
  /** Offset of the first field line */
  offset: number;
}

export class QpackDecoder implements EncoderInstructionHandler {
  private table = new DynamicTable();
  private pending = new Map<number, PendingSection[]>();
  private readonly maxTableCapacity: number;
  private readonly maxBlockedStreams: number;
  private readonly maxFieldSectionSize: number;

  constructor(
    private readonly handler: DecoderHandler,
    options: DecoderOptions = {},
  ) {
    this.maxTableCapacity = options.maxTableCapacity ?? OPTIMIZED_MAX_TABLE_CAPACITY;
    this.maxBlockedStreams = options.maxBlockedStreams ?? OPTIMIZED_BLOCKED_STREAMS;
    this.maxFieldSectionSize = options.maxFieldSectionSize ?? DEFAULT_MAX_FIELD_SECTION_SIZE;
  }

  get dynamicTable(): DynamicTable {
    return this.table;
  }

  /** Streams waiting for inserts */
  get blockedStreams(): number {
    return this.pending.size;
  }

  private get maxEntries(): number {
    return Math.floor(this.maxTableCapacity / ENTRY_OVERHEAD);
  }

  /**
   * Decode the field section of a stream. Returns the fields, also passed
   * to the handler, or null when the section waits for inserts.
   */
  decode(streamId: number, data: Buffer | Uint8Array): HeaderField[] | null {
    // Copy: a blocked section outlives the caller's buffer
    const buf = Buffer.from(data);
    const prefix = decodeFieldSectionPrefix(buf, this.maxEntries, this.table.insertCount);
    const section: PendingSection = { ...prefix.value, data: buf, offset: prefix.offset };

    const queue = this.pending.get(streamId);
    if (queue) {
      queue.push(section);
      return null;
    }

    if (section.requiredInsertCount > this.table.insertCount) {
      if (this.pending.size >= this.maxBlockedStreams) {
        throw new QpackError(
          "TOO_MANY_BLOCKED_STREAMS",
          `Stream ${streamId} would exceed ${this.maxBlockedStreams} blocked streams`,
        );
      }
      this.pending.set(streamId, [section]);
      console.debug(
        `[qpack:decoder] stream ${streamId} blocked until insert count ${section.requiredInsertCount} (have ${this.table.insertCount})`,
      );
      return null;
    }

    return this.complete(streamId, section);
  }

  /**
   * Abandon a stream's blocked sections (stream reset or cancelled reading)
   * and tell the encoder with Stream Cancellation.
   */
  cancelStream(streamId: number): void {
    const queue = this.pending.get(streamId);
    if (!queue) return;

    this.pending.delete(streamId);
    console.debug(
      `[qpack:decoder] stream ${streamId} cancelled with ${queue.length} blocked section(s)`,
    );
    this.handler.onInstruction({ type: "stream-cancellation", streamId });
  }

  handleEncoderInstruction(instruction: EncoderInstruction): void {
    switch (instruction.type) {
      case "set-capacity":
        if (instruction.capacity > this.maxTableCapacity) {
          throw new QpackError(
            "CAPACITY_VIOLATION",
            `Capacity ${instruction.capacity} exceeds maximum table capacity ${this.maxTableCapacity}`,
          );
        }
        this.table.setCapacity(instruction.capacity);
        console.debug(`[qpack:decoder] dynamic table capacity ${instruction.capacity}`);
        break;
      case "insert-with-name-reference": {
        const name = instruction.isStatic
          ? staticEntry(instruction.index)[0]
          : this.table.get(this.relativeToAbsolute(instruction.index)).name;
        this.insert(name, instruction.value);
        break;
      }
      case "insert-with-literal-name":
        this.insert(instruction.name, instruction.value);
        break;
      case "duplicate": {
        const { name, value } = this.table.get(this.relativeToAbsolute(instruction.index));
        this.insert(name, value);
        break;
      }
      default: {
        const unknown: never = instruction;
        throw new Error(`Unknown encoder instruction: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private relativeToAbsolute(relative: number): number {
    const index = this.table.insertCount - 1 - relative;
    if (index < 0) {
      throw new QpackError(
        "UNKNOWN_INDEX",
        `Relative index ${relative} with insert count ${this.table.insertCount}`,
      );
    }
    return index;
  }

  private insert(name: string, value: string): void {
    this.table.insert(name, value);

    const increment = this.table.insertCount - this.table.knownReceivedCount;
    this.table.acknowledgeInsertCount(increment);
    this.handler.onInstruction({ type: "insert-count-increment", increment });

    this.unblock();
  }

  /** Complete every blocked section the table can now satisfy */
  private unblock(): void {
    const insertCount = this.table.insertCount;
    for (const [streamId, queue] of this.pending) {
      while (queue.length > 0 && queue[0].requiredInsertCount <= insertCount) {
        const section = queue[0];
        queue.shift();
        this.complete(streamId, section);
      }
      if (queue.length === 0) {
        this.pending.delete(streamId);
        console.debug(`[qpack:decoder] stream ${streamId} unblocked at insert count ${insertCount}`);
      }
    }
  }

  private complete(streamId: number, section: PendingSection): HeaderField[] {
    const fields: HeaderField[] = [];
    const { data, base, requiredInsertCount } = section;
    let offset = section.offset;
    let size = 0;

    while (offset < data.length) {
      const line = decodeFieldLine(data, offset, base, this.maxFieldSectionSize);
      offset = line.offset;

      const field = this.resolve(line.value, requiredInsertCount);
      size += DynamicTable.entrySize(field[0], field[1]);
      if (size > this.maxFieldSectionSize) {
        throw new QpackError(
          "FIELD_SECTION_TOO_LARGE",
          `Field section on stream ${streamId} exceeds ${this.maxFieldSectionSize}`,
        );
      }
      fields.push(field);
    }

    this.handler.onHeaderFieldSet(streamId, fields);
    this.table.acknowledgeRequiredInsertCount(requiredInsertCount);
    this.handler.onInstruction({ type: "section-acknowledgment", streamId });
    return fields;
  }

  private resolve(line: FieldLine, requiredInsertCount: number): HeaderField {
    switch (line.type) {
      case "indexed":
        if (line.isStatic) {
          const [name, value] = staticEntry(line.index);
          return [name, value];
        } else {
          const entry = this.dynamicEntry(line.index, requiredInsertCount);
          return [entry.name, entry.value];
        }
      case "name-reference": {
        const name = line.isStatic
          ? staticEntry(line.index)[0]
          : this.dynamicEntry(line.index, requiredInsertCount).name;
        return [name, line.value];
      }
      case "literal":
        return [line.name, line.value];
      default: {
        const unknown: never = line;
        throw new Error(`Unknown field line: ${JSON.stringify(unknown)}`);
      }
    }
  }

  /** Dynamic entries must lie below the section's Required Insert Count */
  private dynamicEntry(index: number, requiredInsertCount: number): Entry {
    if (index >= requiredInsertCount) {
      throw new QpackError(
        "UNKNOWN_INDEX",
        `Dynamic index ${index} not covered by Required Insert Count ${requiredInsertCount}`,
      );
    }
    return this.table.get(index);
  }
}
