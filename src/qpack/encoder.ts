/**
 * QPACK encoder (RFC 9204 Section 2.1).
 *
 * Owns a mirror of the decoder's dynamic table. Table changes are emitted
 * synchronously to the handler as encoder-stream instructions; the caller
 * writes them out before the field sections that depend on them.
 */
import type { Buffer } from "node:buffer";
import {
  ENTRY_OVERHEAD,
  OPTIMIZED_MAX_TABLE_CAPACITY,
  OPTIMIZED_BLOCKED_STREAMS,
} from "./constants.js";
import { DynamicTable, type Entry } from "./dynamic-table.js";
import { QpackError } from "./errors.js";
import { encodeFieldSection, type FieldLine } from "./field-lines.js";
import type { DecoderInstructionHandler } from "./instruction-parser.js";
import type { EncoderInstruction, DecoderInstruction } from "./instructions.js";
import { findStatic, findStaticName } from "./static-table.js";
import type { HeaderField } from "./types.js";

export interface EncoderHandler {
  onInstruction(instruction: EncoderInstruction): void;
}

export interface EncoderOptions {
  /** Peer's SETTINGS_QPACK_MAX_TABLE_CAPACITY (default: 4096) */
  maxTableCapacity?: number;
  /** Peer's SETTINGS_QPACK_BLOCKED_STREAMS (default: 16) */
  maxBlockedStreams?: number;
  /** Huffman-encode string literals when shorter (default: false) */
  huffman?: boolean;
  /**
   * Whether the peer acknowledges sections with a Required Insert Count of
   * 0 (default: true, as QpackDecoder does). Set to false for decoders that
   * follow RFC 9204 Section 4.4.1 and only acknowledge non-zero counts.
   */
  acknowledgeEmptySections?: boolean;
}

/** A field section the decoder has not acknowledged yet */
interface OutstandingSection {
  requiredInsertCount: number;
  /** Absolute indices pinned by this section */
  references: number[];
}

/** Per-section state while encoding */
interface SectionState {
  streamId: number;
  requiredInsertCount: number;
  references: number[];
  /** Whether the stream may already be blocked on the decoder */
  blocking: boolean;
  /** Set when the blocked-streams budget prevented a dynamic reference */
  throttled: boolean;
}

export class QpackEncoder implements DecoderInstructionHandler {
  /**
   * Headers that should NOT be added to the dynamic table.
   * High-cardinality values waste table space (matches nghttp2 strategy).
   */
  private static readonly NEVER_INDEX = new Set([
    "content-length",
    "content-range",
    "date",
    "last-modified",
    "etag",
    "age",
    "expires",
    "set-cookie",
    "cookie",
    "authorization",
    "proxy-authorization",
    "location",
    "if-modified-since",
    "if-none-match",
  ]);

  /**
   * Sensitive headers that MUST be sent as never-indexed literals (N bit),
   * so intermediaries never add them to a table (RFC 9204 Section 7.1.3).
   */
  private static readonly SENSITIVE = new Set([
    "authorization",
    "proxy-authorization",
    "cookie",
    "set-cookie",
  ]);

  private table = new DynamicTable();
  private sections = new Map<number, OutstandingSection[]>();
  private readonly maxTableCapacity: number;
  private readonly maxBlockedStreams: number;
  private readonly huffman: boolean;
  private readonly acknowledgeEmptySections: boolean;

  constructor(
    private readonly handler: EncoderHandler,
    options: EncoderOptions = {},
  ) {
    this.maxTableCapacity = options.maxTableCapacity ?? OPTIMIZED_MAX_TABLE_CAPACITY;
    this.maxBlockedStreams = options.maxBlockedStreams ?? OPTIMIZED_BLOCKED_STREAMS;
    this.huffman = options.huffman ?? false;
    this.acknowledgeEmptySections = options.acknowledgeEmptySections ?? true;
  }

  get dynamicTable(): DynamicTable {
    return this.table;
  }

  get knownReceivedCount(): number {
    return this.table.knownReceivedCount;
  }

  /** Streams with an unacknowledged section the decoder may be blocked on */
  get blockedStreams(): number {
    let count = 0;
    for (const streamId of this.sections.keys()) {
      if (this.isBlocking(streamId)) count++;
    }
    return count;
  }

  private get maxEntries(): number {
    return Math.floor(this.maxTableCapacity / ENTRY_OVERHEAD);
  }

  /** Encode a header field set as the field section of a stream */
  encode(streamId: number, fields: HeaderField[]): Buffer {
    const base = this.table.insertCount;
    const section: SectionState = {
      streamId,
      requiredInsertCount: 0,
      references: [],
      blocking: this.isBlocking(streamId),
      throttled: false,
    };

    const lines = fields.map(([name, value]) => this.encodeField(section, name, value));

    if (section.throttled) {
      console.debug(
        `[qpack:encoder] stream ${streamId}: blocked streams limit (${this.maxBlockedStreams}) reached, using literals`,
      );
    }

    if (section.requiredInsertCount > 0 || this.acknowledgeEmptySections) {
      let queue = this.sections.get(streamId);
      if (!queue) {
        queue = [];
        this.sections.set(streamId, queue);
      }
      queue.push({
        requiredInsertCount: section.requiredInsertCount,
        references: section.references,
      });
    }

    return encodeFieldSection(
      { requiredInsertCount: section.requiredInsertCount, base },
      lines,
      this.maxEntries,
      this.huffman,
    );
  }

  /** Change the dynamic table capacity and emit Set Dynamic Table Capacity */
  setCapacity(capacity: number): void {
    if (capacity > this.maxTableCapacity) {
      throw new QpackError(
        "CAPACITY_VIOLATION",
        `Capacity ${capacity} exceeds maximum table capacity ${this.maxTableCapacity}`,
      );
    }
    this.table.setCapacity(capacity);
    console.debug(`[qpack:encoder] dynamic table capacity ${capacity}`);
    this.handler.onInstruction({ type: "set-capacity", capacity });
  }

  /** Insert a field ahead of use and emit the matching insert instruction */
  insert(field: HeaderField): Entry {
    const [name, value] = field;
    return this.insertEntry(name, value);
  }

  /** Apply an Insert Count Increment from the decoder */
  insertCountIncrement(increment: number): void {
    this.table.acknowledgeInsertCount(increment);
  }

  /** Apply a Section Acknowledgment: the oldest outstanding section of the stream was decoded */
  sectionAcknowledgment(streamId: number): void {
    const queue = this.sections.get(streamId);
    const section = queue?.shift();
    if (!queue || !section) {
      throw new QpackError(
        "MALFORMED_INSTRUCTION",
        `Section Acknowledgment for stream ${streamId} without an outstanding field section`,
      );
    }
    if (queue.length === 0) {
      this.sections.delete(streamId);
    }

    for (const index of section.references) {
      this.table.release(index);
    }
    this.table.acknowledgeRequiredInsertCount(section.requiredInsertCount);
  }

  /** Apply a Stream Cancellation: drop every outstanding section of the stream */
  streamCancellation(streamId: number): void {
    const queue = this.sections.get(streamId);
    if (!queue) return;

    this.sections.delete(streamId);
    for (const section of queue) {
      for (const index of section.references) {
        this.table.release(index);
      }
    }
    console.debug(
      `[qpack:encoder] stream ${streamId} cancelled, released ${queue.length} section(s)`,
    );
  }

  handleDecoderInstruction(instruction: DecoderInstruction): void {
    switch (instruction.type) {
      case "section-acknowledgment":
        this.sectionAcknowledgment(instruction.streamId);
        break;
      case "stream-cancellation":
        this.streamCancellation(instruction.streamId);
        break;
      case "insert-count-increment":
        this.insertCountIncrement(instruction.increment);
        break;
      default: {
        const unknown: never = instruction;
        throw new Error(`Unknown decoder instruction: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private isBlocking(streamId: number): boolean {
    const queue = this.sections.get(streamId);
    if (!queue) return false;
    const known = this.table.knownReceivedCount;
    return queue.some((section) => section.requiredInsertCount > known);
  }

  /** Whether this section may depend on entries the decoder might not have yet */
  private canBlock(section: SectionState): boolean {
    return section.blocking || this.blockedStreams < this.maxBlockedStreams;
  }

  private canReference(section: SectionState, entry: Entry): boolean {
    if (entry.absoluteIndex < this.table.knownReceivedCount) return true;
    if (this.canBlock(section)) return true;
    section.throttled = true;
    return false;
  }

  private reference(section: SectionState, entry: Entry): void {
    const index = entry.absoluteIndex;
    this.table.reference(index);
    section.references.push(index);
    section.requiredInsertCount = Math.max(section.requiredInsertCount, index + 1);
    if (index >= this.table.knownReceivedCount) {
      section.blocking = true;
    }
  }

  private encodeField(section: SectionState, name: string, value: string): FieldLine {
    const staticIndex = findStatic(name, value);
    if (staticIndex !== undefined) {
      return { type: "indexed", isStatic: true, index: staticIndex };
    }

    const sensitive = QpackEncoder.SENSITIVE.has(name);
    const indexable = !sensitive && !QpackEncoder.NEVER_INDEX.has(name);

    if (!sensitive) {
      const match = this.table.find(name, value);
      if (match && this.canReference(section, match)) {
        // Refresh entries about to be evicted instead of pinning them
        const entry =
          this.table.isDraining(match.absoluteIndex) && this.canDuplicate(section, match)
            ? this.duplicateEntry(match)
            : match;
        this.reference(section, entry);
        return { type: "indexed", isStatic: false, index: entry.absoluteIndex };
      }
    }

    if (indexable && this.table.canInsert(DynamicTable.entrySize(name, value))) {
      if (this.canBlock(section)) {
        const entry = this.insertEntry(name, value);
        this.reference(section, entry);
        return { type: "indexed", isStatic: false, index: entry.absoluteIndex };
      }
      section.throttled = true;
    }

    const staticName = findStaticName(name);
    if (staticName !== undefined) {
      return {
        type: "name-reference",
        isStatic: true,
        index: staticName,
        value,
        neverIndex: sensitive,
      };
    }

    const nameMatch = this.table.findName(name);
    if (nameMatch && this.canReference(section, nameMatch)) {
      this.reference(section, nameMatch);
      return {
        type: "name-reference",
        isStatic: false,
        index: nameMatch.absoluteIndex,
        value,
        neverIndex: sensitive,
      };
    }

    return { type: "literal", name, value, neverIndex: sensitive };
  }

  private canDuplicate(section: SectionState, entry: Entry): boolean {
    return this.canBlock(section) && this.table.canInsert(entry.size);
  }

  private duplicateEntry(entry: Entry): Entry {
    const index = this.table.insertCount - 1 - entry.absoluteIndex;
    const copy = this.table.duplicate(entry.absoluteIndex);
    this.handler.onInstruction({ type: "duplicate", index });
    return copy;
  }

  /** Insert into the table, referring to a known name where possible */
  private insertEntry(name: string, value: string): Entry {
    const staticName = findStaticName(name);
    const nameMatch = staticName === undefined ? this.table.findName(name) : undefined;
    const relativeIndex = nameMatch ? this.table.insertCount - 1 - nameMatch.absoluteIndex : 0;

    const entry = this.table.insert(name, value);

    if (staticName !== undefined) {
      this.handler.onInstruction({
        type: "insert-with-name-reference",
        isStatic: true,
        index: staticName,
        value,
      });
    } else if (nameMatch) {
      this.handler.onInstruction({
        type: "insert-with-name-reference",
        isStatic: false,
        index: relativeIndex,
        value,
      });
    } else {
      this.handler.onInstruction({ type: "insert-with-literal-name", name, value });
    }
    return entry;
  }
}
