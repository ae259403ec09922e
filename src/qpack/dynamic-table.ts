/**
 * QPACK dynamic table (RFC 9204 Section 3.2).
 *
 * Entries are kept oldest first. Absolute indices start at 0 and grow with
 * every insert; the oldest live entry has absolute index `droppedCount`.
 * Entries pinned by unacknowledged field sections are never evicted.
 */
import { ENTRY_OVERHEAD, DRAINING_RATIO } from "./constants.js";
import { QpackError } from "./errors.js";
import { octetLength } from "./string-literal.js";

export interface Entry {
  readonly name: string;
  readonly value: string;
  readonly absoluteIndex: number;
  /** name + value octets + 32 */
  readonly size: number;
}

export class DynamicTable {
  private entries: Entry[] = [];
  private references = new Map<number, number>();
  private _capacity = 0;
  private _size = 0;
  private _insertCount = 0;
  private _knownReceivedCount = 0;

  /** Size an entry with this name and value occupies */
  static entrySize(name: string, value: string): number {
    return octetLength(name) + octetLength(value) + ENTRY_OVERHEAD;
  }

  get capacity(): number {
    return this._capacity;
  }

  get size(): number {
    return this._size;
  }

  /** Total number of entries ever inserted */
  get insertCount(): number {
    return this._insertCount;
  }

  /** Inserts the decoder is known to have processed */
  get knownReceivedCount(): number {
    return this._knownReceivedCount;
  }

  /** Number of live entries */
  get length(): number {
    return this.entries.length;
  }

  /** Number of evicted entries, i.e. absolute index of the oldest live entry */
  get droppedCount(): number {
    return this._insertCount - this.entries.length;
  }

  /**
   * Change the capacity, evicting the oldest entries until the table fits.
   * Throws CAPACITY_VIOLATION, leaving the table untouched, if that would
   * evict a pinned entry.
   */
  setCapacity(capacity: number): void {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new RangeError(`Invalid dynamic table capacity: ${capacity}`);
    }
    const count = this.evictionCount(this._size - capacity);
    this.assertEvictable(count, `reduce capacity to ${capacity}`);
    this.evict(count);
    this._capacity = capacity;
  }

  /** Append an entry, evicting the oldest entries to make room */
  insert(name: string, value: string): Entry {
    const size = DynamicTable.entrySize(name, value);
    if (size > this._capacity) {
      throw new QpackError(
        "INSUFFICIENT_CAPACITY",
        `Entry of size ${size} exceeds dynamic table capacity ${this._capacity}`,
      );
    }

    const count = this.evictionCount(this._size + size - this._capacity);
    this.assertEvictable(count, `insert an entry of size ${size}`);
    this.evict(count);

    const entry: Entry = { name, value, absoluteIndex: this._insertCount, size };
    this.entries.push(entry);
    this._size += size;
    this._insertCount++;
    return entry;
  }

  /** Insert a copy of an existing entry at the top of the table */
  duplicate(absoluteIndex: number): Entry {
    const { name, value } = this.get(absoluteIndex);
    return this.insert(name, value);
  }

  /** Whether an entry of `size` can be inserted without evicting a pinned entry */
  canInsert(size: number): boolean {
    if (size > this._capacity) return false;
    const count = this.evictionCount(this._size + size - this._capacity);
    for (let i = 0; i < count; i++) {
      const index = this.entries[i].absoluteIndex;
      if (this.isReferenced(index)) return false;
    }
    return true;
  }

  lookup(absoluteIndex: number): Entry | undefined {
    if (
      !Number.isInteger(absoluteIndex) ||
      absoluteIndex < this.droppedCount ||
      absoluteIndex >= this._insertCount
    ) {
      return undefined;
    }
    return this.entries[absoluteIndex - this.droppedCount];
  }

  /** Like lookup(), but throws UNKNOWN_INDEX for missing entries */
  get(absoluteIndex: number): Entry {
    const entry = this.lookup(absoluteIndex);
    if (!entry) {
      const state =
        absoluteIndex < this.droppedCount ? "has been evicted" : "has not been inserted";
      throw new QpackError("UNKNOWN_INDEX", `Dynamic table entry ${absoluteIndex} ${state}`);
    }
    return entry;
  }

  /** Newest entry matching name and value */
  find(name: string, value: string): Entry | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.name === name && entry.value === value) return entry;
    }
    return undefined;
  }

  /** Newest entry with this name */
  findName(name: string): Entry | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].name === name) return this.entries[i];
    }
    return undefined;
  }

  /** Pin an entry for an unacknowledged field section */
  reference(absoluteIndex: number): void {
    this.get(absoluteIndex);
    this.references.set(absoluteIndex, (this.references.get(absoluteIndex) ?? 0) + 1);
  }

  /** Drop one pin taken by reference() */
  release(absoluteIndex: number): void {
    const count = this.references.get(absoluteIndex);
    if (count === undefined) {
      throw new Error(`Dynamic table entry ${absoluteIndex} is not referenced`);
    }
    if (count > 1) {
      this.references.set(absoluteIndex, count - 1);
    } else {
      this.references.delete(absoluteIndex);
    }
  }

  isReferenced(absoluteIndex: number): boolean {
    return this.references.has(absoluteIndex);
  }

  /**
   * Whether the entry is close enough to eviction that new references to it
   * would hold up inserts (RFC 9204 Section 2.1.1.1). Entries are draining
   * while they sit in the oldest part of the table needed to keep a quarter
   * of the capacity free.
   */
  isDraining(absoluteIndex: number): boolean {
    const target = this._capacity * DRAINING_RATIO;
    let available = this._capacity - this._size;
    for (const entry of this.entries) {
      if (available >= target) return false;
      if (entry.absoluteIndex === absoluteIndex) return true;
      available += entry.size;
    }
    return false;
  }

  /** Apply an Insert Count Increment */
  acknowledgeInsertCount(increment: number): void {
    if (increment <= 0) {
      throw new QpackError("MALFORMED_INSTRUCTION", "Insert Count Increment of zero");
    }
    if (this._knownReceivedCount + increment > this._insertCount) {
      throw new QpackError(
        "MALFORMED_INSTRUCTION",
        `Insert Count Increment of ${increment} beyond insert count ${this._insertCount}`,
      );
    }
    this._knownReceivedCount += increment;
  }

  /** Raise the known received count after a section with this Required Insert Count is acknowledged */
  acknowledgeRequiredInsertCount(requiredInsertCount: number): void {
    if (requiredInsertCount > this._insertCount) {
      throw new QpackError(
        "MALFORMED_INSTRUCTION",
        `Acknowledged Required Insert Count ${requiredInsertCount} beyond insert count ${this._insertCount}`,
      );
    }
    this._knownReceivedCount = Math.max(this._knownReceivedCount, requiredInsertCount);
  }

  /** How many of the oldest entries must go to free `bytes` */
  private evictionCount(bytes: number): number {
    let count = 0;
    let freed = 0;
    while (freed < bytes && count < this.entries.length) {
      freed += this.entries[count].size;
      count++;
    }
    return count;
  }

  private assertEvictable(count: number, action: string): void {
    for (let i = 0; i < count; i++) {
      const index = this.entries[i].absoluteIndex;
      if (this.isReferenced(index)) {
        throw new QpackError(
          "CAPACITY_VIOLATION",
          `Cannot ${action}: entry ${index} is still referenced`,
        );
      }
    }
  }

  private evict(count: number): void {
    for (const entry of this.entries.splice(0, count)) {
      this._size -= entry.size;
    }
  }
}
