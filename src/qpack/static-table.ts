/**
 * QPACK static table (RFC 9204 Appendix A), loaded from data/static-table.json.
 */
import { readFileSync } from "node:fs";
import { STATIC_TABLE_SIZE } from "./constants.js";
import { QpackError } from "./errors.js";
import type { HeaderField } from "./types.js";

function loadStaticTable(): ReadonlyArray<Readonly<HeaderField>> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../../data/static-table.json", import.meta.url), "utf8"),
  );
  if (!Array.isArray(raw) || raw.length !== STATIC_TABLE_SIZE) {
    throw new Error(`Static table must list ${STATIC_TABLE_SIZE} entries`);
  }

  const entries: unknown[] = raw;
  return entries.map((item): HeaderField => {
    if (!Array.isArray(item) || item.length !== 2) {
      throw new Error("Static table entries must be [name, value] pairs");
    }
    const name: unknown = item[0];
    const value: unknown = item[1];
    if (typeof name !== "string" || typeof value !== "string") {
      throw new Error(`Invalid static table entry: ${JSON.stringify(item)}`);
    }
    return [name, value];
  });
}

const STATIC_TABLE = loadStaticTable();

// name -> value -> index, and name -> lowest index
const byField = new Map<string, Map<string, number>>();
const byName = new Map<string, number>();

STATIC_TABLE.forEach(([name, value], index) => {
  let values = byField.get(name);
  if (!values) {
    values = new Map();
    byField.set(name, values);
    byName.set(name, index);
  }
  values.set(value, index);
});

/** Get a static table entry; throws UNKNOWN_INDEX when out of range */
export function staticEntry(index: number): Readonly<HeaderField> {
  if (!Number.isInteger(index) || index < 0 || index >= STATIC_TABLE.length) {
    throw new QpackError("UNKNOWN_INDEX", `Static table index ${index} out of range`);
  }
  return STATIC_TABLE[index];
}

/** Index of the entry matching name and value exactly */
export function findStatic(name: string, value: string): number | undefined {
  return byField.get(name)?.get(value);
}

/** Index of the first entry with this name */
export function findStaticName(name: string): number | undefined {
  return byName.get(name);
}
