/**
 * Shared QPACK types.
 */

/** A header field as [name, value]; a field set keeps order and duplicates */
export type HeaderField = [name: string, value: string];
