/**
 * Lookup structures derived from the record table.
 */
import { isLiveRecord } from './record-store.js';
import type { CpkRecord } from './types/cpk-record.js';

export interface RecordIndex {
  /** Live record id to table slot. */
  readonly slotById: ReadonlyMap<number, number>;
  /** Parent id to child ids, in slot order. */
  readonly childrenByParent: ReadonlyMap<number, ReadonlySet<number>>;
  /** Ids seen again after their first live slot. */
  readonly duplicateIds: readonly number[];
}

/**
 * Indexes live records in one pass over the table.
 *
 * The lowest slot wins when an id repeats; later slots with that id are
 * left out of both maps.
 */
export function buildRecordIndex(records: readonly CpkRecord[]): RecordIndex {
  const slotById = new Map<number, number>();
  const childrenByParent = new Map<number, Set<number>>();
  const duplicateIds: number[] = [];

  for (const record of records) {
    if (!isLiveRecord(record)) continue;

    if (slotById.has(record.id)) {
      duplicateIds.push(record.id);
      continue;
    }
    slotById.set(record.id, record.slot);

    const siblings: Set<number> | undefined = childrenByParent.get(record.parentId);
    if (siblings) {
      siblings.add(record.id);
    } else {
      childrenByParent.set(record.parentId, new Set([record.id]));
    }
  }

  if (duplicateIds.length > 0) {
    console.warn(`Archive table repeats ${duplicateIds.length} record id(s); keeping the lowest slot for each`);
  }

  return { slotById, childrenByParent, duplicateIds };
}

/**
 * Looks up the live record with `id`.
 */
export function findRecord(index: RecordIndex, records: readonly CpkRecord[], id: number): CpkRecord | undefined {
  const slot: number | undefined = index.slotById.get(id);
  return slot === undefined ? undefined : records[slot];
}
