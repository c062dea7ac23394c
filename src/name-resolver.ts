/**
 * Recovers record names from the metadata block behind each payload.
 */
import type { ByteSource } from './byte-source.js';
import { CPK_NAME_TERMINATOR } from './constants/cpk-format.js';
import { findRecord, type RecordIndex } from './index-builder.js';
import { nameOffset } from './record-store.js';
import type { CpkRecord } from './types/cpk-record.js';
import { trimAtPattern } from './utils/bytes.js';
import { decodeName } from './utils/text-codec.js';

export interface NameTable {
  /** Decoded names by record id. */
  readonly names: ReadonlyMap<number, string>;
}

/**
 * Reads the name block of one record and trims it at the two-zero terminator.
 */
export async function readRawName(source: ByteSource, record: CpkRecord): Promise<Buffer> {
  const block: Buffer = await source.read(nameOffset(record), record.extraInfoSize);
  return trimAtPattern(block, CPK_NAME_TERMINATOR);
}

/**
 * Resolves the name of every indexed record.
 * Reads run one at a time, in slot order.
 */
export async function resolveNames(
  source: ByteSource,
  records: readonly CpkRecord[],
  index: RecordIndex,
  encoding: string
): Promise<NameTable> {
  const names = new Map<number, string>();

  for (const id of index.slotById.keys()) {
    const record: CpkRecord | undefined = findRecord(index, records, id);
    if (!record) continue;
    names.set(id, decodeName(await readRawName(source, record), encoding));
  }

  return { names };
}
