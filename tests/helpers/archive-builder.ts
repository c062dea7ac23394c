/**
 * Builds synthetic CPK archives in memory for tests.
 */
import iconv from 'iconv-lite';
import {
  CPK_HEADER_SIZE,
  CPK_LABEL,
  CPK_RECORD_SIZE,
  HEADER_OFFSETS,
  RECORD_FLAGS,
  RECORD_OFFSETS
} from '../../src/constants/cpk-format.js';
import type { CpkHeader } from '../../src/types/cpk-header.js';

export const FILE_FLAGS = RECORD_FLAGS.valid | RECORD_FLAGS.notCompressed;
export const DIR_FLAGS = RECORD_FLAGS.valid | RECORD_FLAGS.directory | RECORD_FLAGS.notCompressed;
export const COMPRESSED_FILE_FLAGS = RECORD_FLAGS.valid;

export interface FixtureRecord {
  readonly id: number;
  readonly parentId: number;
  readonly flags: number;
  /** Encoded as GBK and followed by two zero bytes. */
  readonly name?: string;
  /** Raw name block, used as-is instead of `name`. */
  readonly nameBlock?: Buffer;
  readonly payload?: Buffer;
  readonly originalSize?: number;
  /** Overrides the computed payload offset. */
  readonly startOffset?: number;
}

export interface FixtureOptions {
  /** Extra empty slots appended after the records. */
  readonly emptySlots?: number;
  readonly header?: Partial<CpkHeader>;
}

function nameBlockOf(record: FixtureRecord): Buffer {
  if (record.nameBlock) return record.nameBlock;
  return Buffer.concat([iconv.encode(record.name ?? '', 'gbk'), Buffer.from([0, 0])]);
}

function isLive(flags: number): boolean {
  return flags !== 0 && (flags & RECORD_FLAGS.valid) !== 0 && (flags & RECORD_FLAGS.deleted) === 0;
}

/**
 * Lays out header, table, then each record's payload followed by its name block.
 */
export function buildArchive(records: readonly FixtureRecord[], options: FixtureOptions = {}): Buffer {
  const maxFileNum: number = records.length + (options.emptySlots ?? 0);
  const tableSize: number = maxFileNum * CPK_RECORD_SIZE;
  const dataStart: number = CPK_HEADER_SIZE + tableSize;

  const bodies: Buffer[] = [];
  const table: Buffer = Buffer.alloc(tableSize);
  let cursor: number = dataStart;

  records.forEach((record: FixtureRecord, slot: number) => {
    const payload: Buffer = record.payload ?? Buffer.alloc(0);
    const nameBlock: Buffer = nameBlockOf(record);
    const base: number = slot * CPK_RECORD_SIZE;
    table.writeUInt32LE(record.id, base + RECORD_OFFSETS.id);
    table.writeUInt32LE(record.flags, base + RECORD_OFFSETS.flags);
    table.writeUInt32LE(record.parentId, base + RECORD_OFFSETS.parentId);
    table.writeUInt32LE(record.startOffset ?? cursor, base + RECORD_OFFSETS.startOffset);
    table.writeUInt32LE(payload.length, base + RECORD_OFFSETS.packedSize);
    table.writeUInt32LE(record.originalSize ?? payload.length, base + RECORD_OFFSETS.originalSize);
    table.writeUInt32LE(nameBlock.length, base + RECORD_OFFSETS.extraInfoSize);
    bodies.push(payload, nameBlock);
    cursor += payload.length + nameBlock.length;
  });

  const liveCount: number = records.filter((record: FixtureRecord) => isLive(record.flags)).length;
  const header: CpkHeader = {
    label: CPK_LABEL,
    version: 1,
    tableStart: CPK_HEADER_SIZE,
    dataStart,
    maxFileNum,
    fileNum: liveCount,
    isFormatted: 1,
    sizeOfHeader: CPK_HEADER_SIZE,
    validTableNum: records.length,
    maxTableNum: maxFileNum,
    fragmentNum: 0,
    packageSize: cursor,
    ...options.header
  };

  const headerBuffer: Buffer = Buffer.alloc(CPK_HEADER_SIZE);
  const fields: readonly [number, number][] = [
    [HEADER_OFFSETS.label, header.label],
    [HEADER_OFFSETS.version, header.version],
    [HEADER_OFFSETS.tableStart, header.tableStart],
    [HEADER_OFFSETS.dataStart, header.dataStart],
    [HEADER_OFFSETS.maxFileNum, header.maxFileNum],
    [HEADER_OFFSETS.fileNum, header.fileNum],
    [HEADER_OFFSETS.isFormatted, header.isFormatted],
    [HEADER_OFFSETS.sizeOfHeader, header.sizeOfHeader],
    [HEADER_OFFSETS.validTableNum, header.validTableNum],
    [HEADER_OFFSETS.maxTableNum, header.maxTableNum],
    [HEADER_OFFSETS.fragmentNum, header.fragmentNum],
    [HEADER_OFFSETS.packageSize, header.packageSize]
  ];
  for (const [offset, value] of fields) {
    headerBuffer.writeUInt32LE(value, offset);
  }

  return Buffer.concat([headerBuffer, table, ...bodies]);
}
