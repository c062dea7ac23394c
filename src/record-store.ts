/**
 * Header and table parsing for CPK archives.
 */
import type { ByteSource } from './byte-source.js';
import {
  CPK_HEADER_SIZE,
  CPK_LABEL,
  CPK_RECORD_SIZE,
  CPK_SUPPORTED_VERSION,
  HEADER_OFFSETS,
  RECORD_FLAGS,
  RECORD_OFFSETS
} from './constants/cpk-format.js';
import { FormatError } from './errors.js';
import type { CpkHeader } from './types/cpk-header.js';
import type { CpkRecord } from './types/cpk-record.js';

/**
 * Decodes the header fields without validating them.
 * @param buffer - At least {@link CPK_HEADER_SIZE} bytes
 */
export function parseHeader(buffer: Buffer): CpkHeader {
  return {
    label: buffer.readUInt32LE(HEADER_OFFSETS.label),
    version: buffer.readUInt32LE(HEADER_OFFSETS.version),
    tableStart: buffer.readUInt32LE(HEADER_OFFSETS.tableStart),
    dataStart: buffer.readUInt32LE(HEADER_OFFSETS.dataStart),
    maxFileNum: buffer.readUInt32LE(HEADER_OFFSETS.maxFileNum),
    fileNum: buffer.readUInt32LE(HEADER_OFFSETS.fileNum),
    isFormatted: buffer.readUInt32LE(HEADER_OFFSETS.isFormatted),
    sizeOfHeader: buffer.readUInt32LE(HEADER_OFFSETS.sizeOfHeader),
    validTableNum: buffer.readUInt32LE(HEADER_OFFSETS.validTableNum),
    maxTableNum: buffer.readUInt32LE(HEADER_OFFSETS.maxTableNum),
    fragmentNum: buffer.readUInt32LE(HEADER_OFFSETS.fragmentNum),
    packageSize: buffer.readUInt32LE(HEADER_OFFSETS.packageSize)
  };
}

/**
 * Checks label, version, table start and the count invariants.
 */
export function isValidHeader(header: CpkHeader): boolean {
  if (header.label !== CPK_LABEL) return false;
  if (header.version !== CPK_SUPPORTED_VERSION) return false;
  if (header.tableStart === 0) return false;
  if (header.fileNum > header.maxFileNum) return false;
  if (header.validTableNum > header.maxTableNum) return false;
  if (header.fileNum > header.validTableNum) return false;
  return true;
}

/**
 * Reads and validates the archive header.
 *
 * @throws {FormatError} If the source is too small or any header rule fails
 */
export async function readHeader(source: ByteSource): Promise<CpkHeader> {
  if (source.size < CPK_HEADER_SIZE) {
    throw new FormatError();
  }
  const header: CpkHeader = parseHeader(await source.read(0, CPK_HEADER_SIZE));
  if (!isValidHeader(header)) {
    throw new FormatError();
  }
  return header;
}

/**
 * Decodes one table record.
 * @param buffer - Table bytes
 * @param slot - Slot index; the record starts at `slot * CPK_RECORD_SIZE`
 */
export function parseRecord(buffer: Buffer, slot: number): CpkRecord {
  const base: number = slot * CPK_RECORD_SIZE;
  return {
    slot,
    id: buffer.readUInt32LE(base + RECORD_OFFSETS.id),
    flags: buffer.readUInt32LE(base + RECORD_OFFSETS.flags),
    parentId: buffer.readUInt32LE(base + RECORD_OFFSETS.parentId),
    startOffset: buffer.readUInt32LE(base + RECORD_OFFSETS.startOffset),
    packedSize: buffer.readUInt32LE(base + RECORD_OFFSETS.packedSize),
    originalSize: buffer.readUInt32LE(base + RECORD_OFFSETS.originalSize),
    extraInfoSize: buffer.readUInt32LE(base + RECORD_OFFSETS.extraInfoSize)
  };
}

/**
 * Reads the `maxFileNum` table slots that follow the header.
 *
 * @throws {ArchiveIOError} If the table runs past the end of the source
 */
export async function readRecords(source: ByteSource, header: CpkHeader): Promise<readonly CpkRecord[]> {
  const table: Buffer = await source.read(CPK_HEADER_SIZE, header.maxFileNum * CPK_RECORD_SIZE);
  const records: CpkRecord[] = [];
  for (let slot = 0; slot < header.maxFileNum; slot++) {
    records.push(parseRecord(table, slot));
  }
  return records;
}

export function isEmptyRecord(record: CpkRecord): boolean {
  return record.flags === 0;
}

export function isDirectoryRecord(record: CpkRecord): boolean {
  return (record.flags & RECORD_FLAGS.directory) !== 0;
}

export function isCompressedRecord(record: CpkRecord): boolean {
  return (record.flags & RECORD_FLAGS.notCompressed) === 0;
}

export function isLargeFileRecord(record: CpkRecord): boolean {
  return (record.flags & RECORD_FLAGS.largeFile) !== 0;
}

/**
 * A record is live when it is non-empty, valid and not deleted.
 */
export function isLiveRecord(record: CpkRecord): boolean {
  if (isEmptyRecord(record)) return false;
  if ((record.flags & RECORD_FLAGS.valid) === 0) return false;
  if ((record.flags & RECORD_FLAGS.deleted) !== 0) return false;
  return true;
}

/**
 * Offset of the name block that trails the payload.
 */
export function nameOffset(record: CpkRecord): number {
  return record.startOffset + record.packedSize;
}
