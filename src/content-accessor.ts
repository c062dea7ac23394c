/**
 * Record resolution and content readers.
 */
import { Readable } from 'node:stream';
import { assertRange, type ByteSource } from './byte-source.js';
import { CPK_ROOT_ID } from './constants/cpk-format.js';
import { crcHashPath } from './crc-hash.js';
import { ArchiveIOError, CpkArchiveError, IsADirectoryError, NotFoundError, describeError } from './errors.js';
import { findRecord } from './index-builder.js';
import { isCompressedRecord, isDirectoryRecord } from './record-store.js';
import { findIdByComponents, type TreeContext } from './tree-assembler.js';
import type { CpkContent } from './types/cpk-content.js';
import type { CpkRecord } from './types/cpk-record.js';
import type { Decompressor } from './types/load-options.js';

/** A virtual path, or a record id. */
export type EntryTarget = string | number;

/**
 * Splits a query path into lower-cased components.
 * Accepts `/`, `\` and the configured separator, and ignores empty segments.
 */
export function splitPath(path: string, separator: string): string[] {
  return path
    .split(separator)
    .flatMap((part: string) => part.split(/[\\/]/))
    .filter((part: string) => part !== '')
    .map((part: string) => part.toLowerCase());
}

/**
 * Canonical form of a query path: lower-cased, joined with `separator`.
 */
export function normalizePath(path: string, separator: string): string {
  return splitPath(path, separator).join(separator);
}

/**
 * Finds the live record addressed by `target`.
 *
 * Paths are looked up by hash first. When the hash misses, the path is
 * walked by name from the root, which covers tables whose ids are not
 * path hashes.
 *
 * @throws {NotFoundError} If no live record matches
 */
export function resolveRecord(context: TreeContext, encoding: string, target: EntryTarget): CpkRecord {
  if (typeof target === 'number') {
    const record: CpkRecord | undefined = target === CPK_ROOT_ID ? undefined : findRecord(context.index, context.records, target);
    if (!record) {
      throw new NotFoundError(target);
    }
    return record;
  }

  const components: string[] = splitPath(target, context.separator);
  if (components.length === 0) {
    throw new NotFoundError(target);
  }

  const hashed: CpkRecord | undefined = findRecord(
    context.index,
    context.records,
    crcHashPath(components.join(context.separator), encoding)
  );
  if (hashed && hashed.id !== CPK_ROOT_ID) {
    return hashed;
  }

  const walkedId: number | undefined = findIdByComponents(context, components);
  const walked: CpkRecord | undefined = walkedId === undefined || walkedId === CPK_ROOT_ID
    ? undefined
    : findRecord(context.index, context.records, walkedId);
  if (!walked) {
    throw new NotFoundError(target);
  }
  return walked;
}

/**
 * Like {@link resolveRecord}, but rejects directories.
 *
 * @throws {IsADirectoryError} If the record is a directory
 */
export function resolveFileRecord(context: TreeContext, encoding: string, target: EntryTarget): CpkRecord {
  const record: CpkRecord = resolveRecord(context, encoding, target);
  if (isDirectoryRecord(record)) {
    throw new IsADirectoryError(target);
  }
  return record;
}

function decompressingStream(source: ByteSource, record: CpkRecord, decompressor: Decompressor): Readable {
  async function* inflate(): AsyncGenerator<Buffer> {
    const packed: Buffer = await source.read(record.startOffset, record.packedSize);
    let output: Buffer;
    try {
      output = await decompressor(packed, record.originalSize);
    } catch (error) {
      if (error instanceof CpkArchiveError) {
        throw error;
      }
      throw new ArchiveIOError(`Failed to decompress record ${record.id}: ${describeError(error)}`, error);
    }
    if (output.length !== record.originalSize) {
      throw new ArchiveIOError(
        `Decompressed record ${record.id} to ${output.length} bytes, expected ${record.originalSize}`
      );
    }
    yield output;
  }
  return Readable.from(inflate());
}

/**
 * Opens an independent reader over a file record.
 *
 * Uncompressed records stream `packedSize` bytes as stored. Compressed
 * records go through `decompressor` and report `originalSize`.
 *
 * @throws {ArchiveIOError} If the payload lies outside the source, or a
 *   compressed record has no decompressor
 */
export function openRecord(source: ByteSource, record: CpkRecord, decompressor: Decompressor | undefined): CpkContent {
  assertRange(record.startOffset, record.packedSize, source.size, 'archive');

  if (!isCompressedRecord(record)) {
    return {
      stream: source.createReadStream(record.startOffset, record.packedSize),
      size: record.packedSize,
      isCompressed: false,
      record
    };
  }

  if (!decompressor) {
    throw new ArchiveIOError(`Record ${record.id} is compressed and no decompressor is configured`);
  }
  return {
    stream: decompressingStream(source, record, decompressor),
    size: record.originalSize,
    isCompressed: true,
    record
  };
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  if (typeof chunk === 'string') return Buffer.from(chunk);
  throw new ArchiveIOError(`Unexpected chunk of type ${typeof chunk} in content stream`);
}

/**
 * Drains a content stream into one buffer.
 */
export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks);
}
