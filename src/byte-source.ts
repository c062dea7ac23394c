/**
 * Random-access byte sources backing a CPK archive.
 *
 * Every read names its own offset, so no cursor is shared between
 * callers, and every stream owns its own view or file descriptor.
 */
import { open, type FileHandle } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { ArchiveIOError, describeError } from './errors.js';

const STREAM_CHUNK_SIZE = 64 * 1024;

export interface ByteSource {
  /** Total number of bytes available. */
  readonly size: number;
  /** Reads exactly `length` bytes at `offset`, or throws {@link ArchiveIOError}. */
  read(offset: number, length: number): Promise<Buffer>;
  /** Opens an independent stream over `[offset, offset + length)`. */
  createReadStream(offset: number, length: number): Readable;
  close(): Promise<void>;
}

/**
 * Throws unless `[offset, offset + length)` lies inside a source of `size` bytes.
 */
export function assertRange(offset: number, length: number, size: number, label: string): void {
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0) {
    throw new ArchiveIOError(`Invalid byte range in ${label}: offset=${offset}, length=${length}`);
  }
  if (offset + length > size) {
    throw new ArchiveIOError(`Read past end of ${label}: offset=${offset}, length=${length}, size=${size}`);
  }
}

/**
 * Archive held fully in memory. Reads and streams are views over the
 * same buffer.
 */
export class BufferSource implements ByteSource {
  constructor(private readonly buffer: Buffer) {}

  get size(): number {
    return this.buffer.length;
  }

  async read(offset: number, length: number): Promise<Buffer> {
    assertRange(offset, length, this.buffer.length, 'buffer');
    return this.buffer.subarray(offset, offset + length);
  }

  createReadStream(offset: number, length: number): Readable {
    assertRange(offset, length, this.buffer.length, 'buffer');
    return Readable.from(length === 0 ? [] : [this.buffer.subarray(offset, offset + length)]);
  }

  async close(): Promise<void> {}
}

/**
 * Archive read from disk through positional reads on one handle.
 * Streams open their own descriptor.
 */
export class FileSource implements ByteSource {
  private closed = false;

  private constructor(
    private readonly filePath: string,
    private readonly handle: FileHandle,
    readonly size: number
  ) {}

  /**
   * Opens `filePath` read-only and records its size.
   * @throws {ArchiveIOError} If the file cannot be opened or inspected
   */
  static async open(filePath: string): Promise<FileSource> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (error) {
      throw new ArchiveIOError(`Cannot open ${filePath}: ${describeError(error)}`, error);
    }
    try {
      const { size } = await handle.stat();
      return new FileSource(filePath, handle, size);
    } catch (error) {
      await handle.close();
      throw new ArchiveIOError(`Cannot stat ${filePath}: ${describeError(error)}`, error);
    }
  }

  get path(): string {
    return this.filePath;
  }

  async read(offset: number, length: number): Promise<Buffer> {
    this.ensureOpen();
    assertRange(offset, length, this.size, this.filePath);
    const buffer: Buffer = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      let bytesRead: number;
      try {
        ({ bytesRead } = await this.handle.read(buffer, filled, length - filled, offset + filled));
      } catch (error) {
        throw new ArchiveIOError(`Read failed in ${this.filePath} at ${offset + filled}: ${describeError(error)}`, error);
      }
      if (bytesRead === 0) {
        throw new ArchiveIOError(`Short read in ${this.filePath}: expected ${length} bytes at ${offset}, got ${filled}`);
      }
      filled += bytesRead;
    }
    return buffer;
  }

  createReadStream(offset: number, length: number): Readable {
    this.ensureOpen();
    assertRange(offset, length, this.size, this.filePath);
    return Readable.from(readChunks(this.filePath, offset, length));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ArchiveIOError(`${this.filePath} is closed`);
    }
  }
}

/**
 * Yields `[offset, offset + length)` of a file through positional reads
 * on a handle of its own. Ends with an {@link ArchiveIOError} if the file
 * runs out before `length` bytes.
 */
async function* readChunks(filePath: string, offset: number, length: number): AsyncGenerator<Buffer> {
  if (length === 0) {
    return;
  }
  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (error) {
    throw new ArchiveIOError(`Cannot open ${filePath}: ${describeError(error)}`, error);
  }
  try {
    const end: number = offset + length;
    let position: number = offset;
    while (position < end) {
      const chunk: Buffer = Buffer.alloc(Math.min(STREAM_CHUNK_SIZE, end - position));
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(chunk, 0, chunk.length, position));
      } catch (error) {
        throw new ArchiveIOError(`Read failed in ${filePath} at ${position}: ${describeError(error)}`, error);
      }
      if (bytesRead === 0) {
        throw new ArchiveIOError(`Short read in ${filePath}: expected ${length} bytes at ${offset}, got ${position - offset}`);
      }
      position += bytesRead;
      yield chunk.subarray(0, bytesRead);
    }
  } finally {
    await handle.close();
  }
}
