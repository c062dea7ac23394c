/**
 * CPK archive reader - Main entry point
 *
 * Reads the index, virtual directory tree and file contents of CPK game archives.
 */

// Session API
export { CpkArchive, loadArchive } from './cpk-archive.js';
export type { ArchiveState } from './cpk-archive.js';

// Byte sources
export { BufferSource, FileSource } from './byte-source.js';
export type { ByteSource } from './byte-source.js';

// Hashing
export { crcHash, crcHashPath } from './crc-hash.js';

// Errors
export {
  CpkArchiveError,
  FormatError,
  ArchiveIOError,
  NotFoundError,
  IsADirectoryError,
  NotADirectoryError,
  NotLoadedError
} from './errors.js';

// Types
export type { CpkHeader } from './types/cpk-header.js';
export type { CpkRecord } from './types/cpk-record.js';
export type { CpkEntry } from './types/cpk-entry.js';
export type { CpkContent } from './types/cpk-content.js';
export type { Decompressor, LoadOptions } from './types/load-options.js';
export type { EntryTarget } from './content-accessor.js';
