/**
 * Node of the virtual directory tree reconstructed from a CPK archive.
 */
import type { CpkRecord } from './cpk-record.js';

export interface CpkEntry {
  /** Separator-joined, lower-cased path from the root. */
  readonly virtualPath: string;
  /** Last component of the virtual path. */
  readonly name: string;
  readonly isDirectory: boolean;
  /** Large-file bit of the record flags. */
  readonly isLargeFile: boolean;
  readonly record: CpkRecord;
  /** Child entries; always empty for files. */
  readonly children: readonly CpkEntry[];
}
