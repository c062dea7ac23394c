/**
 * Handle returned when opening an archived file.
 */
import type { Readable } from 'node:stream';
import type { CpkRecord } from './cpk-record.js';

export interface CpkContent {
  /** Independent reader over the file's bytes. */
  readonly stream: Readable;
  /** Number of bytes the stream yields. */
  readonly size: number;
  readonly isCompressed: boolean;
  readonly record: CpkRecord;
}
