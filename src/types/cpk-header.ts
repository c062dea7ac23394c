/**
 * Decoded 128-byte CPK archive header.
 */
export interface CpkHeader {
  readonly label: number;
  readonly version: number;
  readonly tableStart: number;
  readonly dataStart: number;
  /** Number of table slots following the header. */
  readonly maxFileNum: number;
  /** Declared number of live files. */
  readonly fileNum: number;
  readonly isFormatted: number;
  readonly sizeOfHeader: number;
  readonly validTableNum: number;
  readonly maxTableNum: number;
  readonly fragmentNum: number;
  readonly packageSize: number;
}
