/**
 * One fixed-size table slot of a CPK archive.
 */
export interface CpkRecord {
  /** Position of this record in the table. */
  readonly slot: number;
  /** CRC of the lower-cased virtual path. 0 is the root. */
  readonly id: number;
  readonly flags: number;
  readonly parentId: number;
  /** Absolute byte offset of the payload. */
  readonly startOffset: number;
  /** Payload size on disk. */
  readonly packedSize: number;
  /** Payload size after decompression. */
  readonly originalSize: number;
  /** Size of the name block that follows the payload. */
  readonly extraInfoSize: number;
}
