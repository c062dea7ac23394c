/**
 * Options accepted when loading a CPK archive.
 */

/**
 * External codec that inflates a compressed payload.
 * Receives the packed bytes and the size the output is expected to have.
 */
export type Decompressor = (input: Buffer, originalSize: number) => Buffer | Promise<Buffer>;

export interface LoadOptions {
  /** Separator used to join virtual paths. Defaults to a backslash. */
  readonly pathSeparator?: string;
  /** Legacy text encoding of names, as known to iconv-lite. Defaults to `gbk`. */
  readonly encoding?: string;
  /** Codec for compressed records. Without one, opening them fails. */
  readonly decompressor?: Decompressor;
}

export interface ResolvedLoadOptions {
  readonly pathSeparator: string;
  readonly encoding: string;
  readonly decompressor: Decompressor | undefined;
}
