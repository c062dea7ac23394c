/**
 * Legacy CRC hash used by CPK archives to key records by virtual path.
 *
 * This is a big-endian CRC variant with a non-standard initialization,
 * not the reflected CRC-32 of zlib. Every id stored in an archive table
 * was produced by it, so it must match bit for bit.
 */
import { CPK_DEFAULT_ENCODING } from './constants/cpk-format.js';
import { encodePath } from './utils/text-codec.js';

const POLYNOMIAL = 0x04c11db7;
const TABLE_SIZE = 256;

let crcTable: readonly number[] | undefined;

function buildTable(): readonly number[] {
  const table = new Uint32Array(TABLE_SIZE);
  for (let i = 0; i < TABLE_SIZE; i++) {
    let accumulator: number = (i << 24) >>> 0;
    for (let bit = 0; bit < 8; bit++) {
      accumulator = (accumulator & 0x80000000) !== 0
        ? ((accumulator << 1) ^ POLYNOMIAL) >>> 0
        : (accumulator << 1) >>> 0;
    }
    table[i] = accumulator;
  }
  return Object.freeze(Array.from(table));
}

/**
 * Remainder table, computed on first use and shared afterwards.
 */
export function getCrcTable(): readonly number[] {
  if (crcTable === undefined) {
    crcTable = buildTable();
  }
  return crcTable;
}

/**
 * Hashes a byte string the way CPK archives do.
 *
 * The input is read up to its first zero byte. Up to four leading bytes
 * prime the accumulator big-endian, the accumulator is inverted, and the
 * rest are folded in one byte at a time.
 *
 * @param bytes - Encoded path, zero-terminated or not
 * @returns Unsigned 32-bit hash; 0 for empty input or a leading zero byte
 */
export function crcHash(bytes: Uint8Array): number {
  if (bytes.length === 0 || bytes[0] === 0) {
    return 0;
  }

  const table: readonly number[] = getCrcTable();
  const byteAt = (index: number): number => (index < bytes.length ? bytes[index] : 0);

  let index = 0;
  let result: number = (byteAt(index++) << 24) >>> 0;
  if (byteAt(index) !== 0) {
    result = (result | (byteAt(index++) << 16)) >>> 0;
    if (byteAt(index) !== 0) {
      result = (result | (byteAt(index++) << 8)) >>> 0;
      if (byteAt(index) !== 0) {
        result = (result | byteAt(index++)) >>> 0;
      }
    }
  }
  result = ~result >>> 0;

  while (byteAt(index) !== 0) {
    result = (((result << 8) | byteAt(index)) ^ table[result >>> 24]) >>> 0;
    index++;
  }

  return ~result >>> 0;
}

/**
 * Hashes a virtual path: lower-cases it, encodes it in the legacy code
 * page, then applies {@link crcHash}.
 */
export function crcHashPath(path: string, encoding: string = CPK_DEFAULT_ENCODING): number {
  return crcHash(encodePath(path.toLowerCase(), encoding));
}
