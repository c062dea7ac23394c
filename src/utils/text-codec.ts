/**
 * Legacy multi-byte text encoding for archive names and hashed paths.
 */
import iconv from 'iconv-lite';

/**
 * Throws if iconv-lite does not know the encoding.
 */
export function assertEncoding(encoding: string): void {
  if (!iconv.encodingExists(encoding)) {
    throw new TypeError(`Unsupported name encoding: ${encoding}`);
  }
}

export function decodeName(bytes: Buffer, encoding: string): string {
  return iconv.decode(bytes, encoding);
}

export function encodePath(path: string, encoding: string): Buffer {
  return iconv.encode(path, encoding);
}
