/**
 * Byte pattern helpers.
 */

/**
 * Finds the first position where `pattern` occurs in `buffer`.
 * @returns Index of the match, or -1
 */
export function indexOfPattern(buffer: Uint8Array, pattern: readonly number[], startIndex: number = 0): number {
  if (pattern.length === 0) {
    return -1;
  }
  const lastStart: number = buffer.length - pattern.length;
  for (let i = startIndex; i <= lastStart; i++) {
    let matched = true;
    for (let j = 0; j < pattern.length; j++) {
      if (buffer[i + j] !== pattern[j]) {
        matched = false;
        break;
      }
    }
    if (matched) {
      return i;
    }
  }
  return -1;
}

/**
 * Cuts `buffer` at the first occurrence of `pattern`.
 * Returns the buffer unchanged when the pattern is absent.
 */
export function trimAtPattern(buffer: Buffer, pattern: readonly number[]): Buffer {
  const end: number = indexOfPattern(buffer, pattern);
  return end === -1 ? buffer : buffer.subarray(0, end);
}
