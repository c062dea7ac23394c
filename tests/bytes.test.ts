import { describe, it, expect } from 'vitest';
import { indexOfPattern, trimAtPattern } from '../src/utils/bytes.js';

describe('indexOfPattern', () => {
  it('finds the first occurrence', () => {
    expect(indexOfPattern(Buffer.from([1, 0, 0, 2, 0, 0]), [0, 0])).toBe(1);
  });

  it('honours the start index', () => {
    expect(indexOfPattern(Buffer.from([1, 0, 0, 2, 0, 0]), [0, 0], 3)).toBe(4);
  });

  it('returns -1 when absent or when the pattern is empty', () => {
    expect(indexOfPattern(Buffer.from([1, 0, 2, 0]), [0, 0])).toBe(-1);
    expect(indexOfPattern(Buffer.from([1, 2]), [])).toBe(-1);
  });

  it('matches a pattern ending at the last byte', () => {
    expect(indexOfPattern(Buffer.from([7, 0, 0]), [0, 0])).toBe(1);
  });
});

describe('trimAtPattern', () => {
  it('cuts at a double zero, not at a single zero', () => {
    const trimmed = trimAtPattern(Buffer.from([0x61, 0x00, 0x62, 0x00, 0x00, 0x63]), [0, 0]);
    expect(trimmed).toEqual(Buffer.from([0x61, 0x00, 0x62]));
  });

  it('returns the input when the pattern is absent', () => {
    const input = Buffer.from([0x61, 0x62, 0x00]);
    expect(trimAtPattern(input, [0, 0])).toBe(input);
  });

  it('yields an empty buffer when the pattern leads', () => {
    expect(trimAtPattern(Buffer.from([0, 0, 0x61]), [0, 0])).toHaveLength(0);
  });
});
