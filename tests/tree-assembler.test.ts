import { describe, it, expect } from 'vitest';
import { buildRecordIndex } from '../src/index-builder.js';
import type { NameTable } from '../src/name-resolver.js';
import { buildChildren, buildTree, findIdByComponents, joinPath, pathOf, type TreeContext } from '../src/tree-assembler.js';
import type { CpkRecord } from '../src/types/cpk-record.js';
import { RECORD_FLAGS } from '../src/constants/cpk-format.js';
import { DIR_FLAGS, FILE_FLAGS } from './helpers/archive-builder.js';

function context(rows: readonly [id: number, parentId: number, flags: number, name: string][]): TreeContext {
  const records: CpkRecord[] = rows.map(([id, parentId, flags], slot) => ({
    slot,
    id,
    flags,
    parentId,
    startOffset: 0,
    packedSize: 0,
    originalSize: 0,
    extraInfoSize: 0
  }));
  const names: NameTable = {
    names: new Map(rows.map(([id, , , name]): [number, string] => [id, name]))
  };
  return { records, index: buildRecordIndex(records), names, separator: '\\' };
}

const TREE = context([
  [1, 0, DIR_FLAGS, 'Scene'],
  [2, 1, DIR_FLAGS, 'm01'],
  [3, 2, FILE_FLAGS, 'M01.pol'],
  [4, 0, FILE_FLAGS | RECORD_FLAGS.largeFile, 'basedata.ini'],
  [5, 99, FILE_FLAGS, 'orphan.bin']
]);

describe('joinPath', () => {
  it('omits the separator under the root', () => {
    expect(joinPath('', 'a', '\\')).toBe('a');
    expect(joinPath('a', 'b', '\\')).toBe('a\\b');
  });
});

describe('buildTree', () => {
  it('nests entries under their parents', () => {
    const root = buildTree(TREE);

    expect(root.map((entry) => entry.virtualPath)).toEqual(['scene', 'basedata.ini']);
    expect(root[0].children[0].virtualPath).toBe('scene\\m01');
    expect(root[0].children[0].children[0]).toMatchObject({
      virtualPath: 'scene\\m01\\m01.pol',
      name: 'm01.pol',
      isDirectory: false,
      isLargeFile: false,
      children: []
    });
    expect(root[1]).toMatchObject({ virtualPath: 'basedata.ini', isLargeFile: true });
  });

  it('leaves out records whose parent is not reachable', () => {
    const all: string[] = [];
    const visit = (entries: ReturnType<typeof buildTree>): void => {
      for (const entry of entries) {
        all.push(entry.virtualPath);
        visit([...entry.children]);
      }
    };
    visit(buildTree(TREE));

    expect(all).not.toContain('orphan.bin');
    expect(all).toHaveLength(4);
  });
});

describe('buildChildren', () => {
  it('prefixes children with the given parent path', () => {
    expect(buildChildren(TREE, 2, 'scene\\m01').map((entry) => entry.virtualPath)).toEqual(['scene\\m01\\m01.pol']);
  });

  it('returns nothing for a parent without children', () => {
    expect(buildChildren(TREE, 3, 'scene\\m01\\m01.pol')).toEqual([]);
  });
});

describe('findIdByComponents', () => {
  it('walks lower-cased names from the root', () => {
    expect(findIdByComponents(TREE, ['scene', 'm01', 'm01.pol'])).toBe(3);
    expect(findIdByComponents(TREE, ['scene', 'm02'])).toBeUndefined();
    expect(findIdByComponents(TREE, ['basedata.ini', 'x'])).toBeUndefined();
  });
});

describe('pathOf', () => {
  it('follows parent ids up to the root', () => {
    expect(pathOf(TREE, 3)).toBe('scene\\m01\\m01.pol');
  });

  it('gives up on a broken parent chain', () => {
    expect(pathOf(TREE, 5)).toBeUndefined();
    expect(pathOf(TREE, 42)).toBeUndefined();
  });
});
