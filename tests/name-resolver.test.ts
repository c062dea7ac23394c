import { describe, it, expect } from 'vitest';
import { BufferSource } from '../src/byte-source.js';
import { ArchiveIOError } from '../src/errors.js';
import { buildRecordIndex } from '../src/index-builder.js';
import { readRawName, resolveNames } from '../src/name-resolver.js';
import { readHeader, readRecords } from '../src/record-store.js';
import { buildArchive, DIR_FLAGS, FILE_FLAGS, type FixtureRecord } from './helpers/archive-builder.js';

async function load(records: readonly FixtureRecord[]) {
  const source = new BufferSource(buildArchive(records));
  const header = await readHeader(source);
  const table = await readRecords(source, header);
  return { source, table, index: buildRecordIndex(table) };
}

describe('resolveNames', () => {
  it('decodes the name behind each payload', async () => {
    const { source, table, index } = await load([
      { id: 5, parentId: 0, flags: DIR_FLAGS, name: 'data' },
      { id: 9, parentId: 5, flags: FILE_FLAGS, name: 'a.txt', payload: Buffer.from('hello world') }
    ]);

    const { names } = await resolveNames(source, table, index, 'gbk');

    expect([...names]).toEqual([[5, 'data'], [9, 'a.txt']]);
  });

  it('decodes GBK names', async () => {
    const { source, table, index } = await load([{ id: 3, parentId: 0, flags: DIR_FLAGS, name: '音乐' }]);

    const { names } = await resolveNames(source, table, index, 'gbk');

    expect(names.get(3)).toBe('音乐');
  });

  it('skips dead records', async () => {
    const { source, table, index } = await load([
      { id: 3, parentId: 0, flags: 0, name: 'gone' },
      { id: 4, parentId: 0, flags: FILE_FLAGS, name: 'kept' }
    ]);

    const { names } = await resolveNames(source, table, index, 'gbk');

    expect([...names.keys()]).toEqual([4]);
  });

  it('fails when a name block lies past the end of the archive', async () => {
    const archive = buildArchive([{ id: 4, parentId: 0, flags: FILE_FLAGS, name: 'kept', payload: Buffer.from('xyz') }]);
    const source = new BufferSource(archive.subarray(0, archive.length - 2));
    const table = await readRecords(source, await readHeader(source));

    await expect(resolveNames(source, table, buildRecordIndex(table), 'gbk')).rejects.toThrow(ArchiveIOError);
  });
});

describe('readRawName', () => {
  it('keeps single zero bytes and cuts at the first double zero', async () => {
    const block = Buffer.from([0x61, 0x00, 0x62, 0x00, 0x00, 0x7a, 0x7a]);
    const { source, table } = await load([{ id: 1, parentId: 0, flags: FILE_FLAGS, nameBlock: block }]);

    expect(await readRawName(source, table[0])).toEqual(Buffer.from([0x61, 0x00, 0x62]));
  });

  it('returns the whole block when no terminator is present', async () => {
    const { source, table } = await load([{ id: 1, parentId: 0, flags: FILE_FLAGS, nameBlock: Buffer.from('plain') }]);

    expect(await readRawName(source, table[0])).toEqual(Buffer.from('plain'));
  });
});
