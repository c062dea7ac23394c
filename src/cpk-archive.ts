/**
 * CPK archive session: load pipeline and query API.
 */
import { BufferSource, FileSource, type ByteSource } from './byte-source.js';
import { CPK_DEFAULT_ENCODING, CPK_DEFAULT_SEPARATOR } from './constants/cpk-format.js';
import {
  normalizePath,
  openRecord,
  readStream,
  resolveFileRecord,
  resolveRecord,
  type EntryTarget
} from './content-accessor.js';
import { NotADirectoryError, NotFoundError, NotLoadedError } from './errors.js';
import { buildRecordIndex, type RecordIndex } from './index-builder.js';
import { resolveNames, type NameTable } from './name-resolver.js';
import { isDirectoryRecord, readHeader, readRecords } from './record-store.js';
import { buildChildren, buildTree, pathOf, type TreeContext } from './tree-assembler.js';
import type { CpkContent } from './types/cpk-content.js';
import type { CpkEntry } from './types/cpk-entry.js';
import type { CpkHeader } from './types/cpk-header.js';
import type { CpkRecord } from './types/cpk-record.js';
import type { LoadOptions, ResolvedLoadOptions } from './types/load-options.js';
import { assertEncoding } from './utils/text-codec.js';

export type ArchiveState = 'unloaded' | 'loading' | 'loaded';

interface LoadedArchive {
  readonly header: CpkHeader;
  readonly context: TreeContext;
}

function resolveOptions(options: LoadOptions): ResolvedLoadOptions {
  const pathSeparator: string = options.pathSeparator ?? CPK_DEFAULT_SEPARATOR;
  if (pathSeparator.length === 0) {
    throw new TypeError('pathSeparator must not be empty');
  }
  const encoding: string = options.encoding ?? CPK_DEFAULT_ENCODING;
  assertEncoding(encoding);
  return { pathSeparator, encoding, decompressor: options.decompressor };
}

function* walkEntries(roots: readonly CpkEntry[]): Generator<CpkEntry> {
  const stack: CpkEntry[] = [...roots].reverse();
  let entry: CpkEntry | undefined;
  while ((entry = stack.pop()) !== undefined) {
    yield entry;
    for (let i = entry.children.length - 1; i >= 0; i--) {
      stack.push(entry.children[i]);
    }
  }
}

/**
 * A loaded view of one CPK archive.
 *
 * Construct it over a {@link ByteSource}, call {@link CpkArchive.load},
 * then query. Queries before the load completes throw
 * {@link NotLoadedError}. After loading, all state is read-only and the
 * session can serve any number of concurrent readers.
 */
export class CpkArchive {
  private readonly options: ResolvedLoadOptions;
  private loaded: LoadedArchive | undefined;
  private pending: Promise<void> | undefined;

  constructor(private readonly source: ByteSource, options: LoadOptions = {}) {
    this.options = resolveOptions(options);
  }

  /**
   * Opens a file-backed archive and loads it.
   *
   * @throws {FormatError} If the file is not a valid archive
   * @throws {ArchiveIOError} If the file cannot be read
   */
  static async open(filePath: string, options: LoadOptions = {}): Promise<CpkArchive> {
    const source: FileSource = await FileSource.open(filePath);
    try {
      const archive = new CpkArchive(source, options);
      await archive.load();
      return archive;
    } catch (error) {
      await source.close();
      throw error;
    }
  }

  /**
   * Wraps an in-memory archive and loads it.
   */
  static async fromBuffer(buffer: Buffer, options: LoadOptions = {}): Promise<CpkArchive> {
    const archive = new CpkArchive(new BufferSource(buffer), options);
    await archive.load();
    return archive;
  }

  get state(): ArchiveState {
    if (this.loaded) return 'loaded';
    return this.pending ? 'loading' : 'unloaded';
  }

  get header(): CpkHeader {
    return this.requireLoaded().header;
  }

  /**
   * Reads the header and table, builds the index and resolves names.
   * Concurrent calls share one pipeline; a failed load can be retried.
   *
   * @throws {FormatError} If the header is invalid; no table read happens
   * @throws {ArchiveIOError} If the table or a name block cannot be read
   */
  load(): Promise<void> {
    if (this.loaded) {
      return Promise.resolve();
    }
    if (!this.pending) {
      this.pending = this.runLoad().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async runLoad(): Promise<void> {
    const header: CpkHeader = await readHeader(this.source);
    const records: readonly CpkRecord[] = await readRecords(this.source, header);
    const index: RecordIndex = buildRecordIndex(records);
    const names: NameTable = await resolveNames(this.source, records, index, this.options.encoding);
    this.loaded = {
      header,
      context: { records, index, names, separator: this.options.pathSeparator }
    };
  }

  private requireLoaded(): LoadedArchive {
    if (!this.loaded) {
      throw new NotLoadedError();
    }
    return this.loaded;
  }

  /**
   * Builds a fresh snapshot of the top-level entries.
   */
  listRoot(): CpkEntry[] {
    return buildTree(this.requireLoaded().context);
  }

  /**
   * Entries directly inside a directory.
   *
   * @throws {NotFoundError} If the target does not exist
   * @throws {NotADirectoryError} If the target is a file
   */
  list(target: EntryTarget): CpkEntry[] {
    const { context } = this.requireLoaded();
    const record: CpkRecord = resolveRecord(context, this.options.encoding, target);
    if (!isDirectoryRecord(record)) {
      throw new NotADirectoryError(target);
    }
    return buildChildren(context, record.id, this.virtualPathOf(record));
  }

  /**
   * Depth-first walk over every reachable entry.
   *
   * @throws {NotLoadedError} At the call, if the archive is not loaded
   */
  entries(): Generator<CpkEntry> {
    return walkEntries(this.listRoot());
  }

  /**
   * Whether `path` names a live file or directory.
   */
  exists(path: string): boolean {
    const { context } = this.requireLoaded();
    try {
      resolveRecord(context, this.options.encoding, path);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Finds the live record behind a path or id.
   *
   * @throws {NotFoundError} If nothing matches
   */
  resolve(target: EntryTarget): CpkRecord {
    return resolveRecord(this.requireLoaded().context, this.options.encoding, target);
  }

  /**
   * Virtual path of a record, rebuilt from its parent chain.
   */
  virtualPathOf(record: CpkRecord): string {
    return pathOf(this.requireLoaded().context, record.id) ?? '';
  }

  /**
   * Opens an independent reader over a file's content.
   *
   * @throws {NotFoundError} If the target does not exist
   * @throws {IsADirectoryError} If the target is a directory
   * @throws {ArchiveIOError} If the payload cannot be read
   */
  open(target: EntryTarget): CpkContent {
    const record: CpkRecord = resolveFileRecord(this.requireLoaded().context, this.options.encoding, target);
    return openRecord(this.source, record, this.options.decompressor);
  }

  /**
   * Reads a file's whole content.
   */
  async read(target: EntryTarget): Promise<Buffer> {
    return readStream(this.open(target).stream);
  }

  /**
   * Releases the byte source. The session must not be used afterwards.
   */
  async close(): Promise<void> {
    await this.source.close();
  }

  /**
   * Normalizes a query path to the form used in entry paths.
   */
  normalize(path: string): string {
    return normalizePath(path, this.options.pathSeparator);
  }
}

/**
 * Loads an archive from a file path, a buffer, or a byte source.
 */
export async function loadArchive(source: string | Buffer | ByteSource, options: LoadOptions = {}): Promise<CpkArchive> {
  if (typeof source === 'string') {
    return CpkArchive.open(source, options);
  }
  if (Buffer.isBuffer(source)) {
    return CpkArchive.fromBuffer(source, options);
  }
  const archive = new CpkArchive(source, options);
  await archive.load();
  return archive;
}
