/**
 * Virtual directory tree reconstruction.
 *
 * The table only stores parent pointers. Children are found through the
 * adjacency built by the index, and paths are joined from decoded names.
 */
import { CPK_ROOT_ID } from './constants/cpk-format.js';
import { findRecord, type RecordIndex } from './index-builder.js';
import type { NameTable } from './name-resolver.js';
import { isDirectoryRecord, isLargeFileRecord } from './record-store.js';
import type { CpkEntry } from './types/cpk-entry.js';
import type { CpkRecord } from './types/cpk-record.js';

export interface TreeContext {
  readonly records: readonly CpkRecord[];
  readonly index: RecordIndex;
  readonly names: NameTable;
  readonly separator: string;
}

/**
 * Lower-cased name of a record, or an empty string when it has none.
 */
export function entryName(context: TreeContext, id: number): string {
  return (context.names.names.get(id) ?? '').toLowerCase();
}

export function joinPath(parentPath: string, name: string, separator: string): string {
  return parentPath === '' ? name : parentPath + separator + name;
}

/**
 * Builds the entries below `parentId`, recursing into directories.
 *
 * @param ancestors - Ids on the current descent, used to cut parent cycles
 */
export function buildChildren(
  context: TreeContext,
  parentId: number,
  parentPath: string,
  ancestors: ReadonlySet<number> = new Set([parentId])
): CpkEntry[] {
  const childIds: ReadonlySet<number> | undefined = context.index.childrenByParent.get(parentId);
  if (!childIds) {
    return [];
  }

  const entries: CpkEntry[] = [];
  for (const childId of childIds) {
    const record: CpkRecord | undefined = findRecord(context.index, context.records, childId);
    if (!record) continue;

    if (ancestors.has(childId)) {
      console.warn(`Skipping record ${childId} under ${parentPath || '<root>'}: it is its own ancestor`);
      continue;
    }

    const name: string = entryName(context, childId);
    const virtualPath: string = joinPath(parentPath, name, context.separator);
    const isDirectory: boolean = isDirectoryRecord(record);
    const children: CpkEntry[] = isDirectory
      ? buildChildren(context, childId, virtualPath, new Set([...ancestors, childId]))
      : [];

    entries.push(Object.freeze({
      virtualPath,
      name,
      isDirectory,
      isLargeFile: isLargeFileRecord(record),
      record,
      children: Object.freeze(children)
    }));
  }
  return entries;
}

/**
 * Top-level entries: the children of the synthetic root.
 */
export function buildTree(context: TreeContext): CpkEntry[] {
  return buildChildren(context, CPK_ROOT_ID, '');
}

/**
 * Walks `components` down from the root by name.
 * @returns The matching record id, or undefined
 */
export function findIdByComponents(context: TreeContext, components: readonly string[]): number | undefined {
  let currentId: number = CPK_ROOT_ID;
  for (const component of components) {
    const childIds: ReadonlySet<number> | undefined = context.index.childrenByParent.get(currentId);
    if (!childIds) {
      return undefined;
    }
    let nextId: number | undefined;
    for (const childId of childIds) {
      if (childId !== currentId && entryName(context, childId) === component) {
        nextId = childId;
        break;
      }
    }
    if (nextId === undefined) {
      return undefined;
    }
    currentId = nextId;
  }
  return currentId;
}

/**
 * Rebuilds the virtual path of a record by following parent ids up to the root.
 * @returns The path, or undefined if the chain is broken or cyclic
 */
export function pathOf(context: TreeContext, id: number): string | undefined {
  const names: string[] = [];
  const seen = new Set<number>();
  let currentId: number = id;
  while (currentId !== CPK_ROOT_ID) {
    if (seen.has(currentId)) {
      return undefined;
    }
    seen.add(currentId);
    const record: CpkRecord | undefined = findRecord(context.index, context.records, currentId);
    if (!record) {
      return undefined;
    }
    names.unshift(entryName(context, currentId));
    currentId = record.parentId;
  }
  return names.join(context.separator);
}
