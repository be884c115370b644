export type EntryType = 'file' | 'directory' | 'socket' | 'link';

/**
 * Backend-specific attributes. Adapters put whatever they know here;
 * the engine only reads `linkStat` (to treat links to directories as directories).
 */
export interface EntryMeta {
  readonly size?: number;
  readonly mtimeMs?: number;
  readonly linkTarget?: string;
  readonly linkStat?: { readonly type: EntryType };
  readonly [key: string]: unknown;
}

/**
 * Public entry shape. `id` is absent for text the user typed that has not been persisted yet.
 */
export interface Entry {
  readonly name: string;
  readonly type: EntryType;
  readonly id?: string;
  readonly meta?: EntryMeta;
}

/**
 * What an adapter reports for one child of a listed directory.
 */
export interface RawEntry {
  readonly name: string;
  readonly type: EntryType;
  readonly meta?: EntryMeta;
}

/**
 * A raw entry after the entry cache assigned it an id.
 */
export interface InternalEntry extends RawEntry {
  readonly id: string;
}

export function exportEntry(entry: InternalEntry): Entry {
  return entry.meta === undefined
    ? { id: entry.id, name: entry.name, type: entry.type }
    : { id: entry.id, name: entry.name, type: entry.type, meta: entry.meta };
}

/**
 * Directories, and links whose target is a directory, are navigated into as directories.
 */
export function isDirectoryLike(entry: Entry): boolean {
  if (entry.type === 'directory') return true;
  return entry.type === 'link' && entry.meta?.linkStat?.type === 'directory';
}

/**
 * Listing order: directories first, then by name (code-point order).
 */
export function compareEntries(a: RawEntry, b: RawEntry): number {
  const aDir = a.type === 'directory' ? 0 : 1;
  const bDir = b.type === 'directory' ? 0 : 1;
  if (aDir !== bDir) return aDir - bDir;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
