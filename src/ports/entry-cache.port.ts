import type { InternalEntry, RawEntry } from '../domain/entry.js';

/**
 * Port: in-memory directory-entry cache.
 *
 * Owned outside the lifecycle controller. The engine reads it to resolve
 * rendered ids and to detect name collisions before entering a directory.
 */
export interface EntryCachePort {
  /** Cached children of a directory address, keyed by name. Empty when never listed. */
  listUrl(url: string): ReadonlyMap<string, InternalEntry>;

  getEntryById(id: string): InternalEntry | undefined;

  /** Replace the cached listing of `url`, assigning ids. Returns the stored entries. */
  storeListing(url: string, entries: readonly RawEntry[]): readonly InternalEntry[];

  clear(url: string): void;
}
