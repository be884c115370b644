import type { InternalEntry, RawEntry } from '../../../domain/entry.js';
import type { EntryCachePort } from '../../../ports/entry-cache.port.js';

/**
 * Listings keyed by directory address.
 *
 * Ids are handed out from one counter per cache and stick to `url + name`, so
 * re-listing a directory keeps every surviving entry's id.
 */
export class InMemoryEntryCache implements EntryCachePort {
  private nextId = 1;
  private readonly listings = new Map<string, Map<string, InternalEntry>>();
  private readonly byId = new Map<string, InternalEntry>();
  private readonly idsByUrl = new Map<string, Map<string, string>>();

  listUrl(url: string): ReadonlyMap<string, InternalEntry> {
    return this.listings.get(url) ?? new Map();
  }

  getEntryById(id: string): InternalEntry | undefined {
    return this.byId.get(id);
  }

  storeListing(url: string, entries: readonly RawEntry[]): readonly InternalEntry[] {
    const ids = this.idsByUrl.get(url) ?? new Map<string, string>();
    this.idsByUrl.set(url, ids);
    this.dropListing(url);

    const listing = new Map<string, InternalEntry>();
    for (const raw of entries) {
      let id = ids.get(raw.name);
      if (id === undefined) {
        id = String(this.nextId++);
        ids.set(raw.name, id);
      }
      const entry: InternalEntry = { ...raw, id };
      listing.set(raw.name, entry);
      this.byId.set(id, entry);
    }
    this.listings.set(url, listing);
    return [...listing.values()];
  }

  clear(url: string): void {
    this.dropListing(url);
    this.listings.delete(url);
  }

  private dropListing(url: string): void {
    for (const entry of this.listings.get(url)?.values() ?? []) {
      this.byId.delete(entry.id);
    }
  }
}
