import type { ResultAsync } from 'neverthrow';
import type { AdapterFailedError } from '../errors/app-error.js';
import type { EntryType, InternalEntry, RawEntry } from '../domain/entry.js';
import type { BufferId } from './host.port.js';

/**
 * One display column of the listing grammar.
 *
 * `render` produces the column text for an entry; `parse` consumes the column
 * from the front of a line and hands back the remainder (undefined = no match).
 */
export interface ColumnDefinition {
  render(entry: InternalEntry): string;
  parse(text: string): { readonly value: string; readonly rest: string } | undefined;
}

/**
 * A filesystem mutation computed by the external mutator, as adapters see it.
 */
export type AdapterAction =
  | { readonly type: 'create'; readonly url: string; readonly entryType: EntryType }
  | { readonly type: 'delete'; readonly url: string; readonly entryType: EntryType }
  | { readonly type: 'move'; readonly srcUrl: string; readonly destUrl: string; readonly entryType: EntryType }
  | { readonly type: 'copy'; readonly srcUrl: string; readonly destUrl: string; readonly entryType: EntryType }
  | { readonly type: 'change'; readonly url: string; readonly column: string; readonly value: string };

/**
 * Port: storage backend for one scheme.
 *
 * Adapters are long-lived shared singletons; the engine never mutates them.
 * Every slow operation returns a ResultAsync so the engine can re-check
 * liveness when it resolves.
 */
export interface AdapterPort {
  readonly name: string;

  /** List the children of a directory address. */
  list(url: string): ResultAsync<readonly RawEntry[], AdapterFailedError>;

  isModifiable(buf: BufferId): boolean;

  getColumn(name: string): ColumnDefinition | undefined;

  /** Resolve an address to its canonical form (absolute, directory → trailing slash). */
  normalizeUrl(url: string): ResultAsync<string, AdapterFailedError>;

  /** Populate a file buffer from the backend. */
  readFile(buf: BufferId): ResultAsync<void, AdapterFailedError>;

  /** Persist a file buffer to the backend. */
  writeFile(buf: BufferId): ResultAsync<void, AdapterFailedError>;

  getParent?(url: string): string;

  /** Adapter names this adapter can copy/move entries to. */
  readonly supportsTransfer?: Readonly<Record<string, boolean>>;

  renderAction?(action: AdapterAction): string;

  performAction?(action: AdapterAction): ResultAsync<void, AdapterFailedError>;
}
