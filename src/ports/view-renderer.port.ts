import type { InternalEntry } from '../domain/entry.js';
import type { BufferId } from './host.port.js';

/**
 * A requested display column: a bare name, or a name plus column options.
 */
export type ColumnSpec = string | { readonly name: string; readonly [option: string]: unknown };

export function columnName(spec: ColumnSpec): string {
  return typeof spec === 'string' ? spec : spec.name;
}

/**
 * Port: text rendering of directory listings.
 */
export interface ViewRendererPort {
  /** Prepare a directory buffer (filetype, buftype). Safe to call more than once. */
  initialize(buf: BufferId): void;

  /** Replace the buffer text with one line per entry. */
  render(buf: BufferId, url: string, entries: readonly InternalEntry[]): void;

  setColumns(columns: readonly ColumnSpec[]): void;

  getColumns(): readonly ColumnSpec[];
}
