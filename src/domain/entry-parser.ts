import type { Entry, EntryType, InternalEntry } from './entry.js';
import { exportEntry } from './entry.js';
import type { AdapterPort, ColumnDefinition } from '../ports/adapter.port.js';
import type { EntryCachePort } from '../ports/entry-cache.port.js';
import type { ColumnSpec } from '../ports/view-renderer.port.js';
import { columnName } from '../ports/view-renderer.port.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Listing line grammar:
 *
 *   /<id> <column₁> … <columnₙ> <name>[/| -> <target>]
 *
 * The id is what ties a line back to a backend record. Lines the user types
 * have no id and are read as literal names.
 */

export interface ResolvedColumn {
  readonly name: string;
  readonly definition: ColumnDefinition;
}

export interface ParsedLine {
  readonly id: string;
  readonly name: string;
  /** Type implied by the text alone (trailing slash, link arrow) */
  readonly type: EntryType;
  readonly columns: Readonly<Record<string, string>>;
}

const ID_WIDTH = 3;
const ID_PATTERN = /^\/(\d+) (.*)$/s;
const LINK_ARROW = ' -> ';

/**
 * Columns of `specs` the adapter knows how to render, in order.
 */
export function supportedColumns(adapter: AdapterPort, specs: readonly ColumnSpec[]): readonly ResolvedColumn[] {
  const resolved: ResolvedColumn[] = [];
  for (const spec of specs) {
    const name = columnName(spec);
    const definition = adapter.getColumn(name);
    if (definition) resolved.push({ name, definition });
  }
  return resolved;
}

export function formatId(id: string): string {
  return `/${id.padStart(ID_WIDTH, '0')}`;
}

export function formatEntryLine(entry: InternalEntry, columns: readonly ResolvedColumn[]): string {
  const parts = [formatId(entry.id)];
  for (const column of columns) {
    parts.push(column.definition.render(entry));
  }
  parts.push(displayName(entry));
  return parts.join(' ');
}

function displayName(entry: InternalEntry): string {
  switch (entry.type) {
    case 'directory':
      return `${entry.name}/`;
    case 'link': {
      const target = entry.meta?.linkTarget;
      return target === undefined ? entry.name : `${entry.name}${LINK_ARROW}${target}`;
    }
    case 'file':
    case 'socket':
      return entry.name;
    default:
      return assertNever(entry.type);
  }
}

/**
 * Structured parse of one line. Undefined when the line does not follow the grammar.
 */
export function parseLine(line: string, columns: readonly ResolvedColumn[]): ParsedLine | undefined {
  const match = ID_PATTERN.exec(line);
  if (!match) return undefined;

  const id = String(Number.parseInt(match[1] ?? '', 10));
  let rest = match[2] ?? '';
  const values: Record<string, string> = {};
  for (const column of columns) {
    const parsed = column.definition.parse(rest);
    if (!parsed) return undefined;
    values[column.name] = parsed.value;
    rest = parsed.rest;
  }

  let name = rest;
  let type: EntryType = 'file';
  if (name.endsWith('/')) {
    name = name.slice(0, -1);
    type = 'directory';
  } else {
    const arrow = name.indexOf(LINK_ARROW);
    if (arrow >= 0) {
      name = name.slice(0, arrow);
      type = 'link';
    }
  }
  if (name === '') return undefined;

  return { id, name, type, columns: values };
}

/**
 * Resolve a line to an entry.
 *
 * 1. A line that follows the grammar and whose id is still cached yields the
 *    cached record (with `id`).
 * 2. A line that follows the grammar but whose id has left the cache yields the
 *    parsed name and type with no id: it is treated as new text.
 * 3. Anything else is a literal name; a trailing `/` makes it a directory.
 *    Blank lines yield nothing.
 */
export function resolveLine(
  line: string,
  columns: readonly ResolvedColumn[],
  cache: Pick<EntryCachePort, 'getEntryById'>
): Entry | undefined {
  const parsed = parseLine(line, columns);
  if (parsed) {
    const cached = cache.getEntryById(parsed.id);
    if (cached) return exportEntry(cached);
    return { name: parsed.name, type: parsed.type };
  }

  let name = line.trim();
  let type: EntryType = 'file';
  if (name.endsWith('/')) {
    name = name.slice(0, -1);
    type = 'directory';
  }
  if (name === '') return undefined;
  return { name, type };
}
