import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { formatEntryLine, formatId, parseLine, resolveLine, type ResolvedColumn } from '../../../src/domain/entry-parser.js';
import type { InternalEntry } from '../../../src/domain/entry.js';
import { compareEntries, isDirectoryLike } from '../../../src/domain/entry.js';
import type { ColumnDefinition } from '../../../src/ports/adapter.port.js';

const notes: InternalEntry = { id: '7', name: 'notes', type: 'directory' };
const cache = {
  getEntryById: (id: string): InternalEntry | undefined => (id === notes.id ? notes : undefined),
};

const tagColumn: ColumnDefinition = {
  render: (entry) => `[${entry.type[0] ?? '?'}]`,
  parse: (text) => {
    const match = /^\[(.)\] (.*)$/s.exec(text);
    return match ? { value: match[1] ?? '', rest: match[2] ?? '' } : undefined;
  },
};
const columns: readonly ResolvedColumn[] = [{ name: 'tag', definition: tagColumn }];

describe('formatEntryLine', () => {
  it('pads ids to three digits', () => {
    expect(formatId('7')).toBe('/007');
    expect(formatId('1234')).toBe('/1234');
  });

  it('marks directories with a trailing slash', () => {
    expect(formatEntryLine(notes, [])).toBe('/007 notes/');
  });

  it('renders links with their target', () => {
    const link: InternalEntry = { id: '12', name: 'current', type: 'link', meta: { linkTarget: '/opt/app' } };
    expect(formatEntryLine(link, [])).toBe('/012 current -> /opt/app');
  });

  it('puts columns between the id and the name', () => {
    expect(formatEntryLine({ id: '3', name: 'a.txt', type: 'file' }, columns)).toBe('/003 [f] a.txt');
  });
});

describe('parseLine', () => {
  it('reads id, name and type', () => {
    expect(parseLine('/007 notes/', [])).toEqual({ id: '7', name: 'notes', type: 'directory', columns: {} });
    expect(parseLine('/012 current -> /opt/app', [])).toEqual({ id: '12', name: 'current', type: 'link', columns: {} });
  });

  it('consumes each column', () => {
    expect(parseLine('/003 [f] a.txt', columns)).toEqual({ id: '3', name: 'a.txt', type: 'file', columns: { tag: 'f' } });
  });

  it('rejects lines that do not follow the grammar', () => {
    expect(parseLine('notes/', [])).toBeUndefined();
    expect(parseLine('/003 a.txt', columns)).toBeUndefined();
    expect(parseLine('/004 /', [])).toBeUndefined();
  });

  it('reads back what it rendered', () => {
    const name = fc.stringMatching(/^[a-z0-9_][a-z0-9._-]{0,11}$/);
    const type = fc.constantFrom('file' as const, 'directory' as const, 'socket' as const);
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 99999 }), name, type, (id, n, t) => {
        const line = formatEntryLine({ id: String(id), name: n, type: t }, []);
        const expectedType = t === 'directory' ? 'directory' : 'file';
        expect(parseLine(line, [])).toEqual({ id: String(id), name: n, type: expectedType, columns: {} });
      })
    );
  });
});

describe('resolveLine', () => {
  it('returns the cached record for a known id', () => {
    expect(resolveLine('/007 notes/', [], cache)).toEqual({ id: '7', name: 'notes', type: 'directory' });
  });

  it('treats an id that left the cache as new text', () => {
    expect(resolveLine('/042 archive/', [], cache)).toEqual({ name: 'archive', type: 'directory' });
  });

  it('reads typed text as a literal name', () => {
    expect(resolveLine('notes/', [], cache)).toEqual({ name: 'notes', type: 'directory' });
    expect(resolveLine('notes', [], cache)).toEqual({ name: 'notes', type: 'file' });
    expect(resolveLine('  todo.txt  ', [], cache)).toEqual({ name: 'todo.txt', type: 'file' });
  });

  it('yields nothing for blank lines', () => {
    expect(resolveLine('   ', [], cache)).toBeUndefined();
    expect(resolveLine('', [], cache)).toBeUndefined();
  });
});

describe('entries', () => {
  it('sorts directories first, then by code point', () => {
    const sorted = [
      { name: 'b.txt', type: 'file' as const },
      { name: 'Zed', type: 'directory' as const },
      { name: 'a.txt', type: 'file' as const },
      { name: 'alpha', type: 'directory' as const },
      { name: 'B.txt', type: 'file' as const },
    ].sort(compareEntries);
    expect(sorted.map((e) => e.name)).toEqual(['Zed', 'alpha', 'B.txt', 'a.txt', 'b.txt']);
  });

  it('treats links to directories as directories', () => {
    expect(isDirectoryLike({ name: 'l', type: 'link', meta: { linkStat: { type: 'directory' } } })).toBe(true);
    expect(isDirectoryLike({ name: 'l', type: 'link', meta: { linkStat: { type: 'file' } } })).toBe(false);
    expect(isDirectoryLike({ name: 'd', type: 'directory' })).toBe(true);
  });
});
