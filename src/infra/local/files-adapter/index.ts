import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync, ResultAsync as RA } from 'neverthrow';
import type { AdapterFailedError, AdapterOperation } from '../../../errors/app-error.js';
import { Err } from '../../../errors/factories.js';
import type { EntryMeta, EntryType, InternalEntry, RawEntry } from '../../../domain/entry.js';
import { addslash, fromHostPath, isDirectoryUrl, parseUrl, stripSlash, toHostPath } from '../../../domain/url.js';
import { FILES_ADAPTER } from '../../../config/app-config.js';
import type { AdapterPort, ColumnDefinition } from '../../../ports/adapter.port.js';
import type { FileSystemPort, FsDirent, FsError } from '../../../ports/fs.port.js';
import type { BufferId, HostPort } from '../../../ports/host.port.js';

/** The slice of the host this adapter reads and writes buffer text through */
export type FilesAdapterHost = Pick<
  HostPort,
  'isBufferValid' | 'getBufferName' | 'getLines' | 'setLines' | 'lineCount' | 'setModified'
>;

const SIZE_WIDTH = 5;

export function formatSize(size: number | undefined): string {
  if (size === undefined) return '-';
  if (size >= 1e9) return `${(size / 1e9).toFixed(1)}G`;
  if (size >= 1e6) return `${(size / 1e6).toFixed(1)}M`;
  if (size >= 1e3) return `${(size / 1e3).toFixed(1)}k`;
  return String(size);
}

const sizeColumn: ColumnDefinition = {
  render: (entry: InternalEntry) =>
    formatSize(entry.type === 'directory' ? undefined : entry.meta?.size).padStart(SIZE_WIDTH),
  parse: (text: string) => {
    const match = /^\s*(\S+) (.*)$/s.exec(text);
    if (!match) return undefined;
    return { value: match[1] ?? '', rest: match[2] ?? '' };
  },
};

const COLUMNS: Readonly<Record<string, ColumnDefinition>> = { size: sizeColumn };

/**
 * Local filesystem adapter. Addresses carry normalized slash paths; the
 * filesystem port sees host paths.
 */
export class LocalFilesAdapter implements AdapterPort {
  readonly name = FILES_ADAPTER;

  constructor(
    private readonly fs: FileSystemPort,
    private readonly host: FilesAdapterHost
  ) {}

  list(url: string): ResultAsync<readonly RawEntry[], AdapterFailedError> {
    const dir = this.hostPathOf(url);
    return this.fs
      .readdir(dir)
      .mapErr((e) => this.fail('list', e, url))
      .andThen((dirents) => RA.combine(dirents.map((d) => this.describe(dir, d))));
  }

  isModifiable(_buf: BufferId): boolean {
    return true;
  }

  getColumn(name: string): ColumnDefinition | undefined {
    return COLUMNS[name];
  }

  /**
   * Absolute address; an existing directory gets a trailing slash, an existing
   * file loses it, and a missing path keeps whatever the caller wrote.
   */
  normalizeUrl(url: string): ResultAsync<string, AdapterFailedError> {
    const parsed = parseUrl(url);
    if (!parsed) return errAsync(Err.adapterFailed(this.name, 'normalize', 'not an address', url));

    const absolute = path.resolve(toHostPath(parsed.path));
    const normalized = fromHostPath(absolute);
    return this.fs
      .stat(absolute)
      .map((stat) => (stat.kind === 'directory' ? addslash(normalized) : stripSlash(normalized)))
      .orElse((e): ResultAsync<string, AdapterFailedError> => {
        if (e.code !== 'FS_NOT_FOUND') return errAsync(this.fail('normalize', e, url));
        return okAsync(isDirectoryUrl(parsed.path) ? addslash(normalized) : normalized);
      })
      .map((normalizedPath) => parsed.scheme + normalizedPath);
  }

  /** A file that does not exist yet reads as one empty line */
  readFile(buf: BufferId): ResultAsync<void, AdapterFailedError> {
    const url = this.host.getBufferName(buf);
    return this.fs
      .readFileUtf8(this.hostPathOf(url))
      .orElse((e): ResultAsync<string, FsError> => (e.code === 'FS_NOT_FOUND' ? okAsync('') : errAsync(e)))
      .mapErr((e) => this.fail('read', e, url))
      .map((text) => {
        if (!this.stillShows(buf, url)) return;
        this.host.setLines(buf, splitLines(text));
        this.host.setModified(buf, false);
      });
  }

  writeFile(buf: BufferId): ResultAsync<void, AdapterFailedError> {
    const url = this.host.getBufferName(buf);
    const text = `${this.host.getLines(buf, 0, this.host.lineCount(buf)).join('\n')}\n`;
    return this.fs
      .writeFileUtf8(this.hostPathOf(url), text)
      .mapErr((e) => this.fail('write', e, url))
      .map(() => {
        if (this.stillShows(buf, url)) this.host.setModified(buf, false);
      });
  }

  /** A buffer wiped or renamed while the fs call was in flight is left alone */
  private stillShows(buf: BufferId, url: string): boolean {
    return this.host.isBufferValid(buf) && this.host.getBufferName(buf) === url;
  }

  private describe(dir: string, dirent: FsDirent): ResultAsync<RawEntry, AdapterFailedError> {
    const fullPath = path.join(dir, dirent.name);
    const type: EntryType = dirent.kind;
    // An entry removed between readdir and lstat is listed without metadata
    const base = this.fs
      .lstat(fullPath)
      .map((stat): EntryMeta => ({ size: stat.sizeBytes, mtimeMs: stat.mtimeMs }))
      .orElse(() => okAsync<EntryMeta, never>({}));

    if (type !== 'link') {
      return base.map((meta): RawEntry => ({ name: dirent.name, type, meta }));
    }

    // A dangling link has no target kind; one we cannot read has no target text
    const linkTarget = this.fs
      .readlink(fullPath)
      .map((target): string | undefined => target)
      .orElse(() => okAsync<string | undefined, never>(undefined));
    const targetKind = this.fs
      .stat(fullPath)
      .map((stat): EntryType | undefined => stat.kind)
      .orElse(() => okAsync<EntryType | undefined, never>(undefined));

    return base.andThen((meta) =>
      linkTarget.andThen((target) =>
        targetKind.map((kind): RawEntry => {
          let linkMeta: EntryMeta = meta;
          if (target !== undefined) linkMeta = { ...linkMeta, linkTarget: target };
          if (kind !== undefined) linkMeta = { ...linkMeta, linkStat: { type: kind } };
          return { name: dirent.name, type, meta: linkMeta };
        })
      )
    );
  }

  private hostPathOf(url: string): string {
    const parsed = parseUrl(url);
    return toHostPath(parsed ? parsed.path : url);
  }

  private fail(operation: AdapterOperation, error: FsError, url: string): AdapterFailedError {
    return Err.adapterFailed(this.name, operation, error.message, url);
  }
}

function splitLines(text: string): readonly string[] {
  if (text === '') return [''];
  const lines = text.split('\n');
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}
