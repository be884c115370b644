import { describe, it, expect, beforeEach } from 'vitest';
import { ResultAsync } from 'neverthrow';
import type { FsError } from '../../../src/ports/fs.port.js';
import { LocalFilesAdapter, formatSize } from '../../../src/infra/local/files-adapter/index.js';
import { InMemoryFileSystem, InMemoryHost } from '../../fakes/engine/index.js';

/** Holds every read and write until open() is called */
class GatedFileSystem extends InMemoryFileSystem {
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }

  override readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return ResultAsync.fromSafePromise(this.gate).andThen(() => super.readFileUtf8(filePath));
  }

  override writeFileUtf8(filePath: string, text: string): ResultAsync<void, FsError> {
    return ResultAsync.fromSafePromise(this.gate).andThen(() => super.writeFileUtf8(filePath, text));
  }
}

describe('formatSize', () => {
  it('abbreviates large sizes', () => {
    expect(formatSize(undefined)).toBe('-');
    expect(formatSize(512)).toBe('512');
    expect(formatSize(1500)).toBe('1.5k');
    expect(formatSize(2_500_000)).toBe('2.5M');
    expect(formatSize(3e9)).toBe('3.0G');
  });
});

describe('LocalFilesAdapter', () => {
  let fs: InMemoryFileSystem;
  let host: InMemoryHost;
  let adapter: LocalFilesAdapter;

  beforeEach(() => {
    fs = new InMemoryFileSystem()
      .file('/srv/app/readme.md', 'hello\n')
      .mkdir('/srv/app/lib')
      .symlink('/srv/app/current', 'lib')
      .symlink('/srv/app/broken', 'missing')
      .socket('/srv/app/sock');
    host = new InMemoryHost();
    adapter = new LocalFilesAdapter(fs, host);
  });

  describe('list', () => {
    it('describes every child with its metadata', async () => {
      const entries = (await adapter.list('burrow:///srv/app/'))._unsafeUnwrap();

      expect(entries).toEqual([
        { name: 'readme.md', type: 'file', meta: { size: 6, mtimeMs: 0 } },
        { name: 'lib', type: 'directory', meta: { size: 4096, mtimeMs: 0 } },
        {
          name: 'current',
          type: 'link',
          meta: { size: 3, mtimeMs: 0, linkTarget: 'lib', linkStat: { type: 'directory' } },
        },
        { name: 'broken', type: 'link', meta: { size: 7, mtimeMs: 0, linkTarget: 'missing' } },
        { name: 'sock', type: 'socket', meta: { size: 0, mtimeMs: 0 } },
      ]);
    });

    it('fails for a missing directory', async () => {
      const error = (await adapter.list('burrow:///nope/'))._unsafeUnwrapErr();
      expect(error).toEqual({
        _tag: 'AdapterFailed',
        adapter: 'files',
        operation: 'list',
        url: 'burrow:///nope/',
        message: 'Not found: /nope',
      });
    });

    it('fails for a directory it may not read', async () => {
      fs.deny('/srv/app/lib');
      const error = (await adapter.list('burrow:///srv/app/lib/'))._unsafeUnwrapErr();
      expect(error.message).toBe('Permission denied: /srv/app/lib');
    });
  });

  describe('normalizeUrl', () => {
    it('adds a slash to directories and removes it from files', async () => {
      expect((await adapter.normalizeUrl('burrow:///srv/app'))._unsafeUnwrap()).toBe('burrow:///srv/app/');
      expect((await adapter.normalizeUrl('burrow:///srv/app/readme.md/'))._unsafeUnwrap()).toBe(
        'burrow:///srv/app/readme.md'
      );
    });

    it('follows links to directories', async () => {
      expect((await adapter.normalizeUrl('burrow:///srv/app/current'))._unsafeUnwrap()).toBe(
        'burrow:///srv/app/current/'
      );
    });

    it('resolves dot segments and keeps the caller slash for missing paths', async () => {
      expect((await adapter.normalizeUrl('burrow:///srv/app/../app/new/'))._unsafeUnwrap()).toBe(
        'burrow:///srv/app/new/'
      );
      expect((await adapter.normalizeUrl('burrow:///srv/app/new.txt'))._unsafeUnwrap()).toBe(
        'burrow:///srv/app/new.txt'
      );
    });

    it('rejects text that is not an address', async () => {
      const error = (await adapter.normalizeUrl('/srv/app'))._unsafeUnwrapErr();
      expect(error.operation).toBe('normalize');
      expect(error.message).toBe('not an address');
    });
  });

  describe('files', () => {
    it('reads text into the buffer without its final newline', async () => {
      const buf = host.addBuffer('burrow:///srv/app/readme.md');
      (await adapter.readFile(buf))._unsafeUnwrap();
      expect(host.getLines(buf, 0, host.lineCount(buf))).toEqual(['hello']);
      expect(host.isModified(buf)).toBe(false);
    });

    it('reads a missing file as empty', async () => {
      const buf = host.addBuffer('burrow:///srv/app/new.txt');
      (await adapter.readFile(buf))._unsafeUnwrap();
      expect(host.getLines(buf, 0, host.lineCount(buf))).toEqual(['']);
    });

    it('writes buffer lines with a final newline', async () => {
      const buf = host.addBuffer('burrow:///srv/app/out.txt');
      host.typeLines(buf, ['a', 'b']);

      (await adapter.writeFile(buf))._unsafeUnwrap();

      expect(fs.writes).toEqual([{ path: '/srv/app/out.txt', text: 'a\nb\n' }]);
      expect(host.isModified(buf)).toBe(false);
    });

    it('keeps the buffer modified when the write is refused', async () => {
      fs.deny('/srv/app/locked.txt');
      const buf = host.addBuffer('burrow:///srv/app/locked.txt');
      host.typeLines(buf, ['secret']);

      const error = (await adapter.writeFile(buf))._unsafeUnwrapErr();

      expect(error.operation).toBe('write');
      expect(error.message).toBe('Permission denied: /srv/app/locked.txt');
      expect(host.isModified(buf)).toBe(true);
    });
  });

  describe('buffers that go away mid-call', () => {
    let gated: GatedFileSystem;

    beforeEach(() => {
      gated = new GatedFileSystem();
      gated.file('/srv/app/readme.md', 'hello\n');
      adapter = new LocalFilesAdapter(gated, host);
    });

    it('drops a read for a buffer wiped while the file loads', async () => {
      const buf = host.addBuffer('burrow:///srv/app/readme.md');
      const pending = adapter.readFile(buf);
      host.deleteBuffer(buf, { force: true });
      gated.open();

      expect((await pending).isOk()).toBe(true);
      expect(host.isBufferValid(buf)).toBe(false);
    });

    it('does not fill a buffer renamed while the file loads', async () => {
      const buf = host.addBuffer('burrow:///srv/app/readme.md');
      const pending = adapter.readFile(buf);
      host.renameBuffer(buf, 'burrow:///srv/app/other.md');
      gated.open();

      expect((await pending).isOk()).toBe(true);
      expect(host.getLines(buf, 0, host.lineCount(buf))).toEqual(['']);
    });

    it('still writes the file for a buffer wiped mid-write', async () => {
      const buf = host.addBuffer('burrow:///srv/app/out.txt');
      host.typeLines(buf, ['a']);
      const pending = adapter.writeFile(buf);
      host.deleteBuffer(buf, { force: true });
      gated.open();

      expect((await pending).isOk()).toBe(true);
      expect(gated.writes).toEqual([{ path: '/srv/app/out.txt', text: 'a\n' }]);
    });
  });

  describe('size column', () => {
    it('renders right-aligned sizes and parses them back', () => {
      const column = adapter.getColumn('size');
      expect(column?.render({ id: '1', name: 'a.txt', type: 'file', meta: { size: 1500 } })).toBe(' 1.5k');
      expect(column?.render({ id: '2', name: 'lib', type: 'directory', meta: { size: 4096 } })).toBe('    -');
      expect(column?.parse(' 1.5k a.txt')).toEqual({ value: '1.5k', rest: 'a.txt' });
      expect(column?.parse('a.txt')).toBeUndefined();
    });

    it('has no other columns', () => {
      expect(adapter.getColumn('permissions')).toBeUndefined();
    });
  });
});
