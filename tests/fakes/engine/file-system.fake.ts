/**
 * In-memory fake for the filesystem port.
 *
 * Paths are posix host paths. Directories exist implicitly for every parent of
 * a file, and explicitly through mkdir(). Symlinks store their target text and
 * resolve it (absolute or relative to the link's directory) for stat().
 */

import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { FileSystemPort, FsDirent, FsError, FsStat } from '../../../src/ports/fs.port.js';

type Node =
  | { readonly kind: 'file'; readonly text: string; readonly mtimeMs: number }
  | { readonly kind: 'directory'; readonly mtimeMs: number }
  | { readonly kind: 'socket'; readonly mtimeMs: number }
  | { readonly kind: 'link'; readonly target: string; readonly mtimeMs: number };

export class InMemoryFileSystem implements FileSystemPort {
  readonly writes: Array<{ readonly path: string; readonly text: string }> = [];
  private readonly nodes = new Map<string, Node>([['/', { kind: 'directory', mtimeMs: 0 }]]);
  private readonly denied = new Set<string>();

  mkdir(dirPath: string): this {
    this.ensureParents(dirPath);
    this.nodes.set(normalize(dirPath), { kind: 'directory', mtimeMs: 0 });
    return this;
  }

  file(filePath: string, text: string): this {
    this.ensureParents(filePath);
    this.nodes.set(normalize(filePath), { kind: 'file', text, mtimeMs: 0 });
    return this;
  }

  socket(filePath: string): this {
    this.ensureParents(filePath);
    this.nodes.set(normalize(filePath), { kind: 'socket', mtimeMs: 0 });
    return this;
  }

  symlink(linkPath: string, target: string): this {
    this.ensureParents(linkPath);
    this.nodes.set(normalize(linkPath), { kind: 'link', target, mtimeMs: 0 });
    return this;
  }

  deny(path: string): this {
    this.denied.add(normalize(path));
    return this;
  }

  readdir(dirPath: string): ResultAsync<readonly FsDirent[], FsError> {
    const dir = normalize(dirPath);
    const blocked = this.check(dir);
    if (blocked) return errAsync(blocked);
    const node = this.nodes.get(dir);
    if (!node) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${dir}` });
    if (node.kind !== 'directory') return errAsync({ code: 'FS_NOT_A_DIRECTORY', message: `Not a directory: ${dir}` });

    const prefix = dir === '/' ? '/' : `${dir}/`;
    const children: FsDirent[] = [];
    for (const [path, child] of this.nodes) {
      if (path === dir || !path.startsWith(prefix)) continue;
      const name = path.slice(prefix.length);
      if (name.includes('/')) continue;
      children.push({ name, kind: child.kind });
    }
    return okAsync(children);
  }

  stat(filePath: string): ResultAsync<FsStat, FsError> {
    const resolved = this.resolveLinks(normalize(filePath), 0);
    if (resolved === undefined) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` });
    return this.lstat(resolved);
  }

  lstat(filePath: string): ResultAsync<FsStat, FsError> {
    const path = normalize(filePath);
    const node = this.nodes.get(path);
    if (!node) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${path}` });
    return okAsync({ kind: node.kind, sizeBytes: sizeOf(node), mtimeMs: node.mtimeMs });
  }

  readlink(linkPath: string): ResultAsync<string, FsError> {
    const node = this.nodes.get(normalize(linkPath));
    if (!node) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${linkPath}` });
    if (node.kind !== 'link') return errAsync({ code: 'FS_IO_ERROR', message: `Not a link: ${linkPath}` });
    return okAsync(node.target);
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    const path = normalize(filePath);
    const blocked = this.check(path);
    if (blocked) return errAsync(blocked);
    const node = this.nodes.get(path);
    if (!node) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${path}` });
    if (node.kind !== 'file') return errAsync({ code: 'FS_IO_ERROR', message: `Not a file: ${path}` });
    return okAsync(node.text);
  }

  writeFileUtf8(filePath: string, text: string): ResultAsync<void, FsError> {
    const path = normalize(filePath);
    const blocked = this.check(path);
    if (blocked) return errAsync(blocked);
    this.file(path, text);
    this.writes.push({ path, text });
    return okAsync(undefined);
  }

  private check(path: string): FsError | undefined {
    return this.denied.has(path) ? { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${path}` } : undefined;
  }

  private resolveLinks(path: string, depth: number): string | undefined {
    const node = this.nodes.get(path);
    if (!node || depth > 8) return undefined;
    if (node.kind !== 'link') return path;
    const target = node.target.startsWith('/') ? node.target : `${parentOf(path)}/${node.target}`;
    return this.resolveLinks(normalize(target), depth + 1);
  }

  private ensureParents(path: string): void {
    let parent = parentOf(normalize(path));
    while (parent !== '/' && !this.nodes.has(parent)) {
      this.nodes.set(parent, { kind: 'directory', mtimeMs: 0 });
      parent = parentOf(parent);
    }
  }
}

function normalize(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

function parentOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index <= 0 ? '/' : path.slice(0, index);
}

function sizeOf(node: Node): number {
  switch (node.kind) {
    case 'file':
      return node.text.length;
    case 'link':
      return node.target.length;
    case 'directory':
      return 4096;
    case 'socket':
      return 0;
  }
}
