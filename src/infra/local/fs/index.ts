import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileSystemPort, FsDirent, FsError, FsNodeKind, FsStat } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'ENOTDIR') return { code: 'FS_NOT_A_DIRECTORY', message: `Not a directory: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

function kindOf(entry: { isDirectory(): boolean; isSymbolicLink(): boolean; isSocket(): boolean }): FsNodeKind {
  if (entry.isSymbolicLink()) return 'link';
  if (entry.isDirectory()) return 'directory';
  if (entry.isSocket()) return 'socket';
  return 'file';
}

function toStat(stats: Stats): FsStat {
  return { kind: kindOf(stats), sizeBytes: stats.size, mtimeMs: stats.mtimeMs };
}

/**
 * FileSystemPort over fs/promises.
 */
export class NodeFileSystem implements FileSystemPort {
  readdir(dirPath: string): ResultAsync<readonly FsDirent[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).map((dirents) =>
      dirents.map((d) => ({ name: d.name, kind: kindOf(d) }))
    );
  }

  stat(filePath: string): ResultAsync<FsStat, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map(toStat);
  }

  lstat(filePath: string): ResultAsync<FsStat, FsError> {
    return RA.fromPromise(fs.lstat(filePath), (e) => mapFsError(e, filePath)).map(toStat);
  }

  readlink(linkPath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readlink(linkPath), (e) => mapFsError(e, linkPath));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  writeFileUtf8(filePath: string, text: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, text, 'utf8'), (e) => mapFsError(e, filePath));
  }
}
