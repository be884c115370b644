import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_NOT_A_DIRECTORY'; readonly message: string };

export type FsNodeKind = 'file' | 'directory' | 'socket' | 'link';

export interface FsStat {
  readonly kind: FsNodeKind;
  readonly sizeBytes: number;
  readonly mtimeMs: number;
}

export interface FsDirent {
  readonly name: string;
  readonly kind: FsNodeKind;
}

/**
 * Port: the host filesystem, as the local files adapter needs it.
 * Paths are host paths (see toHostPath).
 */
export interface FileSystemPort {
  readdir(dirPath: string): ResultAsync<readonly FsDirent[], FsError>;
  /** Follows symlinks */
  stat(filePath: string): ResultAsync<FsStat, FsError>;
  /** Does not follow symlinks */
  lstat(filePath: string): ResultAsync<FsStat, FsError>;
  readlink(linkPath: string): ResultAsync<string, FsError>;
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
  writeFileUtf8(filePath: string, text: string): ResultAsync<void, FsError>;
}
