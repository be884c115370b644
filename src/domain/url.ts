/**
 * Address model: `scheme + path`.
 *
 * Paths are always slash-separated. A directory address ends in `/`, a file
 * address does not. Everything here is a total, pure function.
 */

export interface ParsedUrl {
  /** Includes the `://` suffix, e.g. `burrow://` */
  readonly scheme: string;
  readonly path: string;
}

export type HostPlatform = 'posix' | 'win32';

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*:\/\/)(.*)$/s;

/**
 * Split an address on its leading scheme.
 * Returns undefined when the string does not start with `<scheme>://`
 * (a plain host path, an empty buffer name, `C:\dir`).
 */
export function parseUrl(raw: string): ParsedUrl | undefined {
  const match = SCHEME_PATTERN.exec(raw);
  if (!match) return undefined;
  return { scheme: match[1] ?? '', path: match[2] ?? '' };
}

export function addslash(address: string): string {
  return address.endsWith('/') ? address : `${address}/`;
}

export function isDirectoryUrl(address: string): boolean {
  return address.endsWith('/');
}

export function stripSlash(address: string): string {
  return address.length > 1 && address.endsWith('/') ? address.slice(0, -1) : address;
}

/**
 * Parent of a slash path. `/` is its own parent; `/a/b/` and `/a/b` both give `/a/`.
 * On Windows a drive root (`/C/`) is also its own parent.
 */
export function parentPath(path: string, platform: HostPlatform = 'posix'): string {
  if (path === '/' || path === '') return '/';
  if (platform === 'win32' && /^\/[A-Za-z]+\/?$/.test(path)) return path;
  const trimmed = stripSlash(path);
  const lastSlash = trimmed.lastIndexOf('/');
  if (lastSlash < 0) return '';
  return trimmed.slice(0, lastSlash + 1);
}

export function basename(path: string): string | undefined {
  const trimmed = stripSlash(path);
  if (trimmed === '/' || trimmed === '') return undefined;
  const lastSlash = trimmed.lastIndexOf('/');
  return trimmed.slice(lastSlash + 1);
}

export function joinChild(directoryPath: string, childName: string): string {
  return addslash(directoryPath) + childName;
}

/**
 * Normalized slash path → host path.
 * On win32 `/C/Users/me` becomes `C:\Users\me`; relative paths only swap separators.
 */
export function toHostPath(path: string, platform: HostPlatform = currentPlatform()): string {
  if (platform !== 'win32') return path;
  if (path.startsWith('/')) {
    const match = /^\/([^/]+)\/?(.*)$/s.exec(path);
    if (!match) return path;
    const drive = match[1] ?? '';
    const rest = (match[2] ?? '').replace(/\//g, '\\');
    return `${drive}:\\${rest}`;
  }
  return path.replace(/\//g, '\\');
}

/**
 * Host path → normalized slash path. Inverse of {@link toHostPath}; drive letters are upper-cased.
 */
export function fromHostPath(path: string, platform: HostPlatform = currentPlatform()): string {
  if (platform !== 'win32') return path;
  const match = /^([A-Za-z]+):[\\/]?(.*)$/s.exec(path);
  if (match) {
    const drive = (match[1] ?? '').toUpperCase();
    const rest = (match[2] ?? '').replace(/\\/g, '/');
    return `/${drive}/${rest}`;
  }
  return path.replace(/\\/g, '/');
}

export function currentPlatform(): HostPlatform {
  return process.platform === 'win32' ? 'win32' : 'posix';
}
