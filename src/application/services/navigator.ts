import type { Logger } from '../../core/logging/index.js';
import type { NavigationRefusedError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { Entry } from '../../domain/entry.js';
import { isDirectoryLike } from '../../domain/entry.js';
import {
  addslash,
  basename,
  currentPlatform,
  fromHostPath,
  joinChild,
  parentPath,
  parseUrl,
  toHostPath,
} from '../../domain/url.js';
import { FILES_ADAPTER } from '../../config/app-config.js';
import type { HostPort, SplitModifier } from '../../ports/host.port.js';
import type { EntryCachePort } from '../../ports/entry-cache.port.js';
import type { AdapterRegistry } from './adapter-registry.js';
import type { EntryReader } from './entry-reader.js';
import type { Reporter } from './reporter.js';
import type { ViewStateStore } from './view-state-store.js';

export interface SelectOptions {
  /** Open in a vertical split */
  readonly vertical?: boolean;
  /** Open in a horizontal split */
  readonly horizontal?: boolean;
  readonly split?: SplitModifier;
  /** Open in a preview window and keep focus where it was */
  readonly preview?: boolean;
}

export type SelectOutcome =
  | { readonly kind: 'opened'; readonly urls: readonly string[] }
  | { readonly kind: 'ignored' }
  | { readonly kind: 'refused'; readonly error: NavigationRefusedError };

export interface ParentUrl {
  readonly url: string;
  /** Name of the child the user came from, when there is one */
  readonly basename?: string;
}

const TERMINAL_SCHEME = 'term://';

export class Navigator {
  constructor(
    private readonly host: HostPort,
    private readonly registry: AdapterRegistry,
    private readonly cache: EntryCachePort,
    private readonly store: ViewStateStore,
    private readonly entries: EntryReader,
    private readonly reporter: Reporter,
    private readonly logger: Logger
  ) {}

  cursorEntry(): Entry | undefined {
    const win = this.host.currentWindow();
    return this.entries.entryOnLine(this.host.currentBuffer(), this.host.getCursor(win).line);
  }

  /**
   * Open the entry under the cursor, or every entry of a visual selection in
   * line order. After the first entry, entries open in further splits,
   * vertical unless horizontal was asked for.
   */
  select(options: SelectOptions = {}): SelectOutcome {
    const { host } = this;
    let split = options.split;
    let vertical = options.vertical;
    const horizontal = options.horizontal;
    const preview = options.preview ?? false;
    if (horizontal || vertical || preview) split = split ?? 'belowright';
    if (preview && !horizontal && vertical === undefined) vertical = true;

    const originWin = host.currentWindow();
    if (preview && host.isFloating(originWin)) {
      return this.refuse(Err.navigationRefused('preview_in_float', 'Preview does not work in a floating window'));
    }

    const buf = host.currentBuffer();
    const bufname = host.getBufferName(buf);
    const directory = parseUrl(bufname);
    if (!directory || !this.registry.getAdapter(bufname)) return { kind: 'ignored' };

    let selected: readonly Entry[];
    const mode = host.mode();
    if (mode === 'visual' || mode === 'visual-line' || mode === 'visual-block') {
      const range = host.visualRange();
      selected = this.entries.entriesInRange(buf, range.start, range.end);
    } else {
      const entry = this.cursorEntry();
      selected = entry ? [entry] : [];
    }

    const [first] = selected;
    if (first === undefined) {
      return this.refuse(Err.navigationRefused('no_entry', 'Could not find entry under cursor'));
    }
    if (selected.length > 1 && preview) {
      this.reporter.notify('Cannot preview multiple entries', 'warn');
      selected = [first];
    }

    // A new directory that shares its name with a cached entry is the target of
    // a pending move and the source of a pending create; entering it would show
    // the old contents. Checked for every entry before anything opens.
    const cached = this.cache.listUrl(bufname);
    const blocked = selected.find((entry) => isDirectoryLike(entry) && entry.id === undefined && cached.has(entry.name));
    if (blocked) {
      this.logger.debug({ name: blocked.name, url: bufname }, 'refusing to enter unsaved directory');
      return this.refuse(
        Err.navigationRefused('unsaved_directory', 'Please save changes before entering new directory')
      );
    }

    this.closePreviewWindows();
    if (!preview) {
      this.store.setLastCursor(bufname, first.name, host.getCursor(originWin).line);
    }

    const opened: string[] = [];
    for (const entry of selected) {
      const childPath = joinChild(directory.path, entry.name);
      const url = directory.scheme + (isDirectoryLike(entry) ? addslash(childPath) : childPath);
      const current = host.currentWindow();
      if (!isDirectoryLike(entry) && host.isFloating(current)) {
        host.closeWindow(current, { force: false });
      }

      if (split !== undefined) {
        host.split(url, { vertical, horizontal, modifier: split });
      } else {
        host.edit(url);
      }
      opened.push(url);

      if (preview) {
        const previewWin = host.currentWindow();
        host.setWindowOption(previewWin, 'previewwindow', true);
        this.store.tagPreview(previewWin, entry.id);
        if (host.isWindowValid(originWin)) host.setCurrentWindow(originWin);
      }

      split = split ?? 'belowright';
      if (!horizontal && vertical === undefined) vertical = true;
    }

    return { kind: 'opened', urls: opened };
  }

  /**
   * Edit the directory `dir` (a host path), or the parent of the current
   * buffer, keeping the alternate file untouched.
   */
  open(dir?: string): string | undefined {
    const target = this.urlForPath(dir);
    if (!target) return undefined;
    if (target.basename !== undefined) {
      this.store.setLastCursor(target.url, target.basename);
    }
    this.host.edit(target.url, { keepAlternate: true });
    return target.url;
  }

  /**
   * Leave the engine: close a floating window, else show the buffer the
   * window had before, else delete the directory buffer.
   */
  close(): void {
    const { host } = this;
    const win = host.currentWindow();
    if (host.isFloating(win)) {
      host.closeWindow(win, { force: true });
      return;
    }
    const original = this.store.view(win)?.originalBuffer;
    if (original !== undefined && host.isBufferValid(original)) {
      host.setWindowBuffer(win, original);
      return;
    }
    host.deleteBuffer(host.currentBuffer(), { force: true });
  }

  /** Host path of the current directory, when it belongs to the local files adapter */
  currentDir(): string | undefined {
    const parsed = parseUrl(this.host.getBufferName(this.host.currentBuffer()));
    if (!parsed) return undefined;
    if (this.registry.getAdapter(parsed.scheme)?.name !== FILES_ADAPTER) return undefined;
    return toHostPath(parsed.path);
  }

  urlForPath(dir?: string): ParentUrl | undefined {
    if (dir === undefined) {
      return this.bufferParentUrl(this.host.getBufferName(this.host.currentBuffer()));
    }
    const scheme = this.registry.schemeFor(FILES_ADAPTER);
    if (scheme === undefined) return undefined;
    return { url: scheme + fromHostPath(this.host.absolutePath(dir)) };
  }

  /**
   * Parent directory address of a buffer name, and the name of the child in it.
   */
  bufferParentUrl(bufname: string): ParentUrl | undefined {
    const parsed = parseUrl(bufname);
    const filesScheme = this.registry.schemeFor(FILES_ADAPTER);

    if (!parsed) {
      if (filesScheme === undefined) return undefined;
      if (bufname === '') {
        return { url: addslash(filesScheme + fromHostPath(this.host.cwd())) };
      }
      const absolute = fromHostPath(this.host.absolutePath(bufname));
      const name = basename(absolute);
      const url = addslash(filesScheme + parentPath(absolute, currentPlatform()));
      return name === undefined ? { url } : { url, basename: name };
    }

    if (parsed.scheme === TERMINAL_SCHEME) {
      if (filesScheme === undefined) return undefined;
      const separator = parsed.path.lastIndexOf('//');
      const dir = separator >= 0 ? parsed.path.slice(0, separator) : parsed.path;
      return { url: filesScheme + addslash(fromHostPath(this.host.absolutePath(dir))) };
    }

    const adapter = this.registry.getAdapter(parsed.scheme);
    let parentUrl: string;
    if (adapter?.getParent) {
      const adapterScheme = this.registry.schemeFor(adapter.name) ?? parsed.scheme;
      parentUrl = adapter.getParent(adapterScheme + parsed.path);
    } else {
      parentUrl = parsed.scheme + addslash(parentPath(parsed.path, currentPlatform()));
    }

    if (parentUrl === bufname) return { url: parentUrl };
    const name = basename(parsed.path);
    return name === undefined ? { url: addslash(parentUrl) } : { url: addslash(parentUrl), basename: name };
  }

  private closePreviewWindows(): void {
    for (const win of this.host.tabWindows()) {
      if (this.host.isWindowValid(win) && this.host.getWindowOption(win, 'previewwindow') === true) {
        this.host.closeWindow(win, { force: true });
      }
    }
  }

  private refuse(error: NavigationRefusedError): SelectOutcome {
    this.reporter.report(error);
    return { kind: 'refused', error };
  }
}
