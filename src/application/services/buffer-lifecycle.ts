import type { Logger } from '../../core/logging/index.js';
import type { AdapterFailedError, MutationFailedError } from '../../errors/app-error.js';
import type { BufferId, HostPort, WindowId } from '../../ports/host.port.js';
import type { EntryCachePort } from '../../ports/entry-cache.port.js';
import type { MutatorPort } from '../../ports/mutator.port.js';
import type { ViewRendererPort } from '../../ports/view-renderer.port.js';
import { addslash, fromHostPath, isDirectoryUrl, parseUrl } from '../../domain/url.js';
import { ENGINE_FILETYPE, FILES_ADAPTER } from '../../config/app-config.js';
import { assertNever } from '../../runtime/assert-never.js';
import type { AdapterRegistry } from './adapter-registry.js';
import type { EntryReader } from './entry-reader.js';
import type { Reporter } from './reporter.js';
import type { ViewStateStore } from './view-state-store.js';
import type { WindowBookkeeper } from './window-bookkeeping.js';

export type LoadTarget = 'directory' | 'file';

/**
 * Per-buffer lifecycle state.
 *
 * Every transition that awaits an adapter captures the buffer's generation
 * first; a result arriving for an older generation (buffer reloaded, closed,
 * or replaced meanwhile) is dropped without touching the buffer.
 */
export type BufferState =
  | { readonly kind: 'unbound' }
  | { readonly kind: 'resolving'; readonly url: string }
  | { readonly kind: 'loaded'; readonly target: LoadTarget; readonly url: string }
  | { readonly kind: 'closed' };

/** State as seen from outside, with the host's modified flag folded in */
export type BufferStatus = 'unbound' | 'resolving' | 'loaded-directory' | 'loaded-file' | 'modified' | 'closed';

export type LoadOutcome =
  | { readonly kind: 'ignored' }
  | { readonly kind: 'loaded'; readonly target: LoadTarget; readonly url: string }
  | { readonly kind: 'superseded'; readonly url: string }
  | { readonly kind: 'stale' }
  | { readonly kind: 'failed'; readonly error: AdapterFailedError };

export type WriteOutcome =
  | { readonly kind: 'ignored' }
  | { readonly kind: 'written'; readonly target: LoadTarget }
  | { readonly kind: 'stale' }
  | { readonly kind: 'failed'; readonly error: AdapterFailedError | MutationFailedError };

export type RenderOutcome =
  | { readonly kind: 'rendered'; readonly url: string }
  | { readonly kind: 'stale' }
  | { readonly kind: 'failed'; readonly error: AdapterFailedError };

export interface BufferLifecycleDeps {
  readonly host: HostPort;
  readonly registry: AdapterRegistry;
  readonly view: ViewRendererPort;
  readonly cache: EntryCachePort;
  readonly mutator: MutatorPort;
  readonly store: ViewStateStore;
  readonly bookkeeper: WindowBookkeeper;
  readonly entries: EntryReader;
  readonly reporter: Reporter;
  readonly logger: Logger;
}

export class BufferLifecycleController {
  private readonly states = new Map<BufferId, BufferState>();
  private readonly generations = new Map<BufferId, number>();

  constructor(private readonly deps: BufferLifecycleDeps) {}

  state(buf: BufferId): BufferState {
    return this.states.get(buf) ?? { kind: 'unbound' };
  }

  status(buf: BufferId): BufferStatus {
    const state = this.state(buf);
    switch (state.kind) {
      case 'unbound':
      case 'resolving':
      case 'closed':
        return state.kind;
      case 'loaded':
        if (this.deps.host.isBufferValid(buf) && this.deps.host.isModified(buf)) return 'modified';
        return state.target === 'directory' ? 'loaded-directory' : 'loaded-file';
      default:
        return assertNever(state);
    }
  }

  /** Buffers currently showing a directory listing */
  directoryBuffers(): readonly BufferId[] {
    const result: BufferId[] = [];
    for (const [buf, state] of this.states) {
      if (state.kind === 'loaded' && state.target === 'directory' && this.deps.host.isBufferValid(buf)) {
        result.push(buf);
      }
    }
    return result;
  }

  /**
   * Hijack: a plain host path naming an existing directory is renamed in place
   * to the files scheme address. Returns whether the buffer was rewritten.
   */
  hijack(buf: BufferId): boolean {
    const { host, registry, logger } = this.deps;
    if (!host.isBufferValid(buf)) return false;
    const name = host.getBufferName(buf);
    if (name === '' || parseUrl(name) !== undefined || !host.isDirectory(name)) return false;

    const scheme = registry.schemeFor(FILES_ADAPTER);
    if (scheme === undefined) return false;

    const url = addslash(scheme + fromHostPath(host.absolutePath(name)));
    logger.debug({ buf, from: name, url }, 'hijacking directory buffer');
    host.renameBuffer(buf, url);
    return true;
  }

  /**
   * Open/Read: resolve the scheme (rewriting an alias once), normalize the
   * address through the adapter, then populate the buffer.
   */
  async load(buf: BufferId): Promise<LoadOutcome> {
    const { host, registry, view, reporter, logger } = this.deps;
    if (!host.isBufferValid(buf)) return { kind: 'stale' };

    const resolved = registry.resolve(host.getBufferName(buf));
    if (!resolved) return { kind: 'ignored' };

    if (resolved.aliasedFrom !== undefined && host.renameBuffer(buf, resolved.url)) {
      this.close(buf);
      return { kind: 'superseded', url: resolved.url };
    }

    const generation = this.bump(buf);
    this.states.set(buf, { kind: 'resolving', url: resolved.url });
    if (isDirectoryUrl(resolved.url)) {
      // Set the filetype before a slow normalize so directory keymaps are live while loading
      view.initialize(buf);
    }

    const normalized = await resolved.adapter.normalizeUrl(resolved.url);
    if (!this.isCurrent(buf, generation)) return { kind: 'stale' };
    if (normalized.isErr()) {
      this.states.set(buf, { kind: 'loaded', target: targetOf(resolved.url), url: resolved.url });
      reporter.report(normalized.error);
      return { kind: 'failed', error: normalized.error };
    }

    const url = normalized.value;
    if (url !== host.getBufferName(buf)) {
      if (host.renameBuffer(buf, url)) {
        // Another buffer already owns the canonical address; this one is gone
        this.close(buf);
        logger.debug({ buf, url }, 'buffer superseded by existing buffer');
        return { kind: 'superseded', url };
      }
    }
    this.states.set(buf, { kind: 'resolving', url });

    const outcome = isDirectoryUrl(url)
      ? await this.loadDirectory(buf, url, generation)
      : await this.loadFile(buf, url, generation);
    if (outcome.kind === 'stale') return outcome;

    const win = host.currentWindow();
    if (host.getWindowBuffer(win) === buf) {
      this.deps.bookkeeper.restoreAlternate(win);
      this.restoreCursor(win);
    }
    return outcome;
  }

  /**
   * Re-list a directory buffer and replace its text. A failure is returned,
   * not reported.
   */
  async renderDirectory(buf: BufferId): Promise<RenderOutcome> {
    const state = this.state(buf);
    if (state.kind !== 'loaded' || state.target !== 'directory') return { kind: 'stale' };
    return this.render(buf, state.url, this.bump(buf));
  }

  /**
   * Write: directories go to the mutator and are marked unmodified only after
   * it reports success; files go straight to the adapter.
   */
  async write(buf: BufferId): Promise<WriteOutcome> {
    const { host, registry, mutator, reporter } = this.deps;
    if (!host.isBufferValid(buf)) return { kind: 'stale' };
    const resolved = registry.resolve(host.getBufferName(buf));
    if (!resolved) return { kind: 'ignored' };

    if (isDirectoryUrl(resolved.url)) {
      const result = await mutator.tryWriteChanges(undefined);
      if (result.isErr()) {
        reporter.report(result.error);
        return { kind: 'failed', error: result.error };
      }
      if (!host.isBufferValid(buf)) return { kind: 'stale' };
      host.setModified(buf, false);
      return { kind: 'written', target: 'directory' };
    }

    const result = await resolved.adapter.writeFile(buf);
    if (result.isErr()) {
      reporter.report(result.error);
      return { kind: 'failed', error: result.error };
    }
    return { kind: 'written', target: 'file' };
  }

  /**
   * Discard-all: re-render every modified directory buffer from the backend.
   * Failures are reported per buffer and never raised.
   */
  async discardAllChanges(): Promise<readonly RenderOutcome[]> {
    const { host, reporter } = this.deps;
    const modified = this.directoryBuffers().filter((buf) => host.isModified(buf));
    return Promise.all(
      modified.map(async (buf) => {
        const name = host.getBufferName(buf);
        const outcome = await this.renderDirectory(buf);
        if (outcome.kind === 'failed') {
          reporter.notify(`Error rendering burrow buffer ${name}: ${outcome.error.message}`, 'error');
        }
        return outcome;
      })
    );
  }

  /**
   * Redraw unmodified directory buffers from the cached listing, without asking
   * the adapter again. Used after the column layout changes.
   */
  rerenderFromCache(): readonly BufferId[] {
    const { host, cache, view } = this.deps;
    const redrawn: BufferId[] = [];
    for (const buf of this.directoryBuffers()) {
      const state = this.state(buf);
      if (state.kind !== 'loaded' || host.isModified(buf)) continue;
      view.render(buf, state.url, [...cache.listUrl(state.url).values()]);
      host.setModified(buf, false);
      redrawn.push(buf);
    }
    return redrawn;
  }

  /**
   * Session restore: engine buffers that hold only their single empty line were
   * never populated, so they go through Open/Read again.
   */
  async reloadUnpopulated(): Promise<readonly LoadOutcome[]> {
    const { host, registry } = this.deps;
    const pending = host
      .listBuffers()
      .filter((buf) => host.isBufferValid(buf))
      .filter((buf) => registry.resolve(host.getBufferName(buf)) !== undefined)
      .filter((buf) => host.lineCount(buf) === 1 && this.state(buf).kind !== 'loaded')
      .map((buf) => this.load(buf));
    return Promise.all(pending);
  }

  /** Buffer wiped by the host: terminal state, in-flight results are dropped */
  close(buf: BufferId): void {
    this.bump(buf);
    this.states.set(buf, { kind: 'closed' });
  }

  /**
   * Put the cursor of `win` on the remembered child of the directory it shows.
   * The memory is consumed once applied.
   */
  restoreCursor(win: WindowId): void {
    const { host, store, entries } = this.deps;
    if (!host.isWindowValid(win)) return;
    const buf = host.getWindowBuffer(win);
    const state = this.state(buf);
    if (state.kind !== 'loaded' || state.target !== 'directory') return;

    const remembered = store.getLastCursor(state.url);
    if (!remembered) return;
    const line = entries.findLine(buf, remembered.name) ?? remembered.line;
    if (line !== undefined) {
      host.setCursor(win, { line: Math.min(Math.max(line, 1), host.lineCount(buf)), column: 0 });
    }
    store.takeLastCursor(state.url);
  }

  private async loadDirectory(buf: BufferId, url: string, generation: number): Promise<LoadOutcome> {
    this.deps.view.initialize(buf);
    const outcome = await this.render(buf, url, generation);
    switch (outcome.kind) {
      case 'rendered':
        return { kind: 'loaded', target: 'directory', url };
      case 'failed':
        this.deps.reporter.report(outcome.error);
        return outcome;
      case 'stale':
        return outcome;
      default:
        return assertNever(outcome);
    }
  }

  private async loadFile(buf: BufferId, url: string, generation: number): Promise<LoadOutcome> {
    const { host, registry, reporter } = this.deps;
    const adapter = registry.getAdapter(url);
    if (!adapter) return { kind: 'ignored' };

    if (host.getFiletype(buf) === ENGINE_FILETYPE) host.setFiletype(buf, '');
    host.setBuftype(buf, 'acwrite');
    const result = await adapter.readFile(buf);
    if (!this.isCurrent(buf, generation)) return { kind: 'stale' };
    this.states.set(buf, { kind: 'loaded', target: 'file', url });
    if (result.isErr()) {
      reporter.report(result.error);
      return { kind: 'failed', error: result.error };
    }
    return { kind: 'loaded', target: 'file', url };
  }

  private async render(buf: BufferId, url: string, generation: number): Promise<RenderOutcome> {
    const { host, registry, cache, view, logger } = this.deps;
    const adapter = registry.getAdapter(url);
    if (!adapter) return { kind: 'stale' };

    const listed = await adapter.list(url);
    if (!this.isCurrent(buf, generation)) {
      logger.debug({ buf, url, generation }, 'dropping stale listing');
      return { kind: 'stale' };
    }
    this.states.set(buf, { kind: 'loaded', target: 'directory', url });
    if (listed.isErr()) return { kind: 'failed', error: listed.error };

    view.render(buf, url, cache.storeListing(url, listed.value));
    host.setModified(buf, false);
    return { kind: 'rendered', url };
  }

  private bump(buf: BufferId): number {
    const next = (this.generations.get(buf) ?? 0) + 1;
    this.generations.set(buf, next);
    return next;
  }

  private isCurrent(buf: BufferId, generation: number): boolean {
    return this.deps.host.isBufferValid(buf) && this.generations.get(buf) === generation;
  }
}

function targetOf(url: string): LoadTarget {
  return isDirectoryUrl(url) ? 'directory' : 'file';
}
