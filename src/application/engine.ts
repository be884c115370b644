import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { MutationFailedError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { assertNever } from '../runtime/assert-never.js';
import { COMMAND_NAME, type ValidatedSetupConfig } from '../config/app-config.js';
import type { Entry } from '../domain/entry.js';
import type { BufferId, HostEvent, HostPort, WindowId } from '../ports/host.port.js';
import type { MutatorPort } from '../ports/mutator.port.js';
import type { ColumnSpec, ViewRendererPort } from '../ports/view-renderer.port.js';
import type { BufferLifecycleController, BufferStatus, RenderOutcome } from './services/buffer-lifecycle.js';
import type { EntryReader } from './services/entry-reader.js';
import type { FloatWindowManager } from './services/float-window-manager.js';
import type { Navigator, ParentUrl, SelectOptions, SelectOutcome } from './services/navigator.js';
import type { Reporter } from './services/reporter.js';
import type { ViewStateStore } from './services/view-state-store.js';
import type { WindowBookkeeper } from './services/window-bookkeeping.js';

export interface EngineServices {
  readonly host: HostPort;
  readonly config: ValidatedSetupConfig;
  readonly lifecycle: BufferLifecycleController;
  readonly bookkeeper: WindowBookkeeper;
  readonly navigator: Navigator;
  readonly floats: FloatWindowManager;
  readonly entries: EntryReader;
  readonly store: ViewStateStore;
  readonly view: ViewRendererPort;
  readonly mutator: MutatorPort;
  readonly reporter: Reporter;
  readonly logger: Logger;
}

export interface SaveOptions {
  /** true always asks, false never asks, omitted leaves it to the mutator */
  readonly confirm?: boolean;
}

const SCP_SCHEME = 'scp://';
const SSH_ADAPTER = 'ssh';
const FLOAT_FLAG = '--float';

/**
 * Directory-buffer engine bound to one host.
 *
 * Host events come in through a single subscription and are dispatched to the
 * lifecycle controller and window bookkeeper. Asynchronous work started by an
 * event is tracked until it settles; anything a collaborator throws is caught
 * here and reported instead of reaching the host.
 */
export class Engine {
  private readonly pending = new Set<Promise<unknown>>();
  private unsubscribe: (() => void) | undefined;
  private scpWarned = false;

  constructor(private readonly services: EngineServices) {}

  /** Subscribe to host events, register the user command, and take over the current buffer when it is a directory. */
  start(): void {
    const { host, lifecycle, logger } = this.services;
    if (this.unsubscribe) return;

    this.unsubscribe = host.subscribe((event) => this.guard(event.type, () => this.dispatch(event)));
    host.registerCommand(COMMAND_NAME, (args) => this.guard(COMMAND_NAME, () => this.runCommand(args)));

    const current = host.currentBuffer();
    if (lifecycle.hijack(current)) {
      this.track(lifecycle.load(current));
    }
    logger.debug({ schemes: Object.keys(this.services.config.adapters) }, 'engine started');
  }

  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    this.services.floats.dispose();
  }

  /** Resolves once every load, write and reload started by host events has finished. */
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  // ===========================================================================
  // Public operations
  // ===========================================================================

  open(dir?: string): string | undefined {
    return this.services.navigator.open(dir);
  }

  openFloat(dir?: string): WindowId | undefined {
    return this.services.floats.open(dir);
  }

  close(): void {
    this.services.navigator.close();
  }

  select(options: SelectOptions = {}): SelectOutcome {
    return this.services.navigator.select(options);
  }

  save(options: SaveOptions = {}): ResultAsync<void, MutationFailedError> {
    const { mutator, reporter } = this.services;
    return mutator.tryWriteChanges(options.confirm).mapErr((error) => {
      reporter.report(error);
      return error;
    });
  }

  discardAllChanges(): Promise<readonly RenderOutcome[]> {
    return this.services.lifecycle.discardAllChanges();
  }

  setColumns(columns: readonly ColumnSpec[]): void {
    this.services.view.setColumns(columns);
    this.services.lifecycle.rerenderFromCache();
  }

  getEntryOnLine(buf: BufferId, lnum: number): Entry | undefined {
    return this.services.entries.entryOnLine(buf, lnum);
  }

  getCursorEntry(): Entry | undefined {
    return this.services.navigator.cursorEntry();
  }

  getCurrentDir(): string | undefined {
    return this.services.navigator.currentDir();
  }

  getUrlForPath(dir?: string): ParentUrl | undefined {
    return this.services.navigator.urlForPath(dir);
  }

  getBufferParentUrl(bufname: string): ParentUrl | undefined {
    return this.services.navigator.bufferParentUrl(bufname);
  }

  status(buf: BufferId): BufferStatus {
    return this.services.lifecycle.status(buf);
  }

  // ===========================================================================
  // Event dispatch
  // ===========================================================================

  private dispatch(event: HostEvent): void {
    const { host, lifecycle, bookkeeper, store, reporter } = this.services;
    switch (event.type) {
      case 'BufNew':
        this.warnScp(event.buf);
        return;
      case 'BufAdd':
        lifecycle.hijack(event.buf);
        return;
      case 'BufReadCmd':
        this.track(lifecycle.load(event.buf));
        return;
      case 'BufWriteCmd':
        this.track(lifecycle.write(event.buf));
        return;
      case 'BufWinLeave':
        bookkeeper.onBufWinLeave(event.win, event.buf);
        return;
      case 'BufWinEnter':
        bookkeeper.restoreAlternate(event.win);
        if (bookkeeper.isEngineBuffer(event.buf)) lifecycle.restoreCursor(event.win);
        return;
      case 'BufWipeout':
        lifecycle.close(event.buf);
        store.prune((win) => host.isWindowValid(win));
        return;
      case 'WinNew': {
        const outcome = bookkeeper.onWinNew(event.win, event.buf);
        if (outcome.isErr()) reporter.report(outcome.error, 'warn');
        return;
      }
      case 'WinLeave':
        return;
      case 'SessionLoadPost':
        this.track(lifecycle.reloadUnpopulated());
        return;
      default:
        assertNever(event);
    }
  }

  private runCommand(args: readonly string[]): void {
    const float = args.includes(FLOAT_FLAG);
    const dir = args.find((arg) => arg !== FLOAT_FLAG);
    if (float) {
      this.openFloat(dir);
    } else {
      this.open(dir);
    }
  }

  private warnScp(buf: BufferId): void {
    const { host, config, reporter } = this.services;
    if (this.scpWarned || config.silenceScpWarning) return;
    if (!host.getBufferName(buf).startsWith(SCP_SCHEME)) return;
    this.scpWarned = true;
    const scheme = Object.keys(config.adapters).find((s) => config.adapters[s] === SSH_ADAPTER) ?? 'burrow-ssh://';
    reporter.notify(
      `If you are trying to browse a remote directory, use ${scheme} instead of ${SCP_SCHEME}. ` +
        'Set silenceScpWarning to hide this message.',
      'warn'
    );
  }

  private guard(label: string, fn: () => void): void {
    try {
      fn();
    } catch (cause) {
      this.reportUnexpected(label, cause);
    }
  }

  private track(work: Promise<unknown>): void {
    const tracked: Promise<unknown> = work
      .catch((cause: unknown) => this.reportUnexpected('async handler', cause))
      .finally(() => this.pending.delete(tracked));
    this.pending.add(tracked);
  }

  private reportUnexpected(label: string, cause: unknown): void {
    const message = cause instanceof Error ? cause.message : String(cause);
    this.services.logger.error({ err: cause, label }, 'handler threw');
    this.services.reporter.report(Err.unexpected(`${label}: ${message}`, cause));
  }
}
