import { ok, err, type Result } from 'neverthrow';
import type { BufferId, HostPort, WindowId, WindowOptionValue } from '../../ports/host.port.js';
import type { BookkeepingAnomalyError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { Logger } from '../../core/logging/index.js';
import type { ViewRecord, ViewStateStore } from './view-state-store.js';
import { ENGINE_FILETYPE } from '../../config/app-config.js';

export interface WindowBookkeepingOptions {
  readonly winOptions: Readonly<Record<string, WindowOptionValue>>;
  readonly restoreWinOptions: boolean;
}

export type SplitOutcome =
  | { readonly kind: 'not_applicable' }
  | { readonly kind: 'inherited'; readonly parent: WindowId; readonly record: ViewRecord };

/**
 * Keeps the alternate-file register and window options honest while the user
 * wanders through directory views.
 *
 * Engine buffers are recognized by filetype, which the lifecycle controller
 * sets on every directory buffer it loads.
 */
export class WindowBookkeeper {
  constructor(
    private readonly host: HostPort,
    private readonly store: ViewStateStore,
    private readonly options: WindowBookkeepingOptions,
    private readonly logger: Logger
  ) {}

  isEngineBuffer(buf: BufferId): boolean {
    return this.host.isBufferValid(buf) && this.host.getFiletype(buf) === ENGINE_FILETYPE;
  }

  /**
   * A window stops showing `buf`. Leaving a non-engine buffer records it (and
   * the alternate at that moment) as where the user came from.
   */
  onBufWinLeave(win: WindowId, buf: BufferId): void {
    if (this.isEngineBuffer(buf)) return;
    this.store.recordOrigin(win, buf, this.host.getAlternateBuffer());
  }

  /**
   * Called when `win` settles on a buffer.
   *
   * Engine buffer: apply engine window options and mark the window entered.
   * Non-engine buffer after having been in the engine: point the alternate
   * register at the buffer the user started from, or, when they came back to
   * that same buffer, at whatever the alternate was before.
   */
  restoreAlternate(win: WindowId): void {
    if (!this.host.isWindowValid(win)) return;
    const buf = this.host.getWindowBuffer(win);

    if (this.isEngineBuffer(buf)) {
      this.applyWinOptions(win);
      this.store.markEntered(win);
      return;
    }

    const record = this.store.view(win);
    if (!record?.didEnter) return;
    this.store.clearEntered(win);

    const original = record.originalBuffer;
    if (original !== undefined && this.host.isBufferValid(original)) {
      if (buf !== original) {
        this.host.setAlternateBuffer(original);
      } else if (record.originalAlternate !== undefined && this.host.isBufferValid(record.originalAlternate)) {
        this.host.setAlternateBuffer(record.originalAlternate);
      }
    }

    if (this.options.restoreWinOptions) {
      this.restoreWinOptions(win);
    }
  }

  /**
   * A new window showing an engine buffer that was never entered is a split
   * off an engine window: copy the parent's record and option overrides.
   * The parent is the first entered window of the current tab, then of any tab.
   */
  onWinNew(win: WindowId, buf: BufferId): Result<SplitOutcome, BookkeepingAnomalyError> {
    if (!this.isEngineBuffer(buf) || this.store.didEnter(win)) {
      return ok({ kind: 'not_applicable' });
    }

    const candidates = [...this.host.tabWindows(), ...this.host.listWindows()];
    const parent = candidates.find(
      (candidate) => candidate !== win && this.host.isWindowValid(candidate) && this.store.didEnter(candidate)
    );
    if (parent === undefined) {
      return err(
        Err.bookkeepingAnomaly(
          'Split of a directory window could not find its parent window; continuing without its history'
        )
      );
    }

    const record = this.store.inherit(parent, win, (b) => this.host.isBufferValid(b));
    for (const name of Object.keys(this.options.winOptions)) {
      const value = this.host.getWindowOption(parent, name);
      if (value !== undefined) this.host.setWindowOption(win, name, value);
    }
    this.logger.debug({ win, parent }, 'split inherited view record');
    return ok({ kind: 'inherited', parent, record });
  }

  applyWinOptions(win: WindowId): void {
    const saved = new Map(this.store.view(win)?.savedOptions ?? []);
    // Once entered, the window already carries engine values
    const capture = this.options.restoreWinOptions && !this.store.didEnter(win);
    for (const [name, value] of Object.entries(this.options.winOptions)) {
      if (capture && !saved.has(name)) {
        const previous = this.host.getWindowOption(win, name);
        if (previous !== undefined) saved.set(name, previous);
      }
      this.host.setWindowOption(win, name, value);
    }
    this.store.update(win, (record) => ({ ...record, savedOptions: saved }));
  }

  restoreWinOptions(win: WindowId): void {
    const saved = this.store.view(win)?.savedOptions;
    if (!saved || saved.size === 0) return;
    for (const [name, value] of saved) {
      this.host.setWindowOption(win, name, value);
    }
    this.store.update(win, (record) => ({ ...record, savedOptions: new Map() }));
  }
}
