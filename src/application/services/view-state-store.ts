import type { BufferId, WindowId, WindowOptionValue } from '../../ports/host.port.js';

/**
 * Per-window bookkeeping of where the user came from before entering the engine.
 */
export interface ViewRecord {
  readonly didEnter: boolean;
  readonly originalBuffer?: BufferId;
  readonly originalAlternate?: BufferId;
  /** Window option values from before the engine applied its own */
  readonly savedOptions: ReadonlyMap<string, WindowOptionValue>;
  /** Set on preview windows: the id of the entry being previewed */
  readonly previewEntryId?: string;
}

export interface LastCursor {
  readonly name: string;
  readonly line?: number;
}

const EMPTY_RECORD: ViewRecord = { didEnter: false, savedOptions: new Map() };

/**
 * Session-wide presentation state: one view record per window, and the
 * last-visited child per directory address.
 *
 * Owned by an engine instance (never module-global). Entries for closed
 * windows are dropped by {@link prune}; nothing else collects them.
 */
export class ViewStateStore {
  private readonly views = new Map<WindowId, ViewRecord>();
  private readonly lastCursors = new Map<string, LastCursor>();

  view(win: WindowId): ViewRecord | undefined {
    return this.views.get(win);
  }

  didEnter(win: WindowId): boolean {
    return this.views.get(win)?.didEnter ?? false;
  }

  update(win: WindowId, fn: (record: ViewRecord) => ViewRecord): ViewRecord {
    const next = fn(this.views.get(win) ?? EMPTY_RECORD);
    this.views.set(win, next);
    return next;
  }

  /** Remember the non-engine buffer a window showed, and its alternate */
  recordOrigin(win: WindowId, originalBuffer: BufferId, originalAlternate: BufferId | undefined): void {
    this.update(win, (record) => {
      const { originalAlternate: _previous, ...rest } = record;
      return originalAlternate === undefined
        ? { ...rest, originalBuffer }
        : { ...rest, originalBuffer, originalAlternate };
    });
  }

  markEntered(win: WindowId): void {
    this.update(win, (record) => (record.didEnter ? record : { ...record, didEnter: true }));
  }

  clearEntered(win: WindowId): void {
    this.update(win, (record) => ({ ...record, didEnter: false }));
  }

  tagPreview(win: WindowId, entryId: string | undefined): void {
    this.update(win, (record) => {
      const { previewEntryId: _previous, ...rest } = record;
      return entryId === undefined ? rest : { ...rest, previewEntryId: entryId };
    });
  }

  /**
   * Copy a window's record onto a window split off it. Buffers that are no
   * longer valid are not carried over.
   */
  inherit(parent: WindowId, child: WindowId, isBufferValid: (buf: BufferId) => boolean): ViewRecord {
    const source = this.views.get(parent) ?? EMPTY_RECORD;
    let record: ViewRecord = { didEnter: true, savedOptions: new Map(source.savedOptions) };
    if (source.originalBuffer !== undefined && isBufferValid(source.originalBuffer)) {
      record = { ...record, originalBuffer: source.originalBuffer };
    }
    if (source.originalAlternate !== undefined && isBufferValid(source.originalAlternate)) {
      record = { ...record, originalAlternate: source.originalAlternate };
    }
    this.views.set(child, record);
    return record;
  }

  prune(isWindowValid: (win: WindowId) => boolean): void {
    for (const win of [...this.views.keys()]) {
      if (!isWindowValid(win)) this.views.delete(win);
    }
  }

  setLastCursor(url: string, name: string, line?: number): void {
    this.lastCursors.set(url, line === undefined ? { name } : { name, line });
  }

  getLastCursor(url: string): LastCursor | undefined {
    return this.lastCursors.get(url);
  }

  /** Read and forget: a remembered cursor is applied once */
  takeLastCursor(url: string): LastCursor | undefined {
    const cursor = this.lastCursors.get(url);
    this.lastCursors.delete(url);
    return cursor;
  }
}
