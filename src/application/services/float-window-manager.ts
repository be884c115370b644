import type { Logger } from '../../core/logging/index.js';
import type { FloatConfig } from '../../config/app-config.js';
import { computeFloatGeometry } from '../../domain/float-geometry.js';
import type { HostPort, WindowId } from '../../ports/host.port.js';
import type { Navigator } from './navigator.js';
import type { ViewStateStore } from './view-state-store.js';

const FLOAT_ZINDEX = 45;

interface OpenFloat {
  readonly win: WindowId;
  readonly unsubscribe: () => void;
}

/**
 * Transient floating presentation of a directory.
 *
 * Each float owns one host subscription. The first time focus leaves it for a
 * window that is not itself floating, the float closes and the subscription
 * goes away; a second leave finds nothing to do.
 */
export class FloatWindowManager {
  private readonly floats = new Map<WindowId, OpenFloat>();

  constructor(
    private readonly host: HostPort,
    private readonly config: FloatConfig,
    private readonly navigator: Navigator,
    private readonly store: ViewStateStore,
    private readonly logger: Logger
  ) {}

  /** Open `dir` (or the parent of the current buffer) in a centered float */
  open(dir?: string): WindowId | undefined {
    const { host } = this;
    const target = this.navigator.urlForPath(dir);
    if (!target) return undefined;

    const scratch = host.createBuffer({ listed: false, scratch: true, wipeOnHide: true });
    const geometry = computeFloatGeometry(host.editorSize(), this.config);
    const win = host.openFloat(scratch, geometry, {
      border: this.config.border,
      zindex: FLOAT_ZINDEX,
      enter: true,
    });
    for (const [name, value] of Object.entries(this.config.winOptions)) {
      host.setWindowOption(win, name, value);
    }

    const unsubscribe = host.subscribe((event) => {
      switch (event.type) {
        case 'WinLeave':
          host.schedule(() => this.closeIfLeft(win));
          break;
        case 'BufWinEnter':
          if (event.win === win) host.setWindowTitle(win, host.getBufferName(event.buf));
          break;
        default:
          break;
      }
    });
    this.floats.set(win, { win, unsubscribe });
    this.logger.debug({ win, geometry, url: target.url }, 'opened float');

    if (target.basename !== undefined) {
      this.store.setLastCursor(target.url, target.basename);
    }
    host.edit(target.url, { keepAlternate: true });
    if (host.isWindowValid(win)) {
      host.setWindowTitle(win, host.getBufferName(host.getWindowBuffer(win)));
    }
    return win;
  }

  isOpen(win: WindowId): boolean {
    return this.floats.has(win);
  }

  dispose(): void {
    for (const float of this.floats.values()) float.unsubscribe();
    this.floats.clear();
  }

  private closeIfLeft(win: WindowId): void {
    const float = this.floats.get(win);
    if (!float) return;
    if (this.host.isFloating(this.host.currentWindow())) return;

    this.floats.delete(win);
    float.unsubscribe();
    if (this.host.isWindowValid(win)) {
      this.host.closeWindow(win, { force: true });
      this.logger.debug({ win }, 'closed float after focus left');
    }
  }
}
