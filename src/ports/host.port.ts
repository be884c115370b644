/**
 * Port: the host editor's window/buffer platform.
 *
 * Buffer and window handles are plain integers owned by the host. Commands that
 * change what a window shows (`edit`, `split`, `setWindowBuffer`) deliver the
 * resulting lifecycle events to subscribers synchronously, before they return,
 * the way an editor runs its autocommands.
 */

export type BufferId = number;
export type WindowId = number;

export type WindowOptionValue = string | number | boolean;

export type HostMode = 'normal' | 'insert' | 'visual' | 'visual-line' | 'visual-block' | 'command';

export type SplitModifier = 'aboveleft' | 'belowright' | 'topleft' | 'botright';

export type FloatBorder = 'none' | 'single' | 'double' | 'rounded' | 'solid' | 'shadow';

export interface Cursor {
  /** 1-indexed */
  readonly line: number;
  /** 0-indexed */
  readonly column: number;
}

export interface FloatGeometry {
  readonly row: number;
  readonly col: number;
  readonly width: number;
  readonly height: number;
}

export interface FloatOpenOptions {
  readonly border: FloatBorder;
  readonly zindex: number;
  /** Make the new window current */
  readonly enter: boolean;
}

export interface SplitOptions {
  readonly vertical?: boolean;
  readonly horizontal?: boolean;
  readonly modifier?: SplitModifier;
}

export interface EditOptions {
  /** Do not record the buffer being left as the alternate file */
  readonly keepAlternate?: boolean;
}

export interface CreateBufferOptions {
  readonly listed: boolean;
  readonly scratch: boolean;
  /** Wipe the buffer when no window shows it anymore */
  readonly wipeOnHide: boolean;
}

export type HostEvent =
  | { readonly type: 'BufNew'; readonly buf: BufferId }
  | { readonly type: 'BufAdd'; readonly buf: BufferId }
  | { readonly type: 'BufReadCmd'; readonly buf: BufferId }
  | { readonly type: 'BufWriteCmd'; readonly buf: BufferId }
  | { readonly type: 'BufWinLeave'; readonly buf: BufferId; readonly win: WindowId }
  | { readonly type: 'BufWinEnter'; readonly buf: BufferId; readonly win: WindowId }
  | { readonly type: 'BufWipeout'; readonly buf: BufferId }
  | { readonly type: 'WinNew'; readonly buf: BufferId; readonly win: WindowId }
  | { readonly type: 'WinLeave'; readonly buf: BufferId; readonly win: WindowId }
  | { readonly type: 'SessionLoadPost' };

export type HostEventType = HostEvent['type'];

export type HostListener = (event: HostEvent) => void;

export type CommandHandler = (args: readonly string[]) => void;

export interface HostPort {
  // ── buffers ────────────────────────────────────────────────────────────
  listBuffers(): readonly BufferId[];
  isBufferValid(buf: BufferId): boolean;
  getBufferName(buf: BufferId): string;
  /** Buffer with exactly this name, if any */
  findBuffer(name: string): BufferId | undefined;
  /**
   * Rename a buffer. When another buffer already has `name`, every window showing
   * `buf` switches to that buffer, `buf` is wiped, and the call returns true.
   */
  renameBuffer(buf: BufferId, name: string): boolean;
  createBuffer(options: CreateBufferOptions): BufferId;
  deleteBuffer(buf: BufferId, options: { readonly force: boolean }): void;
  getLines(buf: BufferId, start: number, end: number): readonly string[];
  setLines(buf: BufferId, lines: readonly string[]): void;
  lineCount(buf: BufferId): number;
  isModified(buf: BufferId): boolean;
  setModified(buf: BufferId, modified: boolean): void;
  getFiletype(buf: BufferId): string;
  setFiletype(buf: BufferId, filetype: string): void;
  setBuftype(buf: BufferId, buftype: '' | 'acwrite' | 'nofile'): void;

  // ── windows ────────────────────────────────────────────────────────────
  currentWindow(): WindowId;
  currentBuffer(): BufferId;
  setCurrentWindow(win: WindowId): void;
  /** All windows, every tab */
  listWindows(): readonly WindowId[];
  /** Windows of the current tab */
  tabWindows(): readonly WindowId[];
  isWindowValid(win: WindowId): boolean;
  getWindowBuffer(win: WindowId): BufferId;
  setWindowBuffer(win: WindowId, buf: BufferId): void;
  closeWindow(win: WindowId, options: { readonly force: boolean }): void;
  isFloating(win: WindowId): boolean;
  openFloat(buf: BufferId, geometry: FloatGeometry, options: FloatOpenOptions): WindowId;
  setWindowTitle(win: WindowId, title: string): void;
  getCursor(win: WindowId): Cursor;
  setCursor(win: WindowId, cursor: Cursor): void;
  getWindowOption(win: WindowId, name: string): WindowOptionValue | undefined;
  setWindowOption(win: WindowId, name: string, value: WindowOptionValue): void;

  // ── commands ───────────────────────────────────────────────────────────
  /** Show `name` in the current window, creating and loading the buffer when needed */
  edit(name: string, options?: EditOptions): void;
  /** Open `name` in a new split of the current window and make it current */
  split(name: string, options?: SplitOptions): void;
  registerCommand(name: string, handler: CommandHandler): void;

  // ── alternate-file register ────────────────────────────────────────────
  getAlternateBuffer(): BufferId | undefined;
  setAlternateBuffer(buf: BufferId): void;

  // ── environment ────────────────────────────────────────────────────────
  cwd(): string;
  /** Absolute host path; directories keep a trailing separator when given one */
  absolutePath(path: string): string;
  isDirectory(hostPath: string): boolean;
  /** Usable editor area, command line and status rows excluded */
  editorSize(): { readonly columns: number; readonly lines: number };
  mode(): HostMode;
  /** Lines spanned by the active visual selection, in the order the user made it */
  visualRange(): { readonly start: number; readonly end: number };

  /** Run after the current event finishes */
  schedule(fn: () => void): void;
  subscribe(listener: HostListener): () => void;
}
