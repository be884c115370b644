import type { FloatBorder, FloatGeometry } from '../ports/host.port.js';

export interface FloatLayout {
  readonly padding: number;
  /** 0 = uncapped */
  readonly maxWidth: number;
  /** 0 = uncapped */
  readonly maxHeight: number;
  readonly border: FloatBorder;
}

/**
 * Centered float rectangle inside an editor area.
 *
 * A border takes one column and one row on each side, so the content shrinks
 * by two in both directions and the column shifts left by one to keep the
 * frame centered. Dimensions and offsets never go below zero.
 */
export function computeFloatGeometry(
  editor: { readonly columns: number; readonly lines: number },
  layout: FloatLayout
): FloatGeometry {
  const bordered = layout.border !== 'none';
  const frame = bordered ? 2 : 0;

  let width = editor.columns - 2 * layout.padding - frame;
  if (layout.maxWidth > 0) width = Math.min(width, layout.maxWidth);
  let height = editor.lines - 2 * layout.padding - frame;
  if (layout.maxHeight > 0) height = Math.min(height, layout.maxHeight);
  width = Math.max(0, width);
  height = Math.max(0, height);

  const row = Math.max(0, Math.floor((editor.lines - height) / 2) - (bordered ? 1 : 0));
  const col = Math.max(0, Math.floor((editor.columns - width) / 2) - (bordered ? 1 : 0));

  return { row, col, width, height };
}
