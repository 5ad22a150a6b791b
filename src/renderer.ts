/**
 * Paints lines of a read-line session as escape-sequence bursts.
 * Cursor moves are only emitted when the tracked position differs.
 */

import type { SequenceBuilder } from './SequenceBuilder.js';
import type { TextLine } from './TextLine.js';

const ESC = '\x1B[';
export const cursorPosition = (left: number, top: number) => `${ESC}${top + 1};${left + 1}H`;
export const scrollUp = (n: number) => (n > 0 ? `${ESC}${n}S` : '');
export const eraseToEndOfLine = `${ESC}K`;
export const clearLine = `${ESC}2K`;
export const clearDown = `${ESC}J`;
export const hideCursor = `${ESC}?25l`;
export const showCursor = `${ESC}?25h`;
export const resetStyle = `${ESC}0m`;

export interface CursorState {
  /** -1 when unknown, e.g. after writing into the last column. */
  left: number;
  top: number;
}

export interface PaintStyle {
  /** SGR sequence for the input text, empty for the terminal default. */
  color: string;
  /** Drawn once per column of input instead of the input itself; empty disables masking. */
  mask: string;
}

export function moveCursor(b: SequenceBuilder, cursor: CursorState, left: number, top: number): void {
  if (cursor.left === left && cursor.top === top) {
    return;
  }
  b.ansi(cursorPosition(left, top));
  cursor.left = left;
  cursor.top = top;
}

/**
 * Paints `line` from buffer offset `from` through the end of row `lastRow`.
 * Each painted row is erased to its end unless it fills the window width.
 */
export function paintLine(b: SequenceBuilder, line: TextLine, from: number, style: PaintStyle, cursor: CursorState, lastRow = line.rows.length - 1): void {
  const windowWidth = line.windowWidth;
  const firstRow = line.rowIndexAt(from);
  for (let r = firstRow; r <= lastRow && r < line.rows.length; r++) {
    const row = line.rows[r];
    const top = line.top + r;
    if (top < 0) {
      continue;
    }
    const start = r === firstRow ? Math.max(from, row.start) : row.start;
    const left = line.widthBetween(row.start, start);
    moveCursor(b, cursor, left, top);

    const promptEnd = Math.min(row.end, line.promptLength);
    if (start < promptEnd) {
      b.text(line.textOf(start, promptEnd));
    }
    const inputStart = row.inputStart < 0 ? row.end : Math.max(start, row.inputStart);
    if (inputStart < row.end) {
      const width = line.widthBetween(inputStart, row.end);
      b.ansi(style.color);
      b.text(style.mask ? style.mask.repeat(width) : line.textOf(inputStart, row.end));
      if (style.color) {
        b.ansi(resetStyle);
      }
    }

    const right = left + line.widthBetween(start, row.end);
    if (right < windowWidth) {
      b.ansi(eraseToEndOfLine);
      cursor.left = right;
      cursor.top = top;
    } else {
      // pending wrap: the next write position depends on the terminal
      cursor.left = -1;
      cursor.top = -1;
    }
  }
}

/** Erases `count` window rows starting at `top`, skipping rows outside the window. */
export function clearRows(b: SequenceBuilder, cursor: CursorState, top: number, count: number, windowHeight: number): void {
  for (let row = Math.max(top, 0); row < top + count && row < windowHeight; row++) {
    moveCursor(b, cursor, 0, row);
    b.ansi(clearLine);
  }
}
