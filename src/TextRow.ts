import { ObjectPool, type Poolable } from './ObjectPool.js';
import type { TextLine } from './TextLine.js';

export interface ArrangeResult {
  /** A row was created or removed. */
  rowChanged: boolean;
  /** Highest row index whose content changed. */
  lastRow: number;
}

/**
 * One screen line's worth of a {@link TextLine}'s buffer: the slice `[start, end)`.
 */
export class TextRow implements Poolable {
  public static readonly pool = new ObjectPool(() => new TextRow(), 32);

  public index = 0;
  public start = 0;
  public length = 0;
  public width = 0;
  private owner: TextLine | undefined;

  public get line(): TextLine {
    if (!this.owner) {
      throw new Error('TextRow is not attached to a line');
    }
    return this.owner;
  }

  public get end(): number {
    return this.start + this.length;
  }

  /** Offset where editable text begins in this row, or -1 when the row holds only prompt text. */
  public get inputStart(): number {
    const line = this.line;
    if (!line.isInput || line.promptLength > this.end) {
      return -1;
    }
    return Math.max(this.start, line.promptLength);
  }

  public get next(): TextRow | undefined {
    return this.line.rows[this.index + 1];
  }

  public initialize(line: TextLine, index: number, start: number): this {
    this.owner = line;
    this.index = index;
    this.start = start;
    this.length = 0;
    this.width = 0;
    return this;
  }

  /** Grows (or shrinks) this row after units were inserted into (or removed from) it. */
  public addInput(lengthDelta: number, widthDelta: number): void {
    this.length += lengthDelta;
    this.width += widthDelta;
    const rows = this.line.rows;
    for (let i = this.index + 1; i < rows.length; i++) {
      rows[i].start += lengthDelta;
    }
  }

  /**
   * Restores `width <= windowWidth` for this row and every row after it by
   * pushing overflow into the next row or pulling from it. A surrogate pair
   * always moves as one unit, so a wide glyph that does not fit leaves a gap.
   */
  public arrange(result: ArrangeResult): void {
    const line = this.line;
    const windowWidth = line.windowWidth;

    if (this.width > windowWidth) {
      let end = this.end;
      let width = this.width;
      while (width > windowWidth) {
        const unit = line.unitBefore(end);
        if (end - unit.length <= this.start) {
          break;
        }
        end -= unit.length;
        width -= unit.width;
      }
      const movedLength = this.end - end;
      if (movedLength > 0) {
        const movedWidth = this.width - width;
        let next = this.next;
        if (!next) {
          next = line.insertRow(this.index + 1, this.end);
          result.rowChanged = true;
        }
        this.length -= movedLength;
        this.width = width;
        next.start -= movedLength;
        next.length += movedLength;
        next.width += movedWidth;
        result.lastRow = Math.max(result.lastRow, next.index);
      }
    } else {
      let next = this.next;
      while (next && this.width < windowWidth) {
        let position = next.start;
        let width = this.width;
        while (position < next.end) {
          const unit = line.unitAt(position);
          if (width + unit.width > windowWidth) {
            break;
          }
          position += unit.length;
          width += unit.width;
        }
        const movedLength = position - next.start;
        if (movedLength > 0) {
          const movedWidth = width - this.width;
          this.length += movedLength;
          this.width = width;
          next.start = position;
          next.length -= movedLength;
          next.width -= movedWidth;
          result.lastRow = Math.max(result.lastRow, next.index);
        }
        if (next.length > 0) {
          break;
        }
        line.removeRow(next.index);
        result.rowChanged = true;
        next = this.next;
      }
    }

    // A full input row needs a row after it for the caret to land on
    if (line.isInput && this.width >= windowWidth && !this.next) {
      line.insertRow(this.index + 1, this.end);
      result.rowChanged = true;
    }

    this.next?.arrange(result);
  }

  public release(): void {
    this.owner = undefined;
    this.index = 0;
    this.start = 0;
    this.length = 0;
    this.width = 0;
  }
}
