import type { TextLine } from './TextLine.js';

export interface LocationHost {
  readonly lines: readonly TextLine[];
  readonly firstInputIndex: number;
  readonly windowWidth: number;
  readonly windowHeight: number;
}

export interface ScreenPosition {
  left: number;
  top: number;
}

/**
 * The caret, both as a buffer offset (`lineIndex`, `arrayPosition`) and as
 * a screen cell (`rowIndex`, `column`). The buffer offset is authoritative;
 * {@link sync} derives the rest from it after every move or re-wrap.
 */
export class TextLocation {
  public lineIndex = 0;
  public rowIndex = 0;
  public arrayPosition = 0;
  public column = 0;

  public constructor(private readonly host: LocationHost) {}

  public tryGetLine(): TextLine | undefined {
    return this.host.lines[this.lineIndex];
  }

  /** Snaps to the start of the first editable line. */
  public reset(): void {
    const line = this.host.lines[this.host.firstInputIndex];
    if (!line) {
      this.lineIndex = 0;
      this.rowIndex = 0;
      this.arrayPosition = 0;
      this.column = 0;
      return;
    }
    this.resetTo(line);
  }

  public resetTo(line: TextLine, atEnd = false): void {
    this.lineIndex = line.index;
    this.arrayPosition = atEnd ? line.totalLength : line.promptLength;
    this.sync();
  }

  public setPosition(arrayPosition: number): void {
    this.arrayPosition = arrayPosition;
    this.sync();
  }

  /** Advances by `lengthDelta` units, crossing rows as the wrap dictates. */
  public move(lengthDelta: number): void {
    this.setPosition(this.arrayPosition + lengthDelta);
  }

  /** Recomputes row and column from the buffer offset, resetting when the offset went stale. */
  public sync(): void {
    const line = this.tryGetLine();
    if (!line || line.index < this.host.firstInputIndex) {
      this.reset();
      return;
    }
    this.arrayPosition = Math.min(Math.max(this.arrayPosition, line.promptLength), line.totalLength);
    this.rowIndex = line.rowIndexAt(this.arrayPosition);
    this.column = line.widthBetween(line.rows[this.rowIndex].start, this.arrayPosition);
  }

  public moveLeft(): boolean {
    const line = this.tryGetLine();
    if (!line || this.arrayPosition <= line.promptLength) {
      return false;
    }
    this.move(-line.unitBefore(this.arrayPosition).length);
    return true;
  }

  public moveRight(): boolean {
    const line = this.tryGetLine();
    if (!line || this.arrayPosition >= line.totalLength) {
      return false;
    }
    this.move(line.unitAt(this.arrayPosition).length);
    return true;
  }

  public moveFirst(): void {
    const line = this.tryGetLine();
    if (line) {
      this.setPosition(line.promptLength);
    }
  }

  public moveLast(): void {
    const line = this.tryGetLine();
    if (line) {
      this.setPosition(line.totalLength);
    }
  }

  /** Moves to the same column one screen row up or down, crossing into neighbouring editable lines. */
  public moveVertical(up: boolean): boolean {
    const line = this.tryGetLine();
    if (!line) {
      this.reset();
      return false;
    }
    const lines = this.host.lines;
    let target = line;
    let targetRow: number;
    if (up) {
      if (this.rowIndex > line.rowIndexAt(line.promptLength)) {
        targetRow = this.rowIndex - 1;
      } else {
        const previous = lines[line.index - 1];
        if (!previous || previous.index < this.host.firstInputIndex) {
          return false;
        }
        target = previous;
        targetRow = previous.rows.length - 1;
      }
    } else if (this.rowIndex < line.rows.length - 1) {
      targetRow = this.rowIndex + 1;
    } else {
      const next = lines[line.index + 1];
      if (!next) {
        return false;
      }
      target = next;
      targetRow = next.rowIndexAt(next.promptLength);
    }
    this.lineIndex = target.index;
    this.setPosition(target.positionAtColumn(targetRow, this.column));
    return true;
  }

  public changeLine(diff: number): boolean {
    const target = this.host.lines[this.lineIndex + diff];
    if (!target || target.index < this.host.firstInputIndex) {
      return false;
    }
    this.resetTo(target);
    return true;
  }

  /** Window cell of the caret, clamped to the window. */
  public screenPosition(): ScreenPosition {
    const line = this.tryGetLine();
    const top = line ? line.top + this.rowIndex : 0;
    return {
      left: Math.min(Math.max(this.column, 0), this.host.windowWidth - 1),
      top: Math.min(Math.max(top, 0), this.host.windowHeight - 1),
    };
  }
}
