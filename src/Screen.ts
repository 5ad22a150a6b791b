import { type CursorState, cursorPosition } from './renderer.js';
import { SequenceBuilder } from './SequenceBuilder.js';
import type { TerminalDevice } from './terminal.js';
import { describeError, type TraceWriter } from './TraceWriter.js';

/**
 * What the console knows about the terminal: window size and where the
 * cursor was left by the last write. Every write goes through here so that
 * device failures are traced instead of thrown.
 */
export class Screen {
  public windowWidth = 1;
  public windowHeight = 1;
  public readonly cursor: CursorState = { left: 0, top: 0 };

  public constructor(
    private readonly device: TerminalDevice,
    private readonly trace?: TraceWriter,
  ) {
    this.refreshWindowSize();
  }

  /** @returns true when the size changed since the last call. */
  public refreshWindowSize(): boolean {
    const { width, height } = this.device.getWindowSize();
    const nextWidth = Math.max(1, width);
    const nextHeight = Math.max(1, height);
    if (nextWidth === this.windowWidth && nextHeight === this.windowHeight) {
      return false;
    }
    this.windowWidth = nextWidth;
    this.windowHeight = nextHeight;
    this.cursor.top = Math.min(this.cursor.top, nextHeight - 1);
    this.cursor.left = Math.min(this.cursor.left, nextWidth - 1);
    this.trace?.write({ type: 'resize', width: nextWidth, height: nextHeight });
    return true;
  }

  public write(data: string): void {
    if (data.length === 0) {
      return;
    }
    try {
      this.device.write(data);
    } catch (err) {
      this.trace?.write({ type: 'write-failed', error: describeError(err) });
    }
  }

  /** A builder whose output goes to {@link write}. */
  public burst(): SequenceBuilder {
    return new SequenceBuilder((chunk) => this.write(chunk));
  }

  public setCursor(left: number, top: number): void {
    if (this.cursor.left === left && this.cursor.top === top) {
      return;
    }
    this.write(cursorPosition(left, top));
    this.cursor.left = left;
    this.cursor.top = top;
  }

  /** Asks the terminal where the cursor is; keeps the tracked position if the query fails. */
  public async syncCursor(): Promise<CursorState> {
    try {
      const { left, top } = await this.device.getCursorPosition();
      this.cursor.left = Math.min(Math.max(left, 0), this.windowWidth - 1);
      this.cursor.top = Math.min(Math.max(top, 0), this.windowHeight - 1);
    } catch (err) {
      this.trace?.write({ type: 'cursor-query-failed', error: describeError(err) });
    }
    return this.cursor;
  }

  /**
   * Moves to the start of the next row.
   * @returns the number of rows the window scrolled, 0 or 1.
   */
  public newLine(): number {
    this.write('\r\n');
    this.cursor.left = 0;
    if (this.cursor.top < this.windowHeight - 1) {
      this.cursor.top++;
      return 0;
    }
    return 1;
  }
}
