import type { KeyEvent } from './input.js';
import { ObjectPool, type Poolable } from './ObjectPool.js';
import { colorSequence, type ReadLineOptions } from './options.js';
import { clearDown, clearRows, hideCursor, moveCursor, type PaintStyle, paintLine, scrollUp, showCursor } from './renderer.js';
import type { Screen } from './Screen.js';
import type { SequenceBuilder } from './SequenceBuilder.js';
import { type LineChange, type LineHost, TextLine } from './TextLine.js';
import { type LocationHost, TextLocation } from './TextLocation.js';

export type SessionMode = 'singleline' | 'delimiter' | 'lineContinuation';

function countOccurrences(text: string, token: string): number {
  let count = 0;
  for (let index = text.indexOf(token); index >= 0; index = text.indexOf(token, index + token.length)) {
    count++;
  }
  return count;
}

/**
 * Editing state of one read: fixed prompt lines followed by one or more
 * editable lines, the caret, and the multi-line mode.
 */
export class ReadLineSession implements LineHost, LocationHost, Poolable {
  private static readonly pool = new ObjectPool(() => new ReadLineSession(), 4);

  public static rent(screen: Screen, options: ReadLineOptions): ReadLineSession {
    return ReadLineSession.pool.rent().initialize(screen, options);
  }

  public static return(session: ReadLineSession): void {
    ReadLineSession.pool.return(session);
  }

  public readonly lines: TextLine[] = [];
  public readonly location = new TextLocation(this);
  public mode: SessionMode = 'singleline';
  public firstInputIndex = 0;

  private screenRef: Screen | undefined;
  private optionsRef: ReadLineOptions | undefined;
  private style: PaintStyle = { color: '', mask: '' };

  public get screen(): Screen {
    if (!this.screenRef) {
      throw new Error('ReadLineSession is not initialized');
    }
    return this.screenRef;
  }

  public get options(): ReadLineOptions {
    if (!this.optionsRef) {
      throw new Error('ReadLineSession is not initialized');
    }
    return this.optionsRef;
  }

  public get windowWidth(): number {
    return this.screen.windowWidth;
  }

  public get windowHeight(): number {
    return this.screen.windowHeight;
  }

  public get isMultiline(): boolean {
    return this.mode !== 'singleline';
  }

  public get allowEmptyLineInput(): boolean {
    return this.options.allowEmptyLineInput;
  }

  /** Window row of the first line. */
  public get top(): number {
    return this.lines[0]?.top ?? 0;
  }

  /** Window row just below the last line. */
  public get bottom(): number {
    return this.lines[this.lines.length - 1]?.bottom ?? 0;
  }

  public initialize(screen: Screen, options: ReadLineOptions): this {
    this.screenRef = screen;
    this.optionsRef = options;
    this.style = { color: colorSequence(options.inputColor), mask: options.maskingCharacter };
    this.mode = 'singleline';
    this.firstInputIndex = 0;
    return this;
  }

  /** Splits the prompt into lines starting at window row `top`, paints them and places the caret. */
  public prepare(top: number): void {
    const segments = this.options.prompt.split(/\r?\n/);
    let row = top;
    for (let i = 0; i < segments.length; i++) {
      const line = TextLine.pool.rent().initialize(this, i, segments[i], i === segments.length - 1);
      line.top = row;
      row = line.bottom;
      this.lines.push(line);
    }
    this.firstInputIndex = this.lines.length - 1;
    this.mode = 'singleline';
    this.location.reset();
    this.redraw();
  }

  /**
   * Applies typed characters and a control key to the caret's line.
   * @returns the accepted text, or undefined while editing continues.
   */
  public processInput(key: KeyEvent | undefined, chars: string): string | undefined {
    let line = this.location.tryGetLine();
    if (!line) {
      this.location.reset();
      line = this.location.tryGetLine();
      if (!line) {
        return undefined;
      }
    }
    if (!line.processInput(key, chars)) {
      return undefined;
    }

    const input = line.inputText;
    const isLast = line.index === this.lines.length - 1;
    const { multilineDelimiter, lineContinuation: continuation } = this.options;
    if (multilineDelimiter && countOccurrences(input, multilineDelimiter) % 2 === 1) {
      if (line.index === this.firstInputIndex) {
        this.mode = 'delimiter';
      } else if (this.mode === 'delimiter' && isLast) {
        this.mode = 'singleline';
      }
    }

    let stitch = false;
    if (continuation) {
      if (this.mode === 'singleline' && input.endsWith(continuation)) {
        this.mode = 'lineContinuation';
      } else if (this.mode === 'lineContinuation' && !input.endsWith(continuation)) {
        stitch = true;
        this.mode = 'singleline';
      }
    }

    if (this.mode !== 'singleline') {
      if (!isLast) {
        this.location.changeLine(1);
        this.refreshCaret();
      } else if (line.inputLength > 0 && this.isLengthWithinLimit(1)) {
        this.appendLine();
      }
      return undefined;
    }
    return this.assemble(stitch);
  }

  public assemble(stitch: boolean): string {
    const continuation = this.options.lineContinuation ?? '';
    const parts: string[] = [];
    for (let i = this.firstInputIndex; i < this.lines.length; i++) {
      const text = this.lines[i].inputText;
      const isLast = i === this.lines.length - 1;
      parts.push(stitch && !isLast && continuation && text.endsWith(continuation) ? text.slice(0, -continuation.length) : text);
    }
    return parts.join(stitch ? '' : '\n');
  }

  /** Input units across the editable lines, counting a newline between each pair. */
  public inputLength(): number {
    let length = 0;
    for (let i = this.firstInputIndex; i < this.lines.length; i++) {
      length += this.lines[i].inputLength;
    }
    return length + Math.max(0, this.lines.length - 1 - this.firstInputIndex);
  }

  public isLengthWithinLimit(diff: number): boolean {
    return this.inputLength() + diff <= this.options.maxInputLength;
  }

  public remainingCapacity(): number {
    return this.options.maxInputLength - this.inputLength();
  }

  public isEmptyInput(): boolean {
    for (let i = this.firstInputIndex; i < this.lines.length; i++) {
      if (this.lines[i].inputLength > 0) {
        return false;
      }
    }
    return true;
  }

  /** Removes an empty editable line after the first, moving the caret to its neighbour. */
  public tryDeleteLine(index: number, backspace: boolean): void {
    if (index <= this.firstInputIndex || index >= this.lines.length) {
      return;
    }
    const oldBottom = this.bottom;
    const [removed] = this.lines.splice(index, 1);
    const heightDiff = -removed.height;
    for (let i = index; i < this.lines.length; i++) {
      this.lines[i].index = i;
      this.lines[i].top += heightDiff;
    }
    TextLine.pool.return(removed);
    if (this.lines.length <= this.firstInputIndex + 1) {
      this.mode = 'singleline';
    }

    const neighbour = backspace ? this.lines[index - 1] : (this.lines[index] ?? this.lines[index - 1]);
    this.location.resetTo(neighbour, backspace || neighbour.index < index);

    const b = this.screen.burst().ansi(hideCursor);
    for (let i = index; i < this.lines.length; i++) {
      paintLine(b, this.lines[i], 0, this.style, this.screen.cursor);
    }
    clearRows(b, this.screen.cursor, this.bottom, oldBottom - this.bottom, this.windowHeight);
    this.finishPaint(b);
  }

  /** Repaints after `line` changed from buffer offset `from`. */
  public lineChanged(line: TextLine, from: number, change: LineChange): void {
    const b = this.screen.burst().ansi(hideCursor);
    if (change.heightDiff !== 0) {
      for (let i = line.index + 1; i < this.lines.length; i++) {
        this.lines[i].top += change.heightDiff;
      }
    }
    if (change.heightDiff > 0) {
      this.scrollIntoView(b);
    }
    const lastRow = change.rowChanged ? line.rows.length - 1 : Math.max(change.lastRow, line.rowIndexAt(from));
    paintLine(b, line, from, this.style, this.screen.cursor, lastRow);
    if (change.heightDiff !== 0) {
      for (let i = line.index + 1; i < this.lines.length; i++) {
        paintLine(b, this.lines[i], 0, this.style, this.screen.cursor);
      }
    }
    if (change.heightDiff < 0) {
      clearRows(b, this.screen.cursor, this.bottom, -change.heightDiff, this.windowHeight);
    }
    this.finishPaint(b);
  }

  public refreshCaret(): void {
    const b = this.screen.burst();
    this.appendCaret(b);
    b.flush();
  }

  /** Paints every line, scrolling first when the last one would fall below the window. */
  public redraw(): void {
    const b = this.screen.burst().ansi(hideCursor);
    this.scrollIntoView(b);
    for (const line of this.lines) {
      paintLine(b, line, 0, this.style, this.screen.cursor);
    }
    this.finishPaint(b);
  }

  /** Lays the lines out again from window row `top` and repaints them. */
  public relocate(top: number): void {
    let row = top;
    for (const line of this.lines) {
      line.top = row;
      row = line.bottom;
    }
    this.redraw();
  }

  /** Re-wraps every line for a new window width and repaints from the first line's row. */
  public reflow(): void {
    const top = Math.min(Math.max(this.top, 0), this.windowHeight - 1);
    for (const line of this.lines) {
      line.resetRows();
    }
    const b = this.screen.burst();
    moveCursor(b, this.screen.cursor, 0, top);
    b.ansi(clearDown);
    b.flush();
    this.relocate(top);
  }

  /** Re-wraps and repaints from window row `top`, after the region was erased by {@link suspend}. */
  public resume(top: number): void {
    for (const line of this.lines) {
      line.resetRows();
    }
    this.relocate(top);
  }

  /** Erases the region, leaving the cursor where the first line started. */
  public suspend(): void {
    const top = Math.max(this.top, 0);
    const b = this.screen.burst();
    clearRows(b, this.screen.cursor, top, this.bottom - top, this.windowHeight);
    moveCursor(b, this.screen.cursor, 0, Math.min(top, this.windowHeight - 1));
    b.flush();
  }

  /** Moves the cursor below the last line. */
  public finish(): void {
    const last = Math.min(Math.max(this.bottom - 1, 0), this.windowHeight - 1);
    this.screen.setCursor(0, last);
    this.screen.newLine();
  }

  private appendLine(): void {
    const line = TextLine.pool.rent().initialize(this, this.lines.length, this.options.multilinePrompt, true);
    line.top = this.bottom;
    this.lines.push(line);
    this.location.resetTo(line);

    const b = this.screen.burst().ansi(hideCursor);
    this.scrollIntoView(b);
    paintLine(b, line, 0, this.style, this.screen.cursor);
    this.finishPaint(b);
  }

  private scrollIntoView(b: SequenceBuilder): void {
    const overflow = this.bottom - this.windowHeight;
    if (overflow <= 0) {
      return;
    }
    b.ansi(scrollUp(overflow));
    for (const line of this.lines) {
      line.top -= overflow;
    }
  }

  private appendCaret(b: SequenceBuilder): void {
    this.location.sync();
    const { left, top } = this.location.screenPosition();
    moveCursor(b, this.screen.cursor, left, top);
  }

  private finishPaint(b: SequenceBuilder): void {
    this.appendCaret(b);
    b.ansi(showCursor);
    b.flush();
  }

  public release(): void {
    for (const line of this.lines) {
      TextLine.pool.return(line);
    }
    this.lines.length = 0;
    this.location.reset();
    this.mode = 'singleline';
    this.firstInputIndex = 0;
    this.screenRef = undefined;
    this.optionsRef = undefined;
  }
}
