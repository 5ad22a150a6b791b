import type { KeyEvent } from './input.js';
import { ObjectPool, type Poolable } from './ObjectPool.js';
import type { TextLocation } from './TextLocation.js';
import { type ArrangeResult, TextRow } from './TextRow.js';
import { isHighSurrogate, isLowSurrogate, unitWidths } from './width.js';

const INITIAL_CAPACITY = 256;
const DECODE_CHUNK = 4096;

/** What a line needs from the session that owns it. */
export interface LineHost {
  readonly windowWidth: number;
  readonly location: TextLocation;
  readonly isMultiline: boolean;
  readonly allowEmptyLineInput: boolean;
  isEmptyInput(): boolean;
  remainingCapacity(): number;
  tryDeleteLine(index: number, backspace: boolean): void;
  lineChanged(line: TextLine, from: number, change: LineChange): void;
  refreshCaret(): void;
}

export interface LineChange extends ArrangeResult {
  heightDiff: number;
}

export interface TextUnit {
  /** 1, or 2 for a surrogate pair. */
  length: number;
  width: number;
}

/**
 * One logical line: a prompt prefix followed (on input lines) by editable
 * text, held in UTF-16 units with a parallel width per unit and wrapped
 * into {@link TextRow}s of at most `windowWidth` columns.
 */
export class TextLine implements Poolable {
  public static readonly pool = new ObjectPool(() => new TextLine(), 32);

  public index = 0;
  /** Window row of the first row; negative once scrolled off the top. */
  public top = 0;
  public isInput = false;
  public promptLength = 0;
  public promptWidth = 0;
  public inputLength = 0;
  public inputWidth = 0;
  public readonly rows: TextRow[] = [];

  private chars = new Uint16Array(INITIAL_CAPACITY);
  private widths = new Uint8Array(INITIAL_CAPACITY);
  private owner: LineHost | undefined;

  public get host(): LineHost {
    if (!this.owner) {
      throw new Error('TextLine is not attached to a session');
    }
    return this.owner;
  }

  public get windowWidth(): number {
    return this.host.windowWidth;
  }

  public get totalLength(): number {
    return this.promptLength + this.inputLength;
  }

  public get totalWidth(): number {
    return this.promptWidth + this.inputWidth;
  }

  public get height(): number {
    return this.rows.length;
  }

  /** Window row just below this line. */
  public get bottom(): number {
    return this.top + this.rows.length;
  }

  public get promptText(): string {
    return this.textOf(0, this.promptLength);
  }

  public get inputText(): string {
    return this.textOf(this.promptLength, this.totalLength);
  }

  public initialize(host: LineHost, index: number, prompt: string, isInput: boolean): this {
    this.owner = host;
    this.index = index;
    this.top = 0;
    this.isInput = isInput;
    this.setPrompt(prompt);
    return this;
  }

  /** Replaces the prompt and drops any input. */
  public setPrompt(text: string): void {
    this.ensureCapacity(text.length);
    for (let i = 0; i < text.length; i++) {
      this.chars[i] = text.charCodeAt(i);
    }
    this.promptLength = text.length;
    this.promptWidth = unitWidths(text, this.widths, 0);
    this.inputLength = 0;
    this.inputWidth = 0;
    this.resetRows();
  }

  public textOf(start: number, end: number): string {
    let text = '';
    for (let i = start; i < end; i += DECODE_CHUNK) {
      text += String.fromCharCode(...this.chars.subarray(i, Math.min(end, i + DECODE_CHUNK)));
    }
    return text;
  }

  public widthBetween(start: number, end: number): number {
    let width = 0;
    for (let i = start; i < end; i++) {
      width += this.widths[i];
    }
    return width;
  }

  public unitAt(position: number): TextUnit {
    if (position + 1 < this.totalLength && isHighSurrogate(this.chars[position]) && isLowSurrogate(this.chars[position + 1])) {
      return { length: 2, width: this.widths[position] + this.widths[position + 1] };
    }
    return { length: 1, width: this.widths[position] };
  }

  public unitBefore(position: number): TextUnit {
    if (position >= 2 && isLowSurrogate(this.chars[position - 1]) && isHighSurrogate(this.chars[position - 2])) {
      return { length: 2, width: this.widths[position - 2] + this.widths[position - 1] };
    }
    return { length: 1, width: this.widths[position - 1] };
  }

  /** The row a caret at `position` sits on; a position on a row boundary belongs to the later row. */
  public rowIndexAt(position: number): number {
    for (let i = this.rows.length - 1; i > 0; i--) {
      if (this.rows[i].start <= position) {
        return i;
      }
    }
    return 0;
  }

  /** The row holding the unit that starts at `position`. */
  public rowIndexOfUnit(position: number): number {
    for (let i = 0; i < this.rows.length; i++) {
      if (position < this.rows[i].end) {
        return i;
      }
    }
    return this.rows.length - 1;
  }

  /** Caret position on `rowIndex` closest to `column` without passing it. */
  public positionAtColumn(rowIndex: number, column: number): number {
    const row = this.rows[rowIndex];
    const isLast = rowIndex === this.rows.length - 1;
    let position = Math.max(row.start, this.promptLength);
    let width = this.widthBetween(row.start, position);
    while (position < row.end) {
      const unit = this.unitAt(position);
      if (width + unit.width > column || (!isLast && position + unit.length >= row.end)) {
        break;
      }
      position += unit.length;
      width += unit.width;
    }
    return position;
  }

  public insertRow(index: number, start: number): TextRow {
    const row = TextRow.pool.rent().initialize(this, index, start);
    this.rows.splice(index, 0, row);
    this.reindexRows(index + 1);
    return row;
  }

  public removeRow(index: number): void {
    const [row] = this.rows.splice(index, 1);
    if (row) {
      TextRow.pool.return(row);
    }
    this.reindexRows(index);
  }

  /** Rebuilds the rows greedily from the buffer, as after a prompt change or a window resize. */
  public resetRows(): void {
    for (const row of this.rows) {
      TextRow.pool.return(row);
    }
    this.rows.length = 0;

    const windowWidth = this.windowWidth;
    let row = this.insertRow(0, 0);
    let position = 0;
    while (position < this.totalLength) {
      const unit = this.unitAt(position);
      if (row.length > 0 && row.width + unit.width > windowWidth) {
        row = this.insertRow(this.rows.length, position);
      }
      row.length += unit.length;
      row.width += unit.width;
      position += unit.length;
    }
    if (this.isInput && row.width >= windowWidth) {
      this.insertRow(this.rows.length, this.totalLength);
    }
  }

  /** Inserts `text` at `position` and re-wraps from the row before the insertion. */
  public insert(position: number, text: string): LineChange {
    const length = text.length;
    const total = this.totalLength;
    this.ensureCapacity(total + length);
    this.chars.copyWithin(position + length, position, total);
    this.widths.copyWithin(position + length, position, total);
    for (let i = 0; i < length; i++) {
      this.chars[position + i] = text.charCodeAt(i);
    }
    const width = unitWidths(text, this.widths, position);
    this.inputLength += length;
    this.inputWidth += width;

    const rowIndex = this.rowIndexAt(position);
    this.rows[rowIndex].addInput(length, width);
    return this.arrangeFrom(rowIndex);
  }

  public remove(position: number, length: number): LineChange {
    const total = this.totalLength;
    const width = this.widthBetween(position, position + length);
    const rowIndex = this.rowIndexOfUnit(position);
    this.chars.copyWithin(position, position + length, total);
    this.widths.copyWithin(position, position + length, total);
    this.inputLength -= length;
    this.inputWidth -= width;

    this.rows[rowIndex].addInput(-length, -width);
    return this.arrangeFrom(rowIndex);
  }

  /** Drops every input unit, leaving the prompt rows. */
  public clearInput(): LineChange {
    const heightBefore = this.height;
    this.inputLength = 0;
    this.inputWidth = 0;
    this.resetRows();
    return { rowChanged: true, lastRow: this.rows.length - 1, heightDiff: this.height - heightBefore };
  }

  /**
   * Inserts `chars` at the caret, then applies `key`.
   * @returns true when Enter was pressed and accepted.
   */
  public processInput(key: KeyEvent | undefined, chars: string): boolean {
    const host = this.host;
    if (chars.length > 0) {
      this.insertAtCaret(chars);
    }
    if (!key) {
      return false;
    }

    const location = host.location;
    switch (key.key) {
      case 'enter':
        return host.allowEmptyLineInput || !host.isEmptyInput();
      case 'backspace':
        this.backspace();
        return false;
      case 'delete':
        this.deleteForward();
        return false;
      case 'home':
        location.moveFirst();
        break;
      case 'end':
        location.moveLast();
        break;
      case 'left':
        location.moveLeft();
        break;
      case 'right':
        location.moveRight();
        break;
      case 'up':
      case 'down':
        if (host.isMultiline) {
          location.moveVertical(key.key === 'up');
        }
        break;
      case 'insert':
        // overtype mode is not supported
        return false;
      case 'char':
        if (key.ctrl && key.char === 'u') {
          this.clearLine();
        }
        return false;
      default:
        return false;
    }
    host.refreshCaret();
    return false;
  }

  private insertAtCaret(chars: string): void {
    const host = this.host;
    const allowed = host.remainingCapacity();
    if (allowed <= 0) {
      return;
    }
    let text = chars.length > allowed ? chars.slice(0, allowed) : chars;
    if (text.length < chars.length && isHighSurrogate(text.charCodeAt(text.length - 1))) {
      text = text.slice(0, -1);
    }
    if (text.length === 0) {
      return;
    }
    const position = host.location.arrayPosition;
    const change = this.insert(position, text);
    host.location.setPosition(position + text.length);
    host.lineChanged(this, position, change);
  }

  private backspace(): void {
    const host = this.host;
    if (this.inputLength === 0) {
      host.tryDeleteLine(this.index, true);
      return;
    }
    const position = host.location.arrayPosition;
    if (position <= this.promptLength) {
      return;
    }
    const unit = this.unitBefore(position);
    const from = position - unit.length;
    const change = this.remove(from, unit.length);
    host.location.setPosition(from);
    host.lineChanged(this, from, change);
  }

  private deleteForward(): void {
    const host = this.host;
    if (this.inputLength === 0) {
      host.tryDeleteLine(this.index, false);
      return;
    }
    const position = host.location.arrayPosition;
    if (position >= this.totalLength) {
      return;
    }
    const change = this.remove(position, this.unitAt(position).length);
    host.location.setPosition(position);
    host.lineChanged(this, position, change);
  }

  private clearLine(): void {
    if (this.inputLength === 0) {
      return;
    }
    const host = this.host;
    const change = this.clearInput();
    host.location.resetTo(this);
    host.lineChanged(this, this.promptLength, change);
  }

  private arrangeFrom(rowIndex: number): LineChange {
    const heightBefore = this.height;
    const result: ArrangeResult = { rowChanged: false, lastRow: rowIndex };
    // the previous row may have room for what now starts this one
    this.rows[Math.max(0, rowIndex - 1)].arrange(result);
    return { ...result, heightDiff: this.height - heightBefore };
  }

  private reindexRows(from: number): void {
    for (let i = from; i < this.rows.length; i++) {
      this.rows[i].index = i;
    }
  }

  private ensureCapacity(required: number): void {
    if (required <= this.chars.length) {
      return;
    }
    let capacity = this.chars.length;
    while (capacity < required) {
      capacity *= 2;
    }
    const chars = new Uint16Array(capacity);
    chars.set(this.chars);
    const widths = new Uint8Array(capacity);
    widths.set(this.widths);
    this.chars = chars;
    this.widths = widths;
  }

  public release(): void {
    for (const row of this.rows) {
      TextRow.pool.return(row);
    }
    this.rows.length = 0;
    this.owner = undefined;
    this.index = 0;
    this.top = 0;
    this.isInput = false;
    this.promptLength = 0;
    this.promptWidth = 0;
    this.inputLength = 0;
    this.inputWidth = 0;
  }
}
