import { type DecodeOptions, decodeKeys, type KeyEvent } from './input.js';

export interface WindowSize {
  width: number;
  height: number;
}

export interface CursorPosition {
  left: number;
  top: number;
}

/** The terminal capabilities a console needs. */
export interface TerminalDevice {
  /** Next decoded key, or undefined when none is waiting. Never blocks. */
  readKey(): KeyEvent | undefined;
  write(data: string): void;
  getWindowSize(): WindowSize;
  getCursorPosition(): Promise<CursorPosition>;
}

export interface NodeTerminalOptions extends DecodeOptions {
  /** How long to wait for the terminal to answer a cursor position query. */
  cursorQueryTimeoutMs?: number;
}

/** The parts of `process.stdin` a {@link NodeTerminal} uses. */
export interface TerminalInput {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  removeListener(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/** The parts of `process.stdout` a {@link NodeTerminal} uses. */
export interface TerminalOutput {
  readonly isTTY?: boolean;
  readonly columns?: number;
  readonly rows?: number;
  write(data: string): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  removeListener(event: 'error', listener: (err: Error) => void): unknown;
}

export const DEFAULT_WINDOW_SIZE: WindowSize = { width: 120, height: 30 };

const queryCursorPosition = '\x1B[6n';
// biome-ignore lint/suspicious/noControlCharactersInRegex: matching terminal escape sequences requires \x1b
const CURSOR_REPORT = /\x1b\[(\d+);(\d+)R/;

/**
 * {@link TerminalDevice} over Node's stdin and stdout. Raw mode is only
 * used on a TTY; piped input is decoded as plain characters. An `error`
 * event on the output (EPIPE when the reader goes away) is kept and thrown
 * from the next {@link write}.
 */
export class NodeTerminal implements TerminalDevice {
  private readonly keys: KeyEvent[] = [];
  private readonly onData = (chunk: string | Buffer): void => this.receive(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
  private readonly onError = (err: Error): void => {
    this.writeError = err;
  };
  private writeError: Error | undefined;
  private pendingReport: ((position: CursorPosition | undefined) => void) | undefined;
  private lastPosition: CursorPosition = { left: 0, top: 0 };
  private wasRaw = false;
  private started = false;

  public constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout,
    private readonly options: NodeTerminalOptions = {},
  ) {}

  public get isInteractive(): boolean {
    return this.input.isTTY === true && this.output.isTTY === true;
  }

  public start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.output.on('error', this.onError);
    if (this.input.isTTY && this.input.setRawMode) {
      this.wasRaw = this.input.isRaw ?? false;
      this.input.setRawMode(true);
    }
    this.input.setEncoding('utf8');
    this.input.on('data', this.onData);
    this.input.resume();
  }

  public stop(): void {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.input.removeListener('data', this.onData);
    this.output.removeListener('error', this.onError);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(this.wasRaw);
    }
    this.input.pause();
    this.pendingReport?.(undefined);
  }

  public readKey(): KeyEvent | undefined {
    return this.keys.shift();
  }

  public write(data: string): void {
    if (this.writeError) {
      throw this.writeError;
    }
    this.output.write(data);
  }

  public getWindowSize(): WindowSize {
    return {
      width: Math.max(1, this.output.columns || DEFAULT_WINDOW_SIZE.width),
      height: Math.max(1, this.output.rows || DEFAULT_WINDOW_SIZE.height),
    };
  }

  public getCursorPosition(): Promise<CursorPosition> {
    if (!this.isInteractive || !this.started) {
      return Promise.resolve(this.lastPosition);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingReport = undefined;
        resolve(this.lastPosition);
      }, this.options.cursorQueryTimeoutMs ?? 200);
      this.pendingReport = (position) => {
        clearTimeout(timer);
        this.pendingReport = undefined;
        if (position) {
          this.lastPosition = position;
        }
        resolve(this.lastPosition);
      };
      try {
        this.write(queryCursorPosition);
      } catch (err) {
        clearTimeout(timer);
        this.pendingReport = undefined;
        reject(err);
      }
    });
  }

  private receive(chunk: string): void {
    let data = chunk;
    if (this.pendingReport) {
      const match = CURSOR_REPORT.exec(data);
      if (match) {
        this.pendingReport({ left: Number(match[2]) - 1, top: Number(match[1]) - 1 });
        data = data.slice(0, match.index) + data.slice(match.index + match[0].length);
      }
    }
    this.keys.push(...decodeKeys(data, { ...this.options, plain: !this.input.isTTY }));
  }
}
