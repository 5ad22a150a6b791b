import { setTimeout as delay } from 'node:timers/promises';
import { inspect } from 'node:util';
import { DateTimeFormatter, LocalTime } from '@js-joda/core';
import stripAnsi from 'strip-ansi';
import type { ConsoleConfig } from './console-config.js';
import { decodeKeys, isCharacterKey, type KeyEvent } from './input.js';
import { InputQueue } from './InputQueue.js';
import { Mutex } from './Mutex.js';
import { type ReadLineOptions, type ReadLineOptionsInput, resolveReadLineOptions } from './options.js';
import { ReadLineSession } from './ReadLineSession.js';
import { eraseToEndOfLine, hideCursor, moveCursor, resetStyle } from './renderer.js';
import { Screen } from './Screen.js';
import type { TerminalDevice } from './terminal.js';
import { TraceWriter } from './TraceWriter.js';
import { stringWidth } from './width.js';

export type InputResult = { type: 'success'; text: string } | { type: 'canceled' } | { type: 'terminated' };

export interface PromptConsoleOptions {
  /** Applied to every read; per-call options win. */
  defaults?: ReadLineOptionsInput;
  pollIntervalMs?: number;
  inputQueueCapacity?: number;
  trace?: TraceWriter;
}

type StepOutcome = InputResult | 'idle' | 'continue';

const TIME_FORMAT = DateTimeFormatter.ofPattern('HH:mm:ss.SSS');

/** Printable keys read back-to-back are inserted together, up to this many units. */
const CHAR_BUFFER_SIZE = 1024;

const CANCELED: InputResult = { type: 'canceled' };
const TERMINATED: InputResult = { type: 'terminated' };

/**
 * Line-editing console over a {@link TerminalDevice}.
 *
 * Reads nest: a read started while another is active takes over the
 * terminal until it completes, then the outer read is redrawn below it.
 * Output written with {@link writeLine} appears above the active read.
 */
export class PromptConsole {
  public defaults: ReadLineOptionsInput;
  private readonly screen: Screen;
  private readonly lock = new Mutex();
  private readonly sessions: ReadLineSession[] = [];
  private readonly queue: InputQueue;
  private readonly pendingKeys: KeyEvent[] = [];
  private readonly pollIntervalMs: number;
  private readonly trace: TraceWriter | undefined;
  private terminated = false;

  public constructor(
    private readonly device: TerminalDevice,
    options: PromptConsoleOptions = {},
  ) {
    this.defaults = options.defaults ?? {};
    this.pollIntervalMs = options.pollIntervalMs ?? 10;
    this.queue = new InputQueue(options.inputQueueCapacity ?? 256);
    this.trace = options.trace;
    this.screen = new Screen(device, options.trace);
  }

  public static fromConfig(device: TerminalDevice, config: ConsoleConfig): PromptConsole {
    return new PromptConsole(device, {
      defaults: config.defaults,
      pollIntervalMs: config.pollIntervalMs,
      inputQueueCapacity: config.inputQueueCapacity,
      trace: config.traceFile ? new TraceWriter(config.traceFile) : undefined,
    });
  }

  public get isReadLineInProgress(): boolean {
    return this.sessions.length > 0;
  }

  public get isTerminated(): boolean {
    return this.terminated;
  }

  /**
   * Reads one input. Resolves `terminated` once {@link terminate} is called,
   * `signal` aborts, or a termination is dequeued; never rejects for terminal failures.
   */
  public async readLine(options: ReadLineOptionsInput = {}, signal?: AbortSignal): Promise<InputResult> {
    if (this.terminated || signal?.aborted) {
      return TERMINATED;
    }
    const resolved = resolveReadLineOptions({ ...this.defaults, ...options });
    const session = await this.lock.runExclusive(() => this.openSession(resolved));
    let result = TERMINATED;
    try {
      result = await this.edit(session, signal);
    } finally {
      await this.lock.runExclusive(() => this.closeSession(session, result));
    }
    return result;
  }

  /** Writes `message` above the active read, or at the cursor when none is active. */
  public writeLine(message = ''): Promise<void> {
    return this.lock.runExclusive(() => this.writeAbove(message));
  }

  public log(message: string, ...args: unknown[]): Promise<void> {
    return this.writeLine(this.formatLogLine(message, ...args));
  }

  /** Queues `text` as if typed; `\n` presses Enter. @returns false when the queue is full. */
  public enqueueInput(text: string): boolean {
    return this.queue.tryEnqueue({ type: 'text', text });
  }

  /** Queues an end to the read that drains it. @returns false when the queue is full. */
  public enqueueTermination(): boolean {
    return this.queue.tryEnqueue({ type: 'terminate' });
  }

  /** Ends every active read with `terminated`, and every later one immediately. */
  public terminate(): void {
    this.terminated = true;
  }

  private timestamp(): string {
    return LocalTime.now().format(TIME_FORMAT);
  }

  private formatLogLine(message: string, ...args: unknown[]): string {
    let line = `${resetStyle}[${this.timestamp()}] ${message}`;
    for (const a of args) {
      line += ' ';
      line += typeof a === 'string' ? a : inspect(a, { depth: null, colors: true, breakLength: Infinity, compact: true });
    }
    return line;
  }

  private async openSession(options: ReadLineOptions): Promise<ReadLineSession> {
    this.screen.refreshWindowSize();
    const outer = this.sessions.at(-1);
    if (outer) {
      outer.suspend();
    } else {
      const cursor = await this.screen.syncCursor();
      if (cursor.left !== 0) {
        this.screen.newLine();
      }
    }
    const session = ReadLineSession.rent(this.screen, options);
    this.sessions.push(session);
    session.prepare(Math.max(this.screen.cursor.top, 0));
    this.trace?.write({ type: 'session', action: 'open', depth: this.sessions.length });
    return session;
  }

  private closeSession(session: ReadLineSession, result: InputResult): void {
    const wasFocused = this.sessions.at(-1) === session;
    const index = this.sessions.indexOf(session);
    if (index >= 0) {
      this.sessions.splice(index, 1);
    }
    if (wasFocused) {
      session.finish();
    }
    ReadLineSession.return(session);
    this.trace?.write({ type: 'session', action: 'close', depth: this.sessions.length, result: result.type });
    const outer = this.sessions.at(-1);
    if (wasFocused && outer) {
      outer.resume(this.screen.cursor.top);
    }
  }

  private async edit(session: ReadLineSession, signal: AbortSignal | undefined): Promise<InputResult> {
    for (;;) {
      if (this.terminated || signal?.aborted) {
        return TERMINATED;
      }
      if (this.sessions.at(-1) !== session) {
        await delay(this.pollIntervalMs);
        continue;
      }
      const injected = this.queue.tryDequeue();
      if (injected?.type === 'terminate') {
        return TERMINATED;
      }
      if (injected?.type === 'text') {
        this.pendingKeys.push(...decodeKeys(injected.text, { plain: true }));
      }
      const outcome = await this.lock.runExclusive(() => this.step(session));
      if (outcome === 'idle') {
        await delay(this.pollIntervalMs);
      } else if (outcome !== 'continue') {
        return outcome;
      }
    }
  }

  private readKey(): KeyEvent | undefined {
    return this.pendingKeys.shift() ?? this.device.readKey();
  }

  private step(session: ReadLineSession): StepOutcome {
    if (this.sessions.at(-1) !== session) {
      return 'idle';
    }
    if (this.screen.refreshWindowSize()) {
      session.reflow();
    }
    const first = this.readKey();
    if (!first) {
      return 'idle';
    }

    const options = session.options;
    let chars = '';
    let control: KeyEvent | undefined;
    for (let key: KeyEvent | undefined = first; key; key = chars.length < CHAR_BUFFER_SIZE ? this.readKey() : undefined) {
      const verdict = options.keyInputHook?.(key) ?? 'notHandled';
      if (verdict === 'cancel') {
        return CANCELED;
      }
      // A hook may have started a nested read; keys after this one are its.
      if (verdict === 'handled') {
        break;
      }
      if (key.key === 'escape' && options.cancelOnEscape) {
        return CANCELED;
      }
      if (isCharacterKey(key)) {
        chars += key.char;
        continue;
      }
      control = key;
      break;
    }
    if (chars.length === 0 && !control) {
      return 'continue';
    }

    const text = session.processInput(control, chars);
    if (text === undefined) {
      return 'continue';
    }
    const accepted = options.textInputHook ? options.textInputHook(text) : text;
    return accepted === null ? 'continue' : { type: 'success', text: accepted };
  }

  private writeAbove(message: string): void {
    const screen = this.screen;
    const session = this.sessions.at(-1);
    const b = screen.burst();
    if (session) {
      b.ansi(hideCursor);
      moveCursor(b, screen.cursor, 0, Math.min(Math.max(session.top, 0), screen.windowHeight - 1));
    }

    let left = Math.max(screen.cursor.left, 0);
    let rows = 0;
    for (const text of message.split(/\r?\n/)) {
      // escape sequences in log() and inspect() output take no columns
      const used = left + stringWidth(stripAnsi(text));
      b.text(text);
      if (used === 0 || used % screen.windowWidth !== 0) {
        b.ansi(eraseToEndOfLine);
      }
      b.ansi('\r\n');
      rows += Math.max(1, Math.ceil(used / screen.windowWidth));
      left = 0;
    }
    b.flush();
    screen.cursor.left = 0;
    screen.cursor.top = Math.min(Math.max(screen.cursor.top, 0) + rows, screen.windowHeight - 1);

    session?.relocate(screen.cursor.top);
  }
}
