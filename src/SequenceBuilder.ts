import { isHighSurrogate } from './width.js';

/** Maximum size of one write to the terminal, in UTF-16 code units. */
export const MAX_BURST_LENGTH = 64 * 1024;

/**
 * Accumulates terminal output into bursts. When an append would grow the
 * burst past its capacity, what is buffered goes to the sink first and
 * longer text is handed over in capacity-sized chunks.
 */
export class SequenceBuilder {
  private output = '';

  public constructor(
    private readonly sink: (chunk: string) => void,
    private readonly capacity = MAX_BURST_LENGTH,
  ) {}

  private append(s: string): this {
    if (this.output.length + s.length <= this.capacity) {
      this.output += s;
      return this;
    }
    this.flush();
    let rest = s;
    while (rest.length > this.capacity) {
      let end = this.capacity;
      // never split a surrogate pair across writes
      if (end > 1 && isHighSurrogate(rest.charCodeAt(end - 1))) {
        end--;
      }
      this.sink(rest.slice(0, end));
      rest = rest.slice(end);
    }
    this.output = rest;
    return this;
  }

  /** Append text that is visible on screen. */
  public text(s: string): this {
    return this.append(s);
  }

  /** Append an ANSI escape sequence. */
  public ansi(s: string): this {
    return this.append(s);
  }

  /** Hands whatever is buffered to the sink. */
  public flush(): void {
    if (this.output.length === 0) {
      return;
    }
    const output = this.output;
    this.output = '';
    this.sink(output);
  }
}
