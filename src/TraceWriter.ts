import { appendFileSync } from 'node:fs';
import { Instant } from '@js-joda/core';

export type TraceEvent =
  | { type: 'write-failed'; error: string }
  | { type: 'cursor-query-failed'; error: string }
  | { type: 'resize'; width: number; height: number }
  | { type: 'session'; action: 'open' | 'close'; depth: number; result?: string };

/**
 * Appends trace events as JSON lines. The first failed append disables the
 * writer and keeps the error on {@link lastError}; tracing never throws.
 */
export class TraceWriter {
  private disabled = false;
  public lastError: unknown;

  public constructor(private readonly filePath: string) {}

  public write(event: TraceEvent): void {
    if (this.disabled) {
      return;
    }
    try {
      const entry = { timestamp: Instant.now().toString(), ...event };
      appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`);
    } catch (err) {
      this.disabled = true;
      this.lastError = err;
    }
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
