/**
 * Promise-chain mutex. Tasks run one at a time in the order they were queued;
 * a task that throws rejects its own promise without blocking the queue.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  public runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
