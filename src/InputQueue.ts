export type InjectedInput = { type: 'text'; text: string } | { type: 'terminate' };

/**
 * Bounded FIFO of injected input. Any caller may enqueue; the edit loop is the only consumer.
 */
export class InputQueue {
  private readonly items: (InjectedInput | undefined)[];
  private head = 0;
  private count = 0;

  public constructor(public readonly capacity: number) {
    this.items = new Array<InjectedInput | undefined>(capacity).fill(undefined);
  }

  public tryEnqueue(item: InjectedInput): boolean {
    if (this.count === this.capacity) {
      return false;
    }
    this.items[(this.head + this.count) % this.capacity] = item;
    this.count++;
    return true;
  }

  public tryDequeue(): InjectedInput | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }
}
