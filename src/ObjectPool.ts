export interface Poolable {
  /** Drop every reference and zero every length before the object goes back to the pool. */
  release(): void;
}

/** Free list of reusable objects, bounded so a burst of rentals does not pin memory forever. */
export class ObjectPool<T extends Poolable> {
  private readonly free: T[] = [];

  public constructor(
    private readonly factory: () => T,
    private readonly capacity: number,
  ) {}

  public rent(): T {
    return this.free.pop() ?? this.factory();
  }

  public return(item: T): void {
    item.release();
    if (this.free.length < this.capacity) {
      this.free.push(item);
    }
  }
}
