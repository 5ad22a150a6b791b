import { describe, expect, it } from 'vitest';
import { ObjectPool, type Poolable } from '../src/ObjectPool.js';

class Item implements Poolable {
  public value = 0;
  public released = 0;

  public release(): void {
    this.value = 0;
    this.released++;
  }
}

describe('ObjectPool', () => {
  it('reuses returned items after releasing them', () => {
    const pool = new ObjectPool(() => new Item(), 2);
    const item = pool.rent();
    item.value = 7;
    pool.return(item);

    const again = pool.rent();
    expect(again).toBe(item);
    expect(again.value).toBe(0);
    expect(again.released).toBe(1);
  });

  it('creates a new item when the free list is empty', () => {
    const pool = new ObjectPool(() => new Item(), 2);
    const a = pool.rent();
    const b = pool.rent();
    expect(b).not.toBe(a);
  });

  it('drops returns beyond its capacity', () => {
    const pool = new ObjectPool(() => new Item(), 1);
    const a = pool.rent();
    const b = pool.rent();
    pool.return(a);
    pool.return(b);
    expect(b.released).toBe(1);
    expect(pool.rent()).toBe(a);
    const c = pool.rent();
    expect(c).not.toBe(a);
    expect(c).not.toBe(b);
  });
});
