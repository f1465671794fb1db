import { assertPeriod } from "./errors.js";

/**
 * Fixed-capacity ring buffer over the last `capacity` items.
 *
 * The buffer starts filled with the seed, so it always holds exactly
 * `capacity` items and `push` returns the seed until real items start
 * falling out.
 */
export class Window<T> implements Iterable<T> {
  public readonly capacity: number;

  private readonly items: T[];
  /** Slot of the oldest item, which is also the next slot written. */
  private cursor = 0;

  public constructor(capacity: number, seed: T) {
    this.capacity = assertPeriod("Window capacity", capacity);
    this.items = new Array<T>(capacity).fill(seed);
  }

  /**
   * Appends `item` and returns the item it evicted.
   */
  public push(item: T): T {
    const evicted = this.items[this.cursor];
    this.items[this.cursor] = item;
    this.cursor = (this.cursor + 1) % this.capacity;
    return evicted;
  }

  public oldest(): T {
    return this.items[this.cursor];
  }

  public newest(): T {
    return this.items[(this.cursor + this.capacity - 1) % this.capacity];
  }

  /**
   * Item at `offset` counted from the oldest (0) to the newest (`capacity - 1`).
   */
  public at(offset: number): T {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.capacity) {
      throw new RangeError(`Window offset ${offset} outside [0, ${this.capacity - 1}]`);
    }
    return this.items[(this.cursor + offset) % this.capacity];
  }

  public toArray(): T[] {
    return Array.from(this);
  }

  public *[Symbol.iterator](): Iterator<T> {
    for (let offset = 0; offset < this.capacity; offset += 1) {
      yield this.items[(this.cursor + offset) % this.capacity];
    }
  }
}
