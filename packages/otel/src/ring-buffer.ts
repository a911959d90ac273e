/**
 * Bounded ring buffer.
 *
 * Fixed capacity, the oldest entry drops on overflow. Entries leave only
 * through drain().
 */

export class RingBuffer<T> {
  private readonly _items: (T | undefined)[];
  private readonly _capacity: number;
  private _start = 0;
  private _size = 0;

  constructor(capacity: number) {
    if (capacity < 1 || !Number.isInteger(capacity)) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this._capacity = capacity;
    this._items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  get capacity(): number {
    return this._capacity;
  }

  /**
   * Append an item. Returns true when the oldest item was evicted to make room.
   */
  push(item: T): boolean {
    if (this._size < this._capacity) {
      this._items[(this._start + this._size) % this._capacity] = item;
      this._size++;
      return false;
    }
    this._items[this._start] = item;
    this._start = (this._start + 1) % this._capacity;
    return true;
  }

  /**
   * Remove and return up to `max` items, oldest first.
   */
  drain(max: number = this._size): T[] {
    const count = Math.min(max, this._size);
    const result: T[] = [];
    for (let i = 0; i < count; i++) {
      const item = this._items[this._start];
      this._items[this._start] = undefined;
      this._start = (this._start + 1) % this._capacity;
      this._size--;
      if (item !== undefined) result.push(item);
    }
    return result;
  }
}
