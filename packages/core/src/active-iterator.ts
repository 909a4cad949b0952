/** The read surface an `ActiveIterator` walks. Implemented by `SlotPool`. */
export interface IterablePool<T> {
  readonly size: number;
  isInUse(index: number): boolean;
  at(index: number): T;
}

/**
 * Forward cursor over the active slots of a pool.
 *
 * The iterator does not own the pool; it holds a reference plus the current
 * slot index and skips inactive slots on construction and on every
 * `advance()`. A `begin` iterator of a pool with no active slots is equal to
 * its `end` iterator.
 *
 * Element contents may be mutated while iterating. Activating or freeing
 * slots mid-iteration is not supported.
 *
 * Also implements the JS iterator protocol, so `for (const e of pool)` works
 * on top of the same cursor.
 */
export class ActiveIterator<T> implements IterableIterator<T> {
  private readonly pool: IterablePool<T> | null;
  private position: number;

  /** Create a detached iterator. Detached iterators compare equal to each other. */
  constructor();
  constructor(pool: IterablePool<T>, position: number);
  constructor(pool: IterablePool<T> | null = null, position: number = 0) {
    this.pool = pool;
    this.position = position;
    this.skipUnused();
  }

  /** Iterator at the first active slot, or at end when none is active. */
  static begin<T>(pool: IterablePool<T>): ActiveIterator<T> {
    return new ActiveIterator(pool, 0);
  }

  /** End sentinel: positioned at `pool.size`, referencing no element. */
  static end<T>(pool: IterablePool<T>): ActiveIterator<T> {
    return new ActiveIterator(pool, pool.size);
  }

  /** Slot index under the cursor (`size` once done). */
  get index(): number {
    return this.position;
  }

  get done(): boolean {
    return this.pool === null || this.position >= this.pool.size;
  }

  /**
   * Element under the cursor.
   * @throws RangeError on an end or detached iterator.
   */
  get value(): T {
    if (this.pool === null || this.position >= this.pool.size) {
      throw new RangeError('ActiveIterator.value: iterator is past the last active slot');
    }
    return this.pool.at(this.position);
  }

  /** Move to the next active slot. No-op once done. */
  advance(): this {
    if (!this.done) {
      this.position += 1;
      this.skipUnused();
    }
    return this;
  }

  clone(): ActiveIterator<T> {
    if (this.pool === null) return new ActiveIterator<T>();
    return new ActiveIterator(this.pool, this.position);
  }

  /**
   * Two iterators are equal when they walk the same pool and sit on the same
   * slot. All end iterators of a pool are equal; end never equals non-end.
   */
  equals(other: ActiveIterator<T>): boolean {
    return this.pool === other.pool && this.position === other.position;
  }

  next(): IteratorResult<T> {
    if (this.done) {
      return { done: true, value: undefined };
    }
    const value = this.value;
    this.advance();
    return { done: false, value };
  }

  [Symbol.iterator](): this {
    return this;
  }

  private skipUnused(): void {
    if (this.pool === null) {
      this.position = 0;
      return;
    }
    const end = this.pool.size;
    if (this.position > end) this.position = end;
    while (this.position < end && !this.pool.isInUse(this.position)) {
      this.position += 1;
    }
  }
}
