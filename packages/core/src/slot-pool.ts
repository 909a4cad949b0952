import { ActiveIterator } from './active-iterator.js';
import type { IterablePool } from './active-iterator.js';
import { OK_VOID, PoolError, err, ok } from './pool-error.js';
import type { PoolResult } from './pool-error.js';

/**
 * Builds an element. Called with no arguments it must return the element
 * type's default value; called with `A` it builds from those arguments.
 */
export type SlotFactory<T, A extends unknown[]> = (...args: A | []) => T;

/** Reinitializes `element` in place, with the same argument contract as `SlotFactory`. */
export type SlotReset<T, A extends unknown[]> = (element: T, ...args: A | []) => void;

/**
 * How slots are constructed. A bare factory allocates a new element on every
 * reconstruction; `{ create, reset }` allocates once per slot and resets the
 * stored element in place afterwards.
 */
export type SlotInitializer<T, A extends unknown[] = []> =
  | SlotFactory<T, A>
  | { readonly create: SlotFactory<T, A>; readonly reset: SlotReset<T, A> };

/** Result payload of the next-free searches. */
export interface SlotEntry<T> {
  readonly index: number;
  readonly element: T;
}

/** Index plus the slot generation at the time the handle was taken. */
export interface SlotHandle {
  readonly index: number;
  readonly generation: number;
}

/** Read-only view of a pool. Elements come back as `Readonly<T>`. */
export interface ReadonlySlotPool<T> extends Iterable<Readonly<T>> {
  readonly size: number;
  readonly objectsInUse: number;
  isInUse(index: number): boolean;
  get(index: number): PoolResult<Readonly<T>>;
  at(index: number): Readonly<T>;
  generationOf(index: number): number;
  forEachActive(callback: (element: Readonly<T>, index: number) => void): void;
}

/**
 * Fixed-capacity pool of value slots, each either active or free.
 *
 * Every slot is constructed once up front. Freeing a slot reconstructs its
 * element, so a slot never hands out the previous occupant's state. Storage
 * never grows or shrinks.
 *
 * Fallible operations return a `PoolResult` and leave the pool untouched on
 * error. Element references returned by `use`, `useNext`, `useNextReplace`
 * and `get` are valid only until the next `replace`, `unUse` or `clear` of
 * that slot; use `handleOf()` / `resolve()` where staleness must be caught.
 *
 * Not synchronized: one owner at a time.
 *
 * ```ts
 * const enemies = new SlotPool(128, () => new Enemy());
 * const spawned = enemies.useNext();
 * if (spawned.ok) spawned.value.element.spawnAt(x, y);
 * for (const enemy of enemies) enemy.update(dt);
 * ```
 */
export class SlotPool<T, A extends unknown[] = []> implements ReadonlySlotPool<T>, IterablePool<T> {
  /** Total number of slots. */
  readonly size: number;

  private readonly elements: T[];
  private readonly active: Uint8Array;
  private readonly generations: Uint32Array;
  private readonly create: SlotFactory<T, A>;
  private readonly reset: SlotReset<T, A> | null;
  private inUse: number = 0;
  private cursor: number = 0;

  /**
   * @param capacity Number of slots, fixed for the pool's lifetime.
   * @param init Factory, or `{ create, reset }` for in-place reconstruction.
   * @param ctorArgs Arguments applied to every slot at construction.
   * @throws RangeError when `capacity` is not a non-negative safe integer.
   */
  constructor(capacity: number, init: SlotInitializer<T, A>, ...ctorArgs: A | []) {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new RangeError(`SlotPool: capacity ${capacity} must be a non-negative integer`);
    }
    this.size = capacity;
    if (typeof init === 'function') {
      this.create = init;
      this.reset = null;
    } else {
      this.create = init.create;
      this.reset = init.reset;
    }
    this.active = new Uint8Array(capacity);
    this.generations = new Uint32Array(capacity);
    this.elements = new Array<T>(capacity);
    for (let i = 0; i < capacity; i++) {
      this.elements[i] = this.create(...ctorArgs);
    }
  }

  /** Number of active slots. */
  get objectsInUse(): number {
    return this.inUse;
  }

  /**
   * Unchecked element access: no activation check, for hot paths where the
   * caller already knows the slot is valid.
   * @throws RangeError when `index` is outside `[0, size)`.
   */
  at(index: number): T {
    if (!this.inRange(index)) {
      throw new RangeError(`SlotPool.at: index ${index} is out of range [0, ${this.size})`);
    }
    return this.elements[index];
  }

  /** Activate the slot at `index` without reconstructing its element. */
  use(index: number): PoolResult<T> {
    if (!this.inRange(index)) return err(PoolError.OutOfRange);
    if (this.active[index] === 1) return err(PoolError.AlreadyInUse);
    this.activate(index);
    return ok(this.elements[index]);
  }

  /**
   * Activate the first free slot found scanning circularly from the search
   * cursor. The element is not reconstructed.
   */
  useNext(): PoolResult<SlotEntry<T>> {
    const index = this.findFree();
    if (index < 0) return err(PoolError.Full);
    this.activate(index);
    return ok({ index, element: this.elements[index] });
  }

  /**
   * Like `useNext()`, but the element is reconstructed first: default-built
   * without arguments, or built from `args`.
   */
  useNextReplace(...args: A | []): PoolResult<SlotEntry<T>> {
    const index = this.findFree();
    if (index < 0) return err(PoolError.Full);
    this.reconstruct(index, args);
    this.activate(index);
    return ok({ index, element: this.elements[index] });
  }

  /** Checked access to an active slot. */
  get(index: number): PoolResult<T> {
    if (!this.inRange(index)) return err(PoolError.OutOfRange);
    if (this.active[index] === 0) return err(PoolError.NotInUse);
    return ok(this.elements[index]);
  }

  /** `false` for any index outside the pool; never fails. */
  isInUse(index: number): boolean {
    return this.inRange(index) && this.active[index] === 1;
  }

  /** Free an active slot and reconstruct its element (from `args` if given). */
  unUse(index: number, ...args: A | []): PoolResult<void> {
    if (!this.inRange(index)) return err(PoolError.OutOfRange);
    if (this.active[index] === 0) return err(PoolError.AlreadyUnused);
    this.reconstruct(index, args);
    this.active[index] = 0;
    this.inUse -= 1;
    return OK_VOID;
  }

  /**
   * Reconstruct the slot's element and mark it free, whatever its state.
   * Replacing an active slot frees it.
   */
  replace(index: number, ...args: A | []): PoolResult<void> {
    if (!this.inRange(index)) return err(PoolError.OutOfRange);
    this.reconstruct(index, args);
    if (this.active[index] === 1) {
      this.active[index] = 0;
      this.inUse -= 1;
    }
    return OK_VOID;
  }

  /** Free every active slot. Returns how many slots were freed. */
  clear(...args: A | []): number {
    let freed = 0;
    for (let i = 0; i < this.size && this.inUse > 0; i++) {
      if (this.active[i] === 0) continue;
      this.reconstruct(i, args);
      this.active[i] = 0;
      this.inUse -= 1;
      freed += 1;
    }
    this.cursor = 0;
    return freed;
  }

  /** Current generation of a slot, or -1 when `index` is out of range. */
  generationOf(index: number): number {
    return this.inRange(index) ? this.generations[index] : -1;
  }

  /** Take a generation-checked handle to an active slot. */
  handleOf(index: number): PoolResult<SlotHandle> {
    if (!this.inRange(index)) return err(PoolError.OutOfRange);
    if (this.active[index] === 0) return err(PoolError.NotInUse);
    return ok({ index, generation: this.generations[index] });
  }

  /** Look up a handle, failing with `StaleHandle` if its slot was reconstructed since. */
  resolve(handle: SlotHandle): PoolResult<T> {
    const { index, generation } = handle;
    if (!this.inRange(index)) return err(PoolError.OutOfRange);
    if (this.generations[index] !== generation) return err(PoolError.StaleHandle);
    if (this.active[index] === 0) return err(PoolError.NotInUse);
    return ok(this.elements[index]);
  }

  /** Visit active elements in index order without allocating an iterator. */
  forEachActive(callback: (element: T, index: number) => void): void {
    for (let i = 0; i < this.size; i++) {
      if (this.active[i] === 1) callback(this.elements[i], i);
    }
  }

  /** Indices of active slots, ascending. */
  *indices(): IterableIterator<number> {
    for (let i = 0; i < this.size; i++) {
      if (this.active[i] === 1) yield i;
    }
  }

  begin(): ActiveIterator<T> {
    return ActiveIterator.begin<T>(this);
  }

  end(): ActiveIterator<T> {
    return ActiveIterator.end<T>(this);
  }

  [Symbol.iterator](): ActiveIterator<T> {
    return this.begin();
  }

  /** This pool typed as read-only: `get()` then yields `Readonly<T>`. */
  asReadonly(): ReadonlySlotPool<T> {
    return this;
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.size;
  }

  private activate(index: number): void {
    this.active[index] = 1;
    this.inUse += 1;
    this.advanceCursor();
  }

  /** Index of the first free slot at or after the cursor (wrapping), or -1. */
  private findFree(): number {
    for (let pos = this.cursor, scanned = 0; scanned < this.size; scanned++) {
      if (this.active[pos] === 0) return pos;
      pos += 1;
      if (pos === this.size) pos = 0;
    }
    return -1;
  }

  private advanceCursor(): void {
    const free = this.findFree();
    if (free >= 0) this.cursor = free;
  }

  private reconstruct(index: number, args: A | []): void {
    if (this.reset !== null) {
      this.reset(this.elements[index], ...args);
    } else {
      this.elements[index] = this.create(...args);
    }
    this.generations[index] += 1;
  }
}
