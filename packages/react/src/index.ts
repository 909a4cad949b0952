import { useRef } from 'react';
import { SlotPool } from '@slotpool/core';
import type { SlotInitializer } from '@slotpool/core';

export interface SlotPoolOptions<T, A extends unknown[] = []> {
  /** Number of slots to pre-allocate. Default: 256 */
  capacity?: number;
  /** Element factory, or `{ create, reset }` for in-place reconstruction. */
  init: SlotInitializer<T, A>;
}

export interface SlotPoolHandle<T, A extends unknown[] = []> {
  pool: SlotPool<T, A>;
  /** Free every active slot (e.g. when a scene restarts). Returns how many were freed. */
  reset: () => number;
}

/** Build the pool and handle that `useSlotPool` keeps across renders. */
export function createSlotPoolHandle<T, A extends unknown[] = []>(
  capacity: number,
  init: SlotInitializer<T, A>,
): SlotPoolHandle<T, A> {
  const pool = new SlotPool<T, A>(capacity, init);
  return {
    pool,
    reset: () => pool.clear(),
  };
}

/**
 * React hook that owns a fixed-capacity slot pool for the lifetime of the
 * component. The handle is stable across renders; a new pool (and handle) is
 * built only when `capacity` changes. `init` is read on pool creation only.
 */
export function useSlotPool<T, A extends unknown[] = []>(
  options: SlotPoolOptions<T, A>,
): SlotPoolHandle<T, A> {
  const { capacity = 256, init } = options;

  const handleRef = useRef<SlotPoolHandle<T, A> | null>(null);

  if (handleRef.current === null || handleRef.current.pool.size !== capacity) {
    handleRef.current = createSlotPoolHandle(capacity, init);
  }

  return handleRef.current;
}
