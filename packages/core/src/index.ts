export { SlotPool } from './slot-pool.js';
export type {
  SlotFactory,
  SlotReset,
  SlotInitializer,
  SlotEntry,
  SlotHandle,
  ReadonlySlotPool,
} from './slot-pool.js';
export { ActiveIterator } from './active-iterator.js';
export type { IterablePool } from './active-iterator.js';
export {
  PoolError,
  POOL_ERRORS,
  OK_VOID,
  SlotPoolError,
  ok,
  err,
  unwrap,
  poolErrorMessage,
} from './pool-error.js';
export type { PoolResult } from './pool-error.js';
