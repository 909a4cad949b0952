/**
 * Error codes reported by fallible `SlotPool` operations.
 *
 * - `OutOfRange`: index outside `[0, capacity)`.
 * - `AlreadyInUse`: activating a slot that is already active.
 * - `NotInUse`: checked access to an inactive slot.
 * - `AlreadyUnused`: deactivating a slot that is already free.
 * - `Full`: a next-free search found no free slot.
 * - `StaleHandle`: a generation handle outlived a reconstruction of its slot.
 */
export const PoolError = {
  OutOfRange: 'OutOfRange',
  AlreadyInUse: 'AlreadyInUse',
  NotInUse: 'NotInUse',
  AlreadyUnused: 'AlreadyUnused',
  Full: 'Full',
  StaleHandle: 'StaleHandle',
} as const;

export type PoolError = (typeof PoolError)[keyof typeof PoolError];

export type PoolResult<V> =
  | { readonly ok: true; readonly value: V }
  | { readonly ok: false; readonly error: PoolError };

function frozenError(error: PoolError): PoolResult<never> {
  return Object.freeze({ ok: false as const, error });
}

/**
 * One shared, frozen result per error code. Error branches return these, so
 * a failing call never allocates.
 */
export const POOL_ERRORS: Readonly<Record<PoolError, PoolResult<never>>> = Object.freeze({
  OutOfRange: frozenError(PoolError.OutOfRange),
  AlreadyInUse: frozenError(PoolError.AlreadyInUse),
  NotInUse: frozenError(PoolError.NotInUse),
  AlreadyUnused: frozenError(PoolError.AlreadyUnused),
  Full: frozenError(PoolError.Full),
  StaleHandle: frozenError(PoolError.StaleHandle),
});

/** Shared success result of operations with no payload (`unUse`, `replace`). */
export const OK_VOID: PoolResult<void> = Object.freeze({ ok: true as const, value: undefined });

/** Success carrying a value. The one result the pool has to allocate. */
export function ok<V>(value: V): PoolResult<V> {
  return { ok: true, value };
}

/** The shared result for `error`. */
export function err<V = never>(error: PoolError): PoolResult<V> {
  return POOL_ERRORS[error];
}

/** Human-readable text for an error code, e.g. for the host's own logging. */
export function poolErrorMessage(error: PoolError): string {
  switch (error) {
    case PoolError.OutOfRange:
      return 'Index out of range';
    case PoolError.AlreadyInUse:
      return 'Slot already in use';
    case PoolError.NotInUse:
      return 'Slot is not in use';
    case PoolError.AlreadyUnused:
      return 'Slot already unused';
    case PoolError.Full:
      return 'Pool is full';
    case PoolError.StaleHandle:
      return 'Handle refers to a reconstructed slot';
  }
}

/** Thrown by `unwrap()` when a result carries an error. */
export class SlotPoolError extends Error {
  readonly code: PoolError;

  constructor(code: PoolError) {
    super(poolErrorMessage(code));
    this.name = 'SlotPoolError';
    this.code = code;
  }
}

/**
 * Return the value of a successful result, or throw a `SlotPoolError`.
 * For call sites where a failure is a bug rather than an expected branch.
 */
export function unwrap<V>(result: PoolResult<V>): V {
  if (!result.ok) {
    throw new SlotPoolError(result.error);
  }
  return result.value;
}
