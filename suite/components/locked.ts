// suite/components/locked.ts

export class LockMisuseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LockMisuseError';
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Exclusive access to a value.
 *
 * Bodies run synchronously, so on one event loop nothing else can observe the
 * value mid-update. Re-entering the lock, or handing it an async body (which
 * would let other callbacks run while the lock is held), throws.
 */
export class Locked<T> {
  private held = false;

  constructor(private readonly value: T) {}

  withLock<R>(body: (value: T) => R): R {
    if (this.held) throw new LockMisuseError('lock is already held');
    this.held = true;
    try {
      const result = body(this.value);
      if (isThenable(result)) throw new LockMisuseError('lock bodies must be synchronous');
      return result;
    } finally {
      this.held = false;
    }
  }
}
