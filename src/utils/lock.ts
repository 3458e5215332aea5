/**
 * Named critical sections.
 *
 * Node runs every callback on one thread, so a synchronous block is already
 * atomic with respect to other tasks. `SimpleMutex` makes those blocks
 * explicit and named, and turns the two mistakes that would deadlock a real
 * mutex (re-entering a held lock, awaiting inside it) into a thrown
 * `LockError`.
 *
 * The registry lock and a controller's progress lock are never nested.
 */

export class LockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LockError";
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export class SimpleMutex {
  private held = false;

  constructor(readonly name: string) {}

  withLock<T>(section: () => T): T {
    if (this.held) {
      throw new LockError(`${this.name} lock is already held`);
    }
    this.held = true;
    let result: T;
    try {
      result = section();
    } finally {
      this.held = false;
    }
    if (isThenable(result)) {
      throw new LockError(`${this.name} lock section must not be asynchronous`);
    }
    return result;
  }
}
