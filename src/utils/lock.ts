/**
 * Promise-chain mutex: callers run one at a time, in the order they asked
 * for the lock. A failed task releases the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
