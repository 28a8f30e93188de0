/**
 * Promise-chain mutex.
 *
 * Tasks run one at a time in call order. A task that rejects releases the
 * lock and the rejection is passed to its caller.
 */
export class OperationLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * True while a task is running or waiting
   */
  isLocked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;

    await previous;
    try {
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}

/**
 * One OperationLock per key (e.g. per network interface)
 */
export class KeyedOperationLock {
  private readonly locks = new Map<string, OperationLock>();

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked() ?? false;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new OperationLock();
      this.locks.set(key, lock);
    }
    return lock.runExclusive(task);
  }
}
