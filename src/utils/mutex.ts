/**
 * Promise based exclusive-access lock. Callers queue in FIFO order; the
 * critical section runs once every earlier holder has released.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.held++;
    try {
      await previous;
      return await task();
    } finally {
      this.held--;
      release();
    }
  }

  isLocked(): boolean {
    return this.held > 0;
  }
}
