/**
 * Single-writer lock.
 *
 * Operations passed to run() execute one at a time in call order. A failed
 * operation rejects its own promise and does not block the queue.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(operation: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(operation).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Operations queued or running */
  get size(): number {
    return this.pending;
  }

  /** Resolves once everything queued so far has finished */
  async idle(): Promise<void> {
    await this.tail;
  }
}
