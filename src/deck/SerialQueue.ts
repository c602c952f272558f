const settle = (): void => {};

/**
 * Runs async tasks one at a time, in call order.
 * Each caller receives its own task's result or rejection.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(task).finally(() => {
      this.queued--;
    });
    // The next task only waits for this one to settle; the outcome is reported through `result`.
    this.tail = result.then(settle, settle);
    return result;
  }

  /** Tasks queued or running. */
  get size(): number {
    return this.queued;
  }

  /** Resolves when everything queued so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
