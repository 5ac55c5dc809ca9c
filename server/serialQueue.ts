/**
 * Runs async tasks one at a time, in submission order.
 *
 * A task whose signal is aborted by the time its turn comes is not started;
 * its promise rejects with the signal's reason instead.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  get size() {
    return this.pending;
  }

  run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(() => {
      signal?.throwIfAborted();
      return task();
    });
    const settled = result.finally(() => {
      this.pending -= 1;
    });
    // The chain must survive a rejected task; callers observe failures through `result`.
    this.tail = settled.catch(() => undefined);
    return result;
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
