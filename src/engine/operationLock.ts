/**
 * Single-writer queue: each task starts after the previous one settled,
 * whether it resolved or rejected.
 */
export class OperationLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller gets the rejection through `result`; the tail only orders tasks.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
