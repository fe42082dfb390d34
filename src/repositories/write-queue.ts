/**
 * Runs tasks one at a time in call order. A collection write is a
 * load-modify-save of the whole array, so two overlapping writes would
 * otherwise save over each other.
 */
export class WriteQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task rejects its own caller; the next task still runs.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
