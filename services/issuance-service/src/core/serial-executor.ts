/**
 * Runs tasks one at a time in submission order. A task starts only after the
 * previous one has settled, whether it resolved or rejected.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
