/**
 * Runs tasks one at a time in submission order. A failed task does not block the ones
 * queued behind it; its error goes to its own caller.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(() => task());
    this.tail = result.catch(() => undefined);
    return result;
  }
}
