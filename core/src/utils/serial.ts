/**
 * Runs operations one at a time, in submission order. An operation starts
 * only after the previous one has settled, so awaits inside an operation
 * never interleave with another operation's reads and writes.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  run<T>(op: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(op);
    // The caller observes the rejection through `result`; the chain only
    // needs to know that the operation settled.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
