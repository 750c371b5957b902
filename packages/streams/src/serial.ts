/**
 * Serial executor — admits one task at a time.
 *
 * Tasks run in submission order; each runs to completion (including its
 * awaited I/O) before the next starts. A failing task does not stop the
 * queue; its error reaches only its own caller.
 */

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
