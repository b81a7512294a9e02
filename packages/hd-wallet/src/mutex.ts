const noop = (): void => undefined;

/**
 * Serialises asynchronous tasks: each task starts only after every task
 * queued before it has settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(noop, noop);
    return run;
  }
}
