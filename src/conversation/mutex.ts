/**
 * Promise-chain mutex: tasks run one at a time in the order `run` was called.
 * A rejected task does not break the chain for the tasks behind it.
 */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
