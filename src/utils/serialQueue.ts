/**
 * Per-key serial execution.
 * A task runs only after every earlier task holding any of its keys has settled,
 * so two operations on the same collection never overlap. Later requests are
 * queued behind the one in flight, never dropped.
 */
export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(keys: readonly string[], task: () => Promise<T>): Promise<T> {
    const uniqueKeys = [...new Set(keys)];
    const predecessors = uniqueKeys.map((key) => this.tails.get(key) ?? Promise.resolve());

    const result = Promise.all(predecessors).then(task);
    // Settles either way so a failed task does not poison the queue
    const settled = result.then(
      () => undefined,
      () => undefined,
    );

    for (const key of uniqueKeys) {
      this.tails.set(key, settled);
    }

    void settled.then(() => {
      for (const key of uniqueKeys) {
        if (this.tails.get(key) === settled) {
          this.tails.delete(key);
        }
      }
    });

    return result;
  }
}
