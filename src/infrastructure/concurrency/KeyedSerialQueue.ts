// one task at a time per key, in enqueue order; keys are independent
export class KeyedSerialQueue {
  private tails: Map<string, Promise<unknown>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    // a failed predecessor must not block the next task
    const result = previous.then(task, task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
