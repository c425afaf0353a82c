/**
 * Bounded single-producer async queue connecting two pipeline stages.
 * `push` resolves once the item fits under `capacity`, which is how a slow
 * consumer pushes back on the producer. Consumers read with `for await`.
 */
export class EventStream<T> {
  private queue: T[] = [];
  private waiting: Array<(value: IteratorResult<T>) => void> = [];
  private blockedPushes: Array<() => void> = [];
  private done = false;

  constructor(readonly capacity = 8) {
    if (capacity < 1) {
      throw new RangeError('EventStream capacity must be at least 1');
    }
  }

  /**
   * Push an event. Resolves when the event has been queued or handed to a
   * waiting consumer; pushes after `end()` are dropped.
   */
  async push(event: T): Promise<void> {
    while (!this.done && this.waiting.length === 0 && this.queue.length >= this.capacity) {
      await new Promise<void>((resolve) => this.blockedPushes.push(resolve));
    }

    if (this.done) return;

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter({ value: event, done: false });
    } else {
      this.queue.push(event);
    }
  }

  /**
   * Close the stream. Queued events are still delivered.
   */
  end(): void {
    if (this.done) return;
    this.done = true;

    while (this.waiting.length > 0) {
      const waiter = this.waiting.shift();
      waiter?.({ value: undefined, done: true });
    }
    this.releasePushes();
  }

  get size(): number {
    return this.queue.length;
  }

  isDone(): boolean {
    return this.done;
  }

  /**
   * A consumer that stops early closes the stream, so a producer blocked
   * on a full queue is released instead of waiting forever.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    try {
      while (true) {
        if (this.queue.length > 0) {
          const next = this.queue.shift();
          this.releasePushes();
          if (next !== undefined) {
            yield next;
          }
        } else if (this.done) {
          return;
        } else {
          const result = await new Promise<IteratorResult<T>>(
            (resolve) => {
              this.waiting.push(resolve);
              this.releasePushes();
            }
          );
          if (result.done) return;
          yield result.value;
        }
      }
    } finally {
      this.end();
    }
  }

  private releasePushes(): void {
    const blocked = this.blockedPushes.splice(0);
    blocked.forEach((resume) => resume());
  }
}
