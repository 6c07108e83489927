/**
 * Bounded single-producer/single-consumer queue feeding the chat sequence.
 *
 * `end()` is called by the producer: buffered items are still delivered.
 * `cancel()` is called on behalf of the consumer: the buffer is dropped and a
 * producer waiting for space is released with `false`.
 */
export class MessageChannel<T> {
  private readonly buffer: T[] = [];
  private readonly pullers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private readonly pushers: Array<() => void> = [];
  private ended = false;
  private cancelled = false;

  constructor(private readonly capacity: number) {}

  get isCancelled() {
    return this.cancelled;
  }

  get size() {
    return this.buffer.length;
  }

  async push(item: T): Promise<boolean> {
    while (!this.ended && this.buffer.length >= this.capacity && this.pullers.length === 0) {
      await new Promise<void>((resolve) => this.pushers.push(resolve));
    }
    if (this.ended) return false;

    const puller = this.pullers.shift();
    if (puller) {
      puller({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  pull(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.pushers.shift()?.();
      return Promise.resolve({ value, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.pullers.push(resolve));
  }

  end() {
    if (this.ended) return;
    this.ended = true;
    this.releaseWaiters();
  }

  cancel() {
    this.cancelled = true;
    this.ended = true;
    this.buffer.length = 0;
    this.releaseWaiters();
  }

  private releaseWaiters() {
    this.pushers.splice(0).forEach((wake) => wake());
    if (this.buffer.length === 0) {
      this.pullers.splice(0).forEach((resolve) => resolve({ value: undefined, done: true }));
    }
  }
}
