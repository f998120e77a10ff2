/**
 * Unbounded multi-producer, single-consumer queue
 */

export class EventChannel<T extends object> {
  private buffer: T[] = [];
  private waiters: Array<(value: T) => void> = [];

  /**
   * Deliver a value to the oldest waiting receiver, or queue it
   */
  push(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return;
    }
    this.buffer.push(value);
  }

  /**
   * Resolve with the oldest undelivered value, waiting for one if the queue is empty
   */
  receive(): Promise<T> {
    const queued = this.buffer.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  get pending(): number {
    return this.buffer.length;
  }
}
