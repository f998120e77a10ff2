/**
 * Shared 16-bit transaction ID counter
 */

const ID_SPACE = 0x10000;

export class TransactionIdAllocator {
  private counter: number;

  constructor(start: number = 0) {
    if (!Number.isInteger(start) || start < 0 || start >= ID_SPACE) {
      throw new RangeError(`Transaction ID start must be an integer in [0, ${ID_SPACE - 1}]`);
    }
    this.counter = start;
  }

  /**
   * Hand out the current value and advance the counter, wrapping at 2^16.
   * Synchronous, so no two callers on the event loop observe the same snapshot.
   */
  next(): number {
    const id = this.counter;
    this.counter = (this.counter + 1) % ID_SPACE;
    return id;
  }

  /**
   * Value the next call to `next()` will return
   */
  peek(): number {
    return this.counter;
  }
}
