import { CompletionRecord, CompletionSink } from '../types';

interface Waiter {
  resolve: (record: CompletionRecord | null) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Unbounded FIFO of completion records that callers can drain as downloads
 * finish, either with `take()` or `for await (const record of queue)`.
 * Iteration ends once the queue is closed and empty.
 */
export class CompletionQueue implements CompletionSink, AsyncIterable<CompletionRecord> {
  private records: CompletionRecord[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  put(record: CompletionRecord): void {
    if (this.closed) {
      throw new Error('Completion queue is closed');
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(record);
      return;
    }
    this.records.push(record);
  }

  tryTake(): CompletionRecord | undefined {
    return this.records.shift();
  }

  /**
   * Next record, waiting for one if necessary. Resolves to null when
   * `timeoutMs` elapses first or the queue is closed.
   */
  take(timeoutMs?: number): Promise<CompletionRecord | null> {
    const record = this.records.shift();
    if (record) {
      return Promise.resolve(record);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise(resolve => {
      const waiter: Waiter = { resolve };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          resolve(null);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(null);
    }
    this.waiters = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.records.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<CompletionRecord> {
    while (true) {
      const record = await this.take();
      if (record === null) {
        return;
      }
      yield record;
    }
  }
}
