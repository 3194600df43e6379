// Inbound message queue.

import { LinkError } from "./link_error.ts";

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded FIFO with awaiting consumers.
 *
 * One producer (the stream reader) pushes; any number of consumers await
 * `recv()`. A value pushed while a consumer is waiting goes straight to the
 * oldest waiter. Once ended, buffered values are still handed out in order and
 * then every `recv()` rejects with the end reason.
 */
export class InboundQueue<T> {
  private buffer: T[] = [];
  private head = 0;
  private waiters: Waiter<T>[] = [];
  private endReason: Error | null = null;

  /** Number of buffered values not yet received. */
  get size(): number {
    return this.buffer.length - this.head;
  }

  /** Number of consumers currently parked in `recv()`. */
  get waiting(): number {
    return this.waiters.length;
  }

  isEnded(): boolean {
    return this.endReason !== null;
  }

  /** Enqueue a value. Returns false if the queue has already ended. */
  push(value: T): boolean {
    if (this.endReason) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(value);
      return true;
    }

    this.buffer.push(value);
    return true;
  }

  recv(): Promise<T> {
    if (this.size > 0) {
      return Promise.resolve(this.take());
    }
    if (this.endReason) {
      return Promise.reject(this.endReason);
    }
    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Take a buffered value without waiting. */
  tryRecv(): T | undefined {
    return this.size > 0 ? this.take() : undefined;
  }

  /**
   * Stop accepting values and release every parked consumer with `reason`.
   * Only the first call has an effect.
   */
  end(reason: Error = LinkError.closed()): void {
    if (this.endReason) return;
    this.endReason = reason;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(reason);
    }
  }

  /** End the queue and drop anything still buffered. */
  clear(reason: Error = LinkError.closed()): void {
    this.end(reason);
    this.buffer = [];
    this.head = 0;
  }

  private take(): T {
    const value = this.buffer[this.head];
    this.head++;
    if (this.head === this.buffer.length) {
      this.buffer = [];
      this.head = 0;
    } else if (this.head > 1024 && this.head * 2 > this.buffer.length) {
      // Compact once the consumed prefix dominates.
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
    return value;
  }
}
