/**
 * Bounded command queue for one device connection.
 *
 * Fixed-capacity ring buffer. When full it either rejects the new
 * command or evicts the oldest one, depending on the overflow policy,
 * so a stalled transport can't grow it without bound. Commands drain
 * in submission order ('fifo') or newest first ('lifo').
 */

import { QueueOverflowError } from './errors';
import { DEFAULT_QUEUE, QueueOptions, QueuedCommand } from './types';

export class CommandQueue {
  private buffer: Array<QueuedCommand | undefined>;
  private head: number = 0;   // next write position
  private count: number = 0;
  private waiters: Array<() => void> = [];
  readonly options: QueueOptions;

  constructor(options: Partial<QueueOptions> = {}) {
    this.options = { ...DEFAULT_QUEUE, ...options };
    if (!Number.isInteger(this.options.capacity) || this.options.capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${this.options.capacity}`);
    }
    this.buffer = new Array(this.options.capacity);
  }

  get capacity(): number {
    return this.options.capacity;
  }

  get size(): number {
    return this.count;
  }

  get empty(): boolean {
    return this.count === 0;
  }

  /**
   * Append a command. Returns the evicted command under 'drop-oldest'
   * when the buffer was full; throws QueueOverflowError under 'reject'.
   */
  enqueue(command: QueuedCommand): QueuedCommand | undefined {
    let evicted: QueuedCommand | undefined;
    if (this.count === this.capacity) {
      if (this.options.overflow === 'reject') {
        throw new QueueOverflowError(this.capacity);
      }
      // When full, the write position holds the oldest entry
      evicted = this.buffer[this.head];
    }

    this.buffer[this.head] = Object.freeze({ ...command });
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) {
      this.count++;
    }

    this.wake();
    return evicted;
  }

  /** Remove and return the next command, or undefined when empty. */
  dequeueNext(): QueuedCommand | undefined {
    if (this.count === 0) return undefined;

    let readIdx: number;
    if (this.options.order === 'lifo') {
      readIdx = (this.head - 1 + this.capacity) % this.capacity;
      this.head = readIdx;
    } else {
      readIdx = (this.head - this.count + this.capacity) % this.capacity;
    }

    const item = this.buffer[readIdx];
    this.buffer[readIdx] = undefined;
    this.count--;
    return item;
  }

  /** Snapshot of queued commands in drain order. */
  toArray(): QueuedCommand[] {
    const result: QueuedCommand[] = [];
    for (let i = 0; i < this.count; i++) {
      const idx = this.options.order === 'lifo'
        ? (this.head - 1 - i + 2 * this.capacity) % this.capacity
        : (this.head - this.count + i + this.capacity) % this.capacity;
      const item = this.buffer[idx];
      if (item) result.push(item);
    }
    return result;
  }

  clear(): void {
    this.head = 0;
    this.count = 0;
    this.buffer = new Array(this.capacity);
  }

  /**
   * Resolve as soon as a command is enqueued, or after timeoutMs.
   * Resolves immediately when the queue already holds something.
   */
  waitForItem(timeoutMs: number): Promise<void> {
    if (this.count > 0) return Promise.resolve();

    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.waiters = this.waiters.filter((w) => w !== done);
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, timeoutMs));
      this.waiters.push(done);
    });
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter();
  }
}
