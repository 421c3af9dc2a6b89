/**
 * Result of waiting on the buffer.
 *
 * `empty` is the normal "nothing arrived before the deadline" signal and
 * callers simply poll again. `cancelled` means the caller's signal fired or
 * the buffer was closed and nothing is left to hand out.
 */
export type PollResult<T> =
  | { readonly kind: 'item'; readonly item: T }
  | { readonly kind: 'empty' }
  | { readonly kind: 'cancelled' };

interface Waiter<T> {
  settle(result: PollResult<T>): void;
}

const EMPTY = { kind: 'empty' } as const;
const CANCELLED = { kind: 'cancelled' } as const;

/**
 * Bounded FIFO shared by HTTP handlers (producers) and chain workers
 * (consumers).
 *
 * `offer()` never blocks: it hands the item to the oldest waiting consumer,
 * or stores it, or returns `false` when `capacity` items are already held.
 * `poll()` is the only suspension point on the consumer side.
 *
 * All state changes happen synchronously on the event loop, so concurrent
 * callers never observe a partial update.
 */
export class BoundedBuffer<T extends object> {
  readonly capacity: number;
  private items: T[] = [];
  private head = 0;
  private readonly waiters: Waiter<T>[] = [];
  private drainListeners: Array<() => void> = [];
  private closed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Non-blocking enqueue. Returns `false` when full or closed. */
  offer(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.settle({ kind: 'item', item });
      return true;
    }

    if (this.size >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  /**
   * Waits for the next item, at most `timeoutMs`, or until `signal` aborts.
   * After `close()` remaining items are still handed out; once none are
   * left every poll resolves `cancelled`.
   */
  poll(timeoutMs: number, signal?: AbortSignal): Promise<PollResult<T>> {
    const next = this.take();
    if (next) return Promise.resolve(next);
    if (this.closed || signal?.aborted) return Promise.resolve(CANCELLED);

    return new Promise((resolve) => {
      const onAbort = (): void => {
        this.removeWaiter(waiter);
        waiter.settle(CANCELLED);
      };

      const timer = setTimeout(() => {
        this.removeWaiter(waiter);
        waiter.settle(EMPTY);
      }, timeoutMs);

      let settled = false;
      const waiter: Waiter<T> = {
        settle: (result) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Resolves `true` once the buffer is empty, or `false` if `timeoutMs`
   * elapses first.
   */
  waitUntilEmpty(timeoutMs: number): Promise<boolean> {
    if (this.size === 0) return Promise.resolve(true);

    return new Promise((resolve) => {
      const listener = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.drainListeners = this.drainListeners.filter((l) => l !== listener);
        resolve(false);
      }, timeoutMs);
      this.drainListeners.push(listener);
    });
  }

  /**
   * Stops accepting items and cancels every waiting consumer.
   * Items already held stay available to `poll()` and `clear()`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.settle(CANCELLED);
    }
  }

  /** Discards held items and returns how many there were. */
  clear(): number {
    const dropped = this.size;
    this.items = [];
    this.head = 0;
    this.notifyDrained();
    return dropped;
  }

  private take(): PollResult<T> | undefined {
    const item = this.items[this.head];
    if (item === undefined) return undefined;
    this.head++;

    // Compact once the consumed prefix dominates the array
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    if (this.size === 0) this.notifyDrained();
    return { kind: 'item', item };
  }

  private notifyDrained(): void {
    const listeners = this.drainListeners;
    this.drainListeners = [];
    for (const listener of listeners) listener();
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const idx = this.waiters.indexOf(waiter);
    if (idx >= 0) this.waiters.splice(idx, 1);
  }
}
