/** Default capacity; the knob that decides how far producers run ahead of delivery. */
export const DEFAULT_QUEUE_CAPACITY = 32;

export type PopResult<T> =
  | { readonly kind: 'item'; readonly value: T }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'closed' };

/** Producer side of the queue, as seen by generator tasks. */
export interface QueueWriter<T> {
  push(item: T): Promise<boolean>;
  readonly isClosed: boolean;
}

/** Consumer side of the queue, as seen by the batcher. */
export interface QueueReader<T> {
  pop(timeoutMs?: number): Promise<PopResult<T>>;
}

/**
 * Bounded multi-producer, single-consumer queue.
 *
 * - `push()` suspends while the queue is full. This is the only
 *   backpressure in the pipeline: a slow consumer stalls every producer.
 * - `close()` is the shutdown signal. Pushes after close resolve `false`;
 *   the consumer drains what is buffered, then sees `closed`.
 */
export class FanInQueue<T> implements QueueWriter<T>, QueueReader<T> {
  readonly capacity: number;

  // Wrapped so a buffered `undefined` is distinguishable from an empty queue.
  private readonly items: Array<{ readonly value: T }> = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private consumer: ((result: PopResult<T>) => void) | null = null;
  private closed = false;

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueues `item`, waiting for space if needed.
   *
   * @returns `false` if the queue was closed before the item got in.
   */
  async push(item: T): Promise<boolean> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => {
        this.spaceWaiters.push(resolve);
      });
    }
    if (this.closed) return false;

    // A waiting consumer implies an empty buffer: hand the item over directly.
    const consumer = this.consumer;
    if (consumer !== null) {
      this.consumer = null;
      consumer({ kind: 'item', value: item });
      return true;
    }

    this.items.push({ value: item });
    return true;
  }

  /**
   * Takes the next item, waiting up to `timeoutMs` (forever when omitted).
   * Buffered items are still returned after `close()`.
   */
  async pop(timeoutMs?: number): Promise<PopResult<T>> {
    if (this.consumer !== null) {
      throw new Error('FanInQueue supports a single consumer; pop() already pending');
    }

    const entry = this.items.shift();
    if (entry !== undefined) {
      this.wakeProducer();
      return { kind: 'item', value: entry.value };
    }
    if (this.closed) return { kind: 'closed' };
    if (timeoutMs !== undefined && timeoutMs <= 0) return { kind: 'timeout' };

    return new Promise<PopResult<T>>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      this.consumer = (result) => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(result);
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.consumer = null;
          resolve({ kind: 'timeout' });
        }, timeoutMs);
      }
    });
  }

  /** Idempotent. Wakes every blocked producer and the consumer. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const wake of this.spaceWaiters.splice(0)) wake();

    const consumer = this.consumer;
    if (consumer !== null) {
      this.consumer = null;
      consumer({ kind: 'closed' });
    }
  }

  private wakeProducer(): void {
    this.spaceWaiters.shift()?.();
  }
}
