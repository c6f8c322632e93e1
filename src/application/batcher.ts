import type { Logger } from 'pino';
import type { QueueReader } from '../infrastructure/queue/index.js';
import type { Clock } from './rate-limiter.js';

export interface BatcherOptions {
  maxSize: number;
  maxWaitMs: number;
}

/**
 * Count/time batching state machine.
 *
 * A batch opens on its first item, with a deadline `maxWaitMs` later, and is
 * flushed when it reaches `maxSize` or the deadline passes, whichever comes
 * first. The state machine does no I/O and reads no clock; callers pass `now`.
 */
export class Batcher<T> {
  readonly maxSize: number;
  readonly maxWaitMs: number;

  private current: T[] = [];
  private deadline: number | undefined;

  constructor(opts: BatcherOptions) {
    if (!Number.isInteger(opts.maxSize) || opts.maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${opts.maxSize}`);
    }
    if (!(opts.maxWaitMs > 0)) {
      throw new RangeError(`maxWaitMs must be positive, got ${opts.maxWaitMs}`);
    }
    this.maxSize = opts.maxSize;
    this.maxWaitMs = opts.maxWaitMs;
  }

  get size(): number {
    return this.current.length;
  }

  /** @returns the full batch when this item filled it, otherwise `null`. */
  add(item: T, now: number): T[] | null {
    if (this.current.length === 0) {
      this.deadline = now + this.maxWaitMs;
    }
    this.current.push(item);
    return this.current.length >= this.maxSize ? this.flush() : null;
  }

  isDue(now: number): boolean {
    return this.current.length > 0 && this.deadline !== undefined && now >= this.deadline;
  }

  /** Time left before the open batch is due; `undefined` when none is open. */
  remainingMs(now: number): number | undefined {
    if (this.current.length === 0 || this.deadline === undefined) return undefined;
    return Math.max(this.deadline - now, 0);
  }

  /** Takes the open batch and resets; `null` when empty. */
  flush(): T[] | null {
    if (this.current.length === 0) return null;
    const batch = this.current;
    this.current = [];
    this.deadline = undefined;
    return batch;
  }
}

export interface RunBatcherOptions<T> {
  queue: QueueReader<T>;
  batcher: Batcher<T>;
  /** Ships one batch. Awaited: one batch in flight at a time. */
  deliver: (batch: T[]) => Promise<void>;
  log: Logger;
  now?: Clock;
}

/**
 * Single consumer of the fan-in queue.
 *
 * Waits for the next item at most until the open batch's deadline, so a
 * trickling producer never waits longer than `maxWaitMs`. When the queue
 * closes, the partial batch is flushed once and the loop returns.
 */
export async function runBatcher<T>(opts: RunBatcherOptions<T>): Promise<void> {
  const { queue, batcher, log } = opts;
  const now = opts.now ?? (() => Date.now());

  const ship = async (batch: T[] | null, reason: 'size' | 'timeout' | 'close'): Promise<void> => {
    if (batch === null) return;
    log.debug({ size: batch.length, reason }, 'Flushing batch');
    try {
      await opts.deliver(batch);
    } catch (err: unknown) {
      log.error({ err, size: batch.length }, 'Batch delivery failed');
    }
  };

  log.info({ maxSize: batcher.maxSize, maxWaitMs: batcher.maxWaitMs }, 'Batcher started');

  for (;;) {
    if (batcher.isDue(now())) {
      await ship(batcher.flush(), 'timeout');
    }

    const result = await queue.pop(batcher.remainingMs(now()));

    if (result.kind === 'closed') {
      await ship(batcher.flush(), 'close');
      break;
    }

    if (result.kind === 'item') {
      const full = batcher.add(result.value, now());
      if (full !== null) {
        await ship(full, 'size');
        continue;
      }
    }

    if (batcher.isDue(now())) {
      await ship(batcher.flush(), 'timeout');
    }
  }

  log.info('Batcher stopped');
}
