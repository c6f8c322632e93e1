export type Clock = () => number;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`, or early when `signal` aborts. Never rejects: callers
 * check `signal.aborted` afterwards.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface TokenBucketOptions {
  /** Upper bound on stored tokens. */
  capacity: number;
  /** Tokens added per elapsed interval. */
  refill: number;
  intervalMs: number;
  /** Tokens available at construction. */
  initial?: number;
  now?: Clock;
  sleep?: Sleep;
}

/** Burst headroom, in seconds of sustained rate. */
export const BURST_FACTOR = 100;
/** Refill overshoot, in percent. Rounded down, so it only shows from R = 100 up. */
export const REFILL_PERCENT = 101;
export const REFILL_INTERVAL_MS = 1000;

/**
 * Token-bucket admission control for one generator task.
 *
 * Refill is lazy: elapsed whole intervals are credited whenever the bucket
 * is inspected. The bucket is owned by a single task, so `acquire()` is never
 * called concurrently.
 */
export class TokenBucket {
  readonly capacity: number;
  readonly refill: number;
  readonly intervalMs: number;

  private tokens: number;
  private lastRefillAt: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;

  constructor(opts: TokenBucketOptions) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${opts.capacity}`);
    }
    if (!Number.isInteger(opts.refill) || opts.refill < 1) {
      throw new RangeError(`refill must be a positive integer, got ${opts.refill}`);
    }
    if (!(opts.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be positive, got ${opts.intervalMs}`);
    }

    this.capacity = opts.capacity;
    this.refill = opts.refill;
    this.intervalMs = opts.intervalMs;
    this.now = opts.now ?? (() => Date.now());
    this.sleep = opts.sleep ?? sleep;
    this.tokens = Math.min(opts.initial ?? 0, opts.capacity);
    this.lastRefillAt = this.now();
  }

  /**
   * Bucket for a target of `ratePerSecond` records/second: capacity 100·R,
   * empty at start, refilled with floor(1.01·R) tokens every second (R below
   * 100 refills exactly R, so long-run throughput stays at the target).
   *
   * A zero rate means the category is disabled and must not get a bucket.
   */
  static forRate(ratePerSecond: number, opts: Pick<TokenBucketOptions, 'now' | 'sleep'> = {}): TokenBucket {
    if (!Number.isInteger(ratePerSecond) || ratePerSecond < 1) {
      throw new RangeError(`ratePerSecond must be a positive integer, got ${ratePerSecond}`);
    }
    return new TokenBucket({
      capacity: ratePerSecond * BURST_FACTOR,
      refill: Math.max(1, Math.floor((ratePerSecond * REFILL_PERCENT) / 100)),
      intervalMs: REFILL_INTERVAL_MS,
      initial: 0,
      ...opts,
    });
  }

  /** Tokens available right now. */
  available(): number {
    this.credit();
    return this.tokens;
  }

  /**
   * Waits for one token and consumes it.
   *
   * @returns `false` if `signal` aborted before a token was obtained.
   */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (signal?.aborted) return false;

      this.credit();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return true;
      }

      const untilNextRefill = this.lastRefillAt + this.intervalMs - this.now();
      await this.sleep(Math.max(untilNextRefill, 0), signal);
    }
  }

  private credit(): void {
    const elapsed = this.now() - this.lastRefillAt;
    const intervals = Math.floor(elapsed / this.intervalMs);
    if (intervals <= 0) return;

    this.tokens = Math.min(this.capacity, this.tokens + intervals * this.refill);
    this.lastRefillAt += intervals * this.intervalMs;
  }
}
