import { describe, it, expect, vi, afterEach } from 'vitest';
import { FanInQueue, DEFAULT_QUEUE_CAPACITY } from '../../src/infrastructure/queue/index.js';

async function settle(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

describe('FanInQueue', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('defaults to capacity 32 and rejects invalid capacities', () => {
    expect(new FanInQueue<number>().capacity).toBe(DEFAULT_QUEUE_CAPACITY);
    expect(DEFAULT_QUEUE_CAPACITY).toBe(32);
    expect(() => new FanInQueue<number>(0)).toThrow(RangeError);
  });

  it('delivers items in push order', async () => {
    const q = new FanInQueue<string>(4);
    await q.push('a');
    await q.push('b');
    await q.push('c');

    expect(await q.pop()).toEqual({ kind: 'item', value: 'a' });
    expect(await q.pop()).toEqual({ kind: 'item', value: 'b' });
    expect(await q.pop()).toEqual({ kind: 'item', value: 'c' });
  });

  it('blocks producers while full and resumes them as space frees', async () => {
    const q = new FanInQueue<string>(2);
    await q.push('a');
    await q.push('b');

    let pushed: boolean | undefined;
    const pending = q.push('c').then((ok) => {
      pushed = ok;
    });
    await settle();
    expect(pushed).toBeUndefined();
    expect(q.size).toBe(2);

    expect(await q.pop()).toEqual({ kind: 'item', value: 'a' });
    await pending;
    expect(pushed).toBe(true);
    expect(q.size).toBe(2);
  });

  it('hands an item straight to a waiting consumer', async () => {
    const q = new FanInQueue<string>(2);
    const next = q.pop();

    await expect(q.push('x')).resolves.toBe(true);
    expect(await next).toEqual({ kind: 'item', value: 'x' });
    expect(q.size).toBe(0);
  });

  it('keeps a buffered undefined distinct from an empty queue', async () => {
    const q = new FanInQueue<undefined>(2);
    await q.push(undefined);
    expect(await q.pop(0)).toEqual({ kind: 'item', value: undefined });
    expect(await q.pop(0)).toEqual({ kind: 'timeout' });
  });

  it('times out when nothing arrives', async () => {
    vi.useFakeTimers();
    const q = new FanInQueue<string>(2);
    let result: unknown;
    const pending = q.pop(100).then((r) => {
      result = r;
    });

    await vi.advanceTimersByTimeAsync(99);
    expect(result).toBeUndefined();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(result).toEqual({ kind: 'timeout' });

    // The timed-out consumer is gone: the next push is buffered.
    await q.push('late');
    expect(q.size).toBe(1);
  });

  it('cancels the timeout when an item arrives', async () => {
    vi.useFakeTimers();
    const q = new FanInQueue<string>(2);
    const next = q.pop(5000);
    await q.push('y');

    expect(await next).toEqual({ kind: 'item', value: 'y' });
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects a second concurrent consumer', async () => {
    const q = new FanInQueue<string>(2);
    const first = q.pop();

    await expect(q.pop()).rejects.toThrow('single consumer');

    q.close();
    expect(await first).toEqual({ kind: 'closed' });
  });

  it('drains buffered items before reporting closed', async () => {
    const q = new FanInQueue<string>(4);
    await q.push('a');
    q.close();

    expect(q.isClosed).toBe(true);
    expect(await q.pop()).toEqual({ kind: 'item', value: 'a' });
    expect(await q.pop()).toEqual({ kind: 'closed' });
  });

  it('refuses pushes after close', async () => {
    const q = new FanInQueue<string>(4);
    q.close();
    q.close();
    await expect(q.push('a')).resolves.toBe(false);
    expect(q.size).toBe(0);
  });

  it('wakes blocked producers with false on close', async () => {
    const q = new FanInQueue<string>(1);
    await q.push('a');
    const blocked = q.push('b');
    await settle();

    q.close();
    await expect(blocked).resolves.toBe(false);
    expect(q.size).toBe(1);
  });
});
