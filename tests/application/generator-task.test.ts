import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runGeneratorTask } from '../../src/application/generator-task.js';
import type { Admission } from '../../src/application/generator-task.js';
import { PipelineStats } from '../../src/application/stats.js';
import { FanInQueue } from '../../src/infrastructure/queue/index.js';
import type { StampedRecord } from '../../src/domain/index.js';
import { fakeLogger, TEST_METADATA } from '../helpers/fakes.js';

/** Admits `n` times, then reports an abort. */
function admitTimes(n: number): Admission {
  let left = n;
  return { acquire: async () => left-- > 0 };
}

const admitAlways: Admission = { acquire: async () => true };

/** Blocks until the signal aborts. */
const blockUntilAbort: Admission = {
  acquire: (signal?: AbortSignal) =>
    new Promise<boolean>((resolve) => {
      signal?.addEventListener('abort', () => resolve(false), { once: true });
    }),
};

async function settle(): Promise<void> {
  for (let i = 0; i < 20; i++) await Promise.resolve();
}

async function drain(queue: FanInQueue<StampedRecord>): Promise<StampedRecord[]> {
  const out: StampedRecord[] = [];
  for (;;) {
    const result = await queue.pop(0);
    if (result.kind !== 'item') return out;
    out.push(result.value);
  }
}

function counterClock(start: number): () => number {
  let t = start;
  return () => t++;
}

describe('runGeneratorTask', () => {
  let log: ReturnType<typeof fakeLogger>;
  let stats: PipelineStats;

  beforeEach(() => {
    log = fakeLogger();
    stats = new PipelineStats(new Date(0));
  });

  it('stamps every admitted record and pushes it', async () => {
    const queue = new FanInQueue<StampedRecord>(32);

    const outcome = await runGeneratorTask({
      category: 'http_access',
      limiter: admitTimes(3),
      produce: () => ({ message: 'line', service: 'storedog' }),
      metadata: TEST_METADATA,
      queue,
      log,
      now: counterClock(1000),
      stats,
    });

    expect(outcome).toBe('aborted');
    const records = await drain(queue);
    expect(records).toEqual([1000, 1001, 1002].map((timestamp) => ({
      message: 'line',
      service: 'storedog',
      ddsource: 'synthlog',
      hostname: 'gen-01',
      status: 'INFO',
      ddtags: 'kube_namespace:test',
      timestamp,
    })));
    expect(stats.snapshot().records_enqueued).toEqual({ http_access: 3 });
  });

  it('keeps timestamps non-decreasing when the clock repeats a value', async () => {
    const queue = new FanInQueue<StampedRecord>(32);
    const ticks = [1000, 1000, 1000, 1500, 1500, 2000];
    let i = 0;
    const steppingClock = () => ticks[Math.min(i++, ticks.length - 1)] ?? 0;

    await runGeneratorTask({
      category: 'http_leak',
      limiter: admitTimes(3),
      produce: () => [{ message: 'POST' }, { message: 'card' }],
      metadata: TEST_METADATA,
      queue,
      log,
      now: steppingClock,
    });

    const stamps = (await drain(queue)).map((r) => r.timestamp);
    expect(stamps).toEqual([1000, 1000, 1000, 1500, 1500, 2000]);
    for (let k = 1; k < stamps.length; k++) {
      expect(stamps[k]).toBeGreaterThanOrEqual(stamps[k - 1] ?? 0);
    }
  });

  it('keeps a multi-record emission contiguous and in order', async () => {
    const queue = new FanInQueue<StampedRecord>(32);

    await runGeneratorTask({
      category: 'http_leak',
      limiter: admitTimes(2),
      produce: () => [{ message: 'POST' }, { message: 'card' }],
      metadata: TEST_METADATA,
      queue,
      log,
    });

    const messages = (await drain(queue)).map((r) => r.message);
    expect(messages).toEqual(['POST', 'card', 'POST', 'card']);
  });

  it('stops with "closed" when the queue closes mid-emission', async () => {
    const queue = new FanInQueue<StampedRecord>(1);

    const task = runGeneratorTask({
      category: 'http_leak',
      limiter: admitAlways,
      produce: () => [{ message: 'first' }, { message: 'second' }],
      metadata: TEST_METADATA,
      queue,
      log,
      stats,
    });

    await settle();
    expect(queue.size).toBe(1);
    queue.close();

    await expect(task).resolves.toBe('closed');
    expect(stats.snapshot().records_enqueued).toEqual({ http_leak: 1 });
    expect(stats.snapshot().tasks_finished).toEqual({ closed: 1 });
  });

  it('does not produce once the queue is already closed', async () => {
    const queue = new FanInQueue<StampedRecord>(4);
    queue.close();
    const produce = vi.fn(() => ({ message: 'never' }));

    const outcome = await runGeneratorTask({
      category: 'vpc_flow',
      limiter: admitAlways,
      produce,
      metadata: TEST_METADATA,
      queue,
      log,
    });

    expect(outcome).toBe('closed');
    expect(produce).not.toHaveBeenCalled();
  });

  it('stops with "aborted" when the signal aborts while waiting for a token', async () => {
    const queue = new FanInQueue<StampedRecord>(4);
    const ac = new AbortController();

    const task = runGeneratorTask({
      category: 'vpc_flow_attack',
      limiter: blockUntilAbort,
      produce: () => ({ message: 'never' }),
      metadata: TEST_METADATA,
      queue,
      log,
      signal: ac.signal,
      stats,
    });

    await settle();
    expect(stats.snapshot().tasks_running).toBe(1);
    ac.abort();

    await expect(task).resolves.toBe('aborted');
    expect(queue.size).toBe(0);
    expect(stats.snapshot().tasks_running).toBe(0);
  });

  it('stops with "failed" and logs when the producer throws', async () => {
    const queue = new FanInQueue<StampedRecord>(4);
    const boom = new Error('word list missing');

    const outcome = await runGeneratorTask({
      category: 'http_access',
      limiter: admitAlways,
      produce: () => {
        throw boom;
      },
      metadata: TEST_METADATA,
      queue,
      log,
      stats,
    });

    expect(outcome).toBe('failed');
    expect(log.error).toHaveBeenCalledWith(
      { err: boom, category: 'http_access' },
      'Record producer failed, stopping task',
    );
    expect(stats.snapshot().tasks_finished).toEqual({ failed: 1 });
    expect(queue.isClosed).toBe(false);
  });

  it('logs start and stop with the outcome', async () => {
    const queue = new FanInQueue<StampedRecord>(4);

    await runGeneratorTask({
      category: 'http_error',
      limiter: admitTimes(0),
      produce: () => ({ message: 'never' }),
      metadata: TEST_METADATA,
      queue,
      log,
    });

    expect(log.info).toHaveBeenCalledWith({ category: 'http_error' }, 'Generator task started');
    expect(log.info).toHaveBeenCalledWith({ category: 'http_error', outcome: 'aborted' }, 'Generator task stopped');
  });
});
