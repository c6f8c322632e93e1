import { describe, it, expect } from 'vitest';
import { PipelineStats } from '../../src/application/stats.js';

describe('PipelineStats', () => {
  it('starts empty', () => {
    const stats = new PipelineStats(new Date('2026-01-01T00:00:00Z'));
    expect(stats.snapshot()).toEqual({
      started_at: '2026-01-01T00:00:00.000Z',
      records_enqueued: {},
      tasks_running: 0,
      tasks_finished: {},
      batches_delivered: 0,
      batches_failed: 0,
      records_delivered: 0,
      records_dropped: 0,
      last_delivery_error: null,
    });
  });

  it('counts enqueued records per category', () => {
    const stats = new PipelineStats();
    stats.recordEnqueued('http_leak');
    stats.recordEnqueued('http_leak');
    stats.recordEnqueued('vpc_flow');
    expect(stats.snapshot().records_enqueued).toEqual({ http_leak: 2, vpc_flow: 1 });
  });

  it('tracks running tasks and outcomes', () => {
    const stats = new PipelineStats();
    stats.taskStarted();
    stats.taskStarted();
    stats.taskFinished('failed');
    expect(stats.snapshot().tasks_running).toBe(1);

    stats.taskFinished('aborted');
    stats.taskFinished('aborted');
    expect(stats.snapshot().tasks_running).toBe(0);
    expect(stats.snapshot().tasks_finished).toEqual({ failed: 1, aborted: 2 });
  });

  it('separates delivered and dropped records', () => {
    const stats = new PipelineStats();
    stats.batchDelivered(5);
    stats.batchFailed(3, 'HTTP 503');
    stats.batchDelivered(2);

    expect(stats.snapshot()).toMatchObject({
      batches_delivered: 2,
      batches_failed: 1,
      records_delivered: 7,
      records_dropped: 3,
      last_delivery_error: 'HTTP 503',
    });
  });
});
