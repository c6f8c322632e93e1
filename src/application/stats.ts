import type { CategoryKind } from '../domain/index.js';

export type TaskOutcome = 'closed' | 'aborted' | 'failed';

export interface StatsSnapshot {
  started_at: string;
  records_enqueued: Partial<Record<CategoryKind, number>>;
  tasks_running: number;
  tasks_finished: Partial<Record<TaskOutcome, number>>;
  batches_delivered: number;
  batches_failed: number;
  records_delivered: number;
  records_dropped: number;
  last_delivery_error: string | null;
}

/**
 * In-process pipeline counters.
 *
 * Only touched from the event loop, so plain fields are enough.
 */
export class PipelineStats {
  private readonly startedAt: Date;
  private readonly enqueued = new Map<CategoryKind, number>();
  private readonly finished = new Map<TaskOutcome, number>();
  private running = 0;
  private batchesDelivered = 0;
  private batchesFailed = 0;
  private recordsDelivered = 0;
  private recordsDropped = 0;
  private lastDeliveryError: string | null = null;

  constructor(startedAt: Date = new Date()) {
    this.startedAt = startedAt;
  }

  recordEnqueued(category: CategoryKind): void {
    this.enqueued.set(category, (this.enqueued.get(category) ?? 0) + 1);
  }

  taskStarted(): void {
    this.running++;
  }

  taskFinished(outcome: TaskOutcome): void {
    this.running = Math.max(this.running - 1, 0);
    this.finished.set(outcome, (this.finished.get(outcome) ?? 0) + 1);
  }

  batchDelivered(size: number): void {
    this.batchesDelivered++;
    this.recordsDelivered += size;
  }

  batchFailed(size: number, reason: string): void {
    this.batchesFailed++;
    this.recordsDropped += size;
    this.lastDeliveryError = reason;
  }

  snapshot(): StatsSnapshot {
    return {
      started_at: this.startedAt.toISOString(),
      records_enqueued: Object.fromEntries(this.enqueued),
      tasks_running: this.running,
      tasks_finished: Object.fromEntries(this.finished),
      batches_delivered: this.batchesDelivered,
      batches_failed: this.batchesFailed,
      records_delivered: this.recordsDelivered,
      records_dropped: this.recordsDropped,
      last_delivery_error: this.lastDeliveryError,
    };
  }
}
