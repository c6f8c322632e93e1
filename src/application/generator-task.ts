import type { Logger } from 'pino';
import { toRecordList } from '../domain/index.js';
import type { CategoryKind, CommonMetadata, LogRecord, RecordProducer, StampedRecord } from '../domain/index.js';
import type { QueueWriter } from '../infrastructure/queue/index.js';
import { stampRecord } from './metadata.js';
import type { Clock } from './rate-limiter.js';
import type { PipelineStats, TaskOutcome } from './stats.js';

/** What a task needs from its rate limiter. */
export interface Admission {
  acquire(signal?: AbortSignal): Promise<boolean>;
}

export interface GeneratorTaskOptions {
  category: CategoryKind;
  limiter: Admission;
  produce: RecordProducer;
  metadata: CommonMetadata;
  queue: QueueWriter<StampedRecord>;
  log: Logger;
  now?: Clock;
  signal?: AbortSignal;
  stats?: PipelineStats;
}

/**
 * Generation loop for one category: acquire → produce → stamp → push.
 *
 * Runs until the queue closes, the signal aborts, or the producer throws.
 * The promise never rejects, so one task's failure cannot reach another
 * task or the batcher.
 */
export async function runGeneratorTask(opts: GeneratorTaskOptions): Promise<TaskOutcome> {
  const { category, limiter, produce, metadata, queue, log, signal, stats } = opts;
  const now = opts.now ?? (() => Date.now());

  stats?.taskStarted();
  log.info({ category }, 'Generator task started');

  const outcome = await loop();

  stats?.taskFinished(outcome);
  log.info({ category, outcome }, 'Generator task stopped');
  return outcome;

  async function loop(): Promise<TaskOutcome> {
    for (;;) {
      const admitted = await limiter.acquire(signal);
      if (!admitted || signal?.aborted) return 'aborted';
      if (queue.isClosed) return 'closed';

      let records: readonly LogRecord[];
      try {
        records = toRecordList(produce());
      } catch (err: unknown) {
        log.error({ err, category }, 'Record producer failed, stopping task');
        return 'failed';
      }

      for (const record of records) {
        const pushed = await queue.push(stampRecord(record, metadata, now()));
        // Closed queue: drop the rest of this emission and stop.
        if (!pushed) return 'closed';
        stats?.recordEnqueued(category);
      }
    }
  }
}
