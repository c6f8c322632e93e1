import type { Logger } from 'pino';
import { enabledCategories } from '../domain/index.js';
import type { CategoryKind, CommonMetadata, RecordProducer, StampedRecord } from '../domain/index.js';
import { FanInQueue } from '../infrastructure/queue/index.js';
import type { DeliverySink } from '../infrastructure/sink/index.js';
import { Batcher, runBatcher } from './batcher.js';
import type { GeneratorConfig } from './config-schema.js';
import { runGeneratorTask } from './generator-task.js';
import { createProducer } from './producers.js';
import type { ProducerContext } from './producers.js';
import { TokenBucket } from './rate-limiter.js';
import type { Clock, Sleep } from './rate-limiter.js';
import { PipelineStats } from './stats.js';

export interface PipelineOptions {
  config: Pick<GeneratorConfig, 'rates' | 'batch' | 'queueCapacity'>;
  metadata: CommonMetadata;
  sink: DeliverySink<StampedRecord>;
  log: Logger;
  /** Replaces the built-in producer of a category. */
  producers?: Partial<Record<CategoryKind, RecordProducer>>;
  producerContext?: ProducerContext;
  now?: Clock;
  sleep?: Sleep;
  stats?: PipelineStats;
}

export interface PipelineHandle {
  readonly stats: PipelineStats;
  /** Categories that got a generator task, in start order. */
  readonly activeCategories: readonly CategoryKind[];
  /** Settles once every task and the batcher have finished. */
  readonly done: Promise<void>;
  /** Stops generation, flushes the partial batch, waits for `done`. */
  stop(): Promise<void>;
}

/**
 * Wires N generator tasks → fan-in queue → batcher → sink.
 *
 * One task per category with a non-zero rate; a zero rate creates neither
 * a task nor a rate limiter. When every task has ended the queue is closed,
 * so the batcher flushes and returns.
 */
export function startPipeline(opts: PipelineOptions): PipelineHandle {
  const { config, metadata, sink, log } = opts;
  const stats = opts.stats ?? new PipelineStats();
  const now = opts.now ?? (() => Date.now());

  const queue = new FanInQueue<StampedRecord>(config.queueCapacity);
  const ac = new AbortController();
  const categories = enabledCategories(config.rates);

  if (categories.length === 0) {
    log.warn('No categories enabled, nothing to generate');
  }

  const tasks = categories.map((category) =>
    runGeneratorTask({
      category: category.kind,
      limiter: TokenBucket.forRate(category.ratePerSecond, { now, sleep: opts.sleep }),
      produce: opts.producers?.[category.kind] ?? createProducer(category.kind, opts.producerContext),
      metadata,
      queue,
      log: log.child({ component: 'generator', category: category.kind }),
      now,
      signal: ac.signal,
      stats,
    }),
  );

  const tasksDone = Promise.all(tasks).then(() => {
    queue.close();
  });

  const batcherDone = runBatcher<StampedRecord>({
    queue,
    batcher: new Batcher<StampedRecord>({
      maxSize: config.batch.maxSize,
      maxWaitMs: config.batch.maxWaitSeconds * 1000,
    }),
    deliver: async (batch) => {
      const result = await sink.deliver(batch);
      if (result.ok) {
        stats.batchDelivered(batch.length);
      } else {
        stats.batchFailed(batch.length, result.error);
      }
    },
    log: log.child({ component: 'batcher' }),
    now,
  });

  const done = Promise.all([tasksDone, batcherDone]).then(() => undefined);

  log.info(
    {
      categories: categories.map((c) => `${c.kind}@${c.ratePerSecond}/s`),
      batchSize: config.batch.maxSize,
      batchWaitSeconds: config.batch.maxWaitSeconds,
      queueCapacity: config.queueCapacity,
    },
    'Pipeline started',
  );

  let stopping: Promise<void> | null = null;

  return {
    stats,
    activeCategories: categories.map((c) => c.kind),
    done,
    stop(): Promise<void> {
      if (stopping === null) {
        log.info('Stopping pipeline');
        ac.abort();
        queue.close();
        stopping = done;
      }
      return stopping;
    },
  };
}
