export { TokenBucket, sleep, BURST_FACTOR, REFILL_PERCENT, REFILL_INTERVAL_MS } from './rate-limiter.js';
export type { TokenBucketOptions, Clock, Sleep } from './rate-limiter.js';
export { mergePatch, stampRecord, isJsonObject } from './metadata.js';
export { createProducer, produceRecords, HTTP_RESPONSE_BYTES } from './producers.js';
export type { ProducerContext } from './producers.js';
export { runGeneratorTask } from './generator-task.js';
export type { Admission, GeneratorTaskOptions } from './generator-task.js';
export { Batcher, runBatcher } from './batcher.js';
export type { BatcherOptions, RunBatcherOptions } from './batcher.js';
export { PipelineStats } from './stats.js';
export type { StatsSnapshot, TaskOutcome } from './stats.js';
export { startPipeline } from './pipeline.js';
export type { PipelineOptions, PipelineHandle } from './pipeline.js';
export { generatorConfigSchema, logLevelSchema, DEFAULT_TARGET } from './config-schema.js';
export type { GeneratorConfig } from './config-schema.js';
export { ConfigError, StartupError } from './errors.js';
