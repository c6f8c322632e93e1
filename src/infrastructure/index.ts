export { FanInQueue, DEFAULT_QUEUE_CAPACITY } from './queue/index.js';
export type { PopResult, QueueWriter, QueueReader } from './queue/index.js';
export { HttpLogSink, logsEndpoint, LOGS_PATH } from './sink/index.js';
export type { DeliverySink, DeliveryResult, HttpLogSinkOptions } from './sink/index.js';
export { loadConfig, settingsFromEnv, SETTINGS, settingId } from './config/index.js';
export type { ConfigSources, RawSettings, Setting } from './config/index.js';
export { resolveHostname } from './identity.js';
