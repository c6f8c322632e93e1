export { HttpLogSink, logsEndpoint, LOGS_PATH } from './http-log-sink.js';
export type { DeliverySink, DeliveryResult, HttpLogSinkOptions } from './http-log-sink.js';
