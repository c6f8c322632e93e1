/**
 * Every configurable value, with its environment variable and CLI flag.
 *
 * `section`/`key` locate the value in the object validated by
 * `generatorConfigSchema`.
 */
export interface Setting {
  readonly section?: 'rates' | 'batch' | 'delivery' | 'metadata' | 'statusServer';
  readonly key: string;
  readonly env: string;
  readonly flag: string;
  readonly description: string;
}

export const SETTINGS: readonly Setting[] = [
  { key: 'target', env: 'SYNTHLOG_TARGET', flag: '--target <url>', description: 'collector base URL (logs are POSTed to <url>/api/v2/logs)' },
  { section: 'rates', key: 'http_access', env: 'HTTP_LOG_RATE', flag: '--http-log-rate <n>', description: 'normal HTTP access logs per second' },
  { section: 'rates', key: 'http_error', env: 'HTTP_ERROR_LOG_RATE', flag: '--http-error-log-rate <n>', description: 'HTTP 500 logs per second' },
  { section: 'rates', key: 'http_leak', env: 'HTTP_LEAK_LOG_RATE', flag: '--http-leak-log-rate <n>', description: 'HTTP logs leaking card numbers per second (two lines each)' },
  { section: 'rates', key: 'vpc_flow', env: 'VPC_LOG_RATE', flag: '--vpc-log-rate <n>', description: 'accepted VPC flow logs per second' },
  { section: 'rates', key: 'vpc_flow_attack', env: 'VPC_ATTACK_LOG_RATE', flag: '--vpc-attack-log-rate <n>', description: 'rejected SSH VPC flow logs per second' },
  { section: 'batch', key: 'maxSize', env: 'BATCH_SIZE', flag: '--batch-size <n>', description: 'records per batch' },
  { section: 'batch', key: 'maxWaitSeconds', env: 'BATCH_TIMEOUT_S', flag: '--batch-timeout <seconds>', description: 'max seconds a partial batch waits' },
  { key: 'queueCapacity', env: 'QUEUE_CAPACITY', flag: '--queue-capacity <n>', description: 'records buffered between producers and the batcher' },
  { section: 'delivery', key: 'gzip', env: 'SYNTHLOG_GZIP', flag: '--no-gzip', description: 'send request bodies uncompressed' },
  { section: 'delivery', key: 'timeoutMs', env: 'REQUEST_TIMEOUT_MS', flag: '--request-timeout <ms>', description: 'per-request timeout' },
  { section: 'metadata', key: 'source', env: 'SYNTHLOG_SOURCE', flag: '--source <name>', description: 'ddsource tag on every record' },
  { section: 'metadata', key: 'status', env: 'SYNTHLOG_STATUS', flag: '--status <level>', description: 'status field on every record' },
  { section: 'metadata', key: 'tags', env: 'SYNTHLOG_TAGS', flag: '--tags <tags>', description: 'ddtags field on every record' },
  { section: 'statusServer', key: 'host', env: 'STATUS_HOST', flag: '--status-host <host>', description: 'status server bind address' },
  { section: 'statusServer', key: 'port', env: 'STATUS_PORT', flag: '--status-port <port>', description: 'status server port (0 = disabled)' },
  { key: 'logLevel', env: 'LOG_LEVEL', flag: '--log-level <level>', description: 'pino log level' },
];

/** Unique id of a setting, e.g. `rates.http_leak`. */
export function settingId(setting: Setting): string {
  return setting.section === undefined ? setting.key : `${setting.section}.${setting.key}`;
}
