import { promisify } from 'node:util';
import { gzip as gzipCallback } from 'node:zlib';
import type { Logger } from 'pino';

const gzip = promisify(gzipCallback);

export const LOGS_PATH = '/api/v2/logs';

export type DeliveryResult =
  | { readonly ok: true; readonly status: number }
  | { readonly ok: false; readonly status?: number; readonly error: string };

/** Ships one batch. Implementations report failure in the result, never by throwing. */
export interface DeliverySink<T> {
  deliver(batch: readonly T[]): Promise<DeliveryResult>;
}

export interface HttpLogSinkOptions {
  /** Collector base URL, e.g. `http://localhost:8282`. */
  baseUrl: string;
  log: Logger;
  gzip?: boolean;
  timeoutMs?: number;
}

/** `{baseUrl}/api/v2/logs`, tolerating trailing slashes on the base. */
export function logsEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${LOGS_PATH}`;
}

/**
 * POSTs each batch as a JSON array to the collector's logs intake.
 *
 * Best-effort: transport errors and non-2xx responses are logged and the
 * batch is dropped. No retry, no buffering.
 */
export class HttpLogSink<T> implements DeliverySink<T> {
  readonly endpoint: string;
  private readonly log: Logger;
  private readonly gzip: boolean;
  private readonly timeoutMs: number;

  constructor(opts: HttpLogSinkOptions) {
    this.endpoint = logsEndpoint(opts.baseUrl);
    this.log = opts.log;
    this.gzip = opts.gzip ?? true;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async deliver(batch: readonly T[]): Promise<DeliveryResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };

    try {
      const json = JSON.stringify(batch);
      let body: string | Buffer = json;
      if (this.gzip) {
        body = await gzip(json);
        headers['Content-Encoding'] = 'gzip';
      }

      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.log.warn(
          { status: response.status, endpoint: this.endpoint, size: batch.length },
          'Collector returned non-OK status, batch dropped',
        );
        return { ok: false, status: response.status, error: `HTTP ${response.status}` };
      }

      this.log.debug({ status: response.status, size: batch.length }, 'Batch delivered');
      return { ok: true, status: response.status };
    } catch (err: unknown) {
      this.log.warn({ err, endpoint: this.endpoint, size: batch.length }, 'Could not deliver batch to collector');
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }
}
