import type { HttpMethod } from '../categories.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Common Log Format timestamp in UTC, e.g. `07/Mar/2026:09:05:01 +0000`. */
export function formatApacheTimestamp(date: Date): string {
  const month = MONTHS[date.getUTCMonth()] ?? 'Jan';
  return (
    `${pad2(date.getUTCDate())}/${month}/${date.getUTCFullYear()}` +
    `:${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())} +0000`
  );
}

export interface HttpAccessFields {
  clientIp: string;
  username: string;
  timestamp: Date;
  method: HttpMethod;
  path: string;
  status: number;
  bytes: number;
}

/**
 * Formats one access line:
 * `{ip} - {user} [{ts}] "{METHOD} /{path} HTTP/1.1" {status} {bytes}`
 */
export function formatHttpAccessLine(fields: HttpAccessFields): string {
  return (
    `${fields.clientIp} - ${fields.username} [${formatApacheTimestamp(fields.timestamp)}] ` +
    `"${fields.method} /${fields.path} HTTP/1.1" ${fields.status} ${fields.bytes}`
  );
}
