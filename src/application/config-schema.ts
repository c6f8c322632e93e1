import { z } from 'zod';

export const DEFAULT_TARGET = 'http://localhost:8282';

/** Records/second; 0 disables the category. */
const rate = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

/** Accepts booleans and their usual env/CLI spellings. */
const flag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform((v) => v === 'true' || v === '1' || v === 'yes'),
]);

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Zod schema for the generator configuration.
 *
 * Numbers are coerced so the same schema validates environment variables,
 * CLI flags and literal objects. Defaults reproduce the stock setup:
 * storefront traffic on, flow logs off.
 */
export const generatorConfigSchema = z.object({
  target: z.string().url().default(DEFAULT_TARGET),
  rates: z.object({
    http_access: rate(100),
    http_error: rate(10),
    http_leak: rate(1),
    vpc_flow: rate(0),
    vpc_flow_attack: rate(0),
  }).default({}),
  batch: z.object({
    maxSize: z.coerce.number().int().min(1).default(5),
    maxWaitSeconds: z.coerce.number().positive().default(5),
  }).default({}),
  queueCapacity: z.coerce.number().int().min(1).default(32),
  delivery: z.object({
    gzip: flag.default(true),
    timeoutMs: z.coerce.number().int().positive().default(10_000),
  }).default({}),
  metadata: z.object({
    source: z.string().min(1).default('synthlog'),
    status: z.string().min(1).default('INFO'),
    tags: z.string().default('kube_namespace:test'),
  }).default({}),
  statusServer: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    /** 0 disables the status server. */
    port: z.coerce.number().int().min(0).max(65535).default(0),
  }).default({}),
  logLevel: logLevelSchema.default('info'),
});

export type GeneratorConfig = z.infer<typeof generatorConfigSchema>;
