import { CATEGORIES } from '../domain/index.js';
import type { Category, CategoryKind, LogRecord, ProducerOutput, RecordProducer } from '../domain/index.js';
import {
  buzzword,
  creditCardNumber,
  defaultRng,
  formatHttpAccessLine,
  formatVpcFlowLine,
  ipv4Address,
  randomInt,
  username,
  FLOW_ACCOUNT_ID,
  FLOW_INTERFACE_ID,
  FLOW_LOG_VERSION,
  PROTOCOL_TCP,
} from '../domain/formats/index.js';
import type { Rng } from '../domain/formats/index.js';

/** Fixed response size on generated access lines. */
export const HTTP_RESPONSE_BYTES = 1024;

export interface ProducerContext {
  rng: Rng;
  /** Epoch ms. */
  now: () => number;
}

const defaultContext: ProducerContext = {
  rng: defaultRng,
  now: () => Date.now(),
};

type HttpCategory = Extract<Category, { kind: 'http_access' | 'http_error' | 'http_leak' }>;
type FlowCategory = Extract<Category, { kind: 'vpc_flow' | 'vpc_flow_attack' }>;

function httpRecord(category: HttpCategory, ctx: ProducerContext): LogRecord {
  return {
    message: formatHttpAccessLine({
      clientIp: ipv4Address(ctx.rng),
      username: username(ctx.rng),
      timestamp: new Date(ctx.now()),
      method: category.method,
      path: buzzword(ctx.rng),
      status: category.status,
      bytes: HTTP_RESPONSE_BYTES,
    }),
    service: category.service,
  };
}

function flowRecord(category: FlowCategory, ctx: ProducerContext): LogRecord {
  const endSeconds = Math.floor(ctx.now() / 1000);
  return {
    message: formatVpcFlowLine({
      version: FLOW_LOG_VERSION,
      accountId: FLOW_ACCOUNT_ID,
      interfaceId: FLOW_INTERFACE_ID,
      srcAddr: ipv4Address(ctx.rng),
      dstAddr: ipv4Address(ctx.rng),
      srcPort: randomInt(ctx.rng, 30000, 65536),
      dstPort: category.port,
      protocol: PROTOCOL_TCP,
      packets: randomInt(ctx.rng, 5, 1000),
      bytes: randomInt(ctx.rng, 230, 9000),
      start: endSeconds - randomInt(ctx.rng, 5, 30),
      end: endSeconds,
      action: category.action,
      logStatus: category.logStatus,
    }),
    service: category.service,
  };
}

/**
 * Produces one logical event for a category.
 *
 * The leak category emits two correlated lines: the failed POST and the
 * error line that exposes the card number.
 */
export function produceRecords(category: Category, ctx: ProducerContext = defaultContext): ProducerOutput {
  switch (category.kind) {
    case 'http_access':
    case 'http_error':
      return httpRecord(category, ctx);
    case 'http_leak':
      return [
        httpRecord(category, ctx),
        {
          message: `ERROR could not charge card ${creditCardNumber(ctx.rng)}!`,
          service: category.service,
        },
      ];
    case 'vpc_flow':
    case 'vpc_flow_attack':
      return flowRecord(category, ctx);
  }
}

export function createProducer(kind: CategoryKind, ctx: ProducerContext = defaultContext): RecordProducer {
  const category: Category = CATEGORIES[kind];
  return () => produceRecords(category, ctx);
}
