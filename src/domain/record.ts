/**
 * Core domain types for the synthlog record model.
 *
 * A record is one emittable log line plus structured fields, shaped the
 * way the collector's logs intake expects. These types carry no framework
 * dependencies.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonObject | readonly JsonValue[];

export interface JsonObject {
  readonly [field: string]: JsonValue;
}

/** One log record. Not fixed-schema: producers may add any field. */
export type LogRecord = JsonObject;

/**
 * What a producer returns for one invocation. A correlated emission
 * (e.g. a failed charge followed by the leaked card line) is an ordered list.
 */
export type ProducerOutput = LogRecord | readonly LogRecord[];

/** Synthesizes one logical event. Must not touch shared state. */
export type RecordProducer = () => ProducerOutput;

/**
 * Fields stamped onto every record before it is enqueued.
 *
 * Built once at startup and frozen; every generator task reads the same
 * instance.
 */
export interface CommonMetadata {
  readonly ddsource: string;
  readonly hostname: string;
  readonly status: string;
  readonly ddtags: string;
}

/** A record after metadata merge: common fields plus `timestamp` (epoch ms). */
export type StampedRecord = LogRecord & CommonMetadata & { readonly timestamp: number };

export function isRecordList(output: ProducerOutput): output is readonly LogRecord[] {
  return Array.isArray(output);
}

/** A single record becomes a one-element list. */
export function toRecordList(output: ProducerOutput): readonly LogRecord[] {
  return isRecordList(output) ? output : [output];
}

export function createCommonMetadata(fields: CommonMetadata): CommonMetadata {
  return Object.freeze({
    ddsource: fields.ddsource,
    hostname: fields.hostname,
    status: fields.status,
    ddtags: fields.ddtags,
  });
}
