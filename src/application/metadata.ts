import type { CommonMetadata, JsonObject, JsonValue, LogRecord, StampedRecord } from '../domain/index.js';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON merge-patch (RFC 7386).
 *
 * Patch fields overwrite target fields of the same name, `null` removes a
 * field, nested objects merge recursively. Returns a new value; neither
 * argument is mutated.
 */
export function mergePatch(target: JsonValue, patch: JsonValue): JsonValue {
  if (!isJsonObject(patch)) return patch;

  const result: Record<string, JsonValue> = isJsonObject(target) ? { ...target } : {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else {
      result[key] = mergePatch(result[key] ?? null, value);
    }
  }
  return result;
}

/**
 * Applies the common metadata to a record and stamps `timestamp` (epoch ms).
 *
 * The timestamp is taken here, right before the record is enqueued, so it
 * reflects send time rather than generation time.
 */
export function stampRecord(record: LogRecord, metadata: CommonMetadata, nowMs: number): StampedRecord {
  const merged = mergePatch(record, { ...metadata });
  const base: JsonObject = isJsonObject(merged) ? merged : {};
  // Common fields restated so the result type carries them.
  return {
    ...base,
    ddsource: metadata.ddsource,
    hostname: metadata.hostname,
    status: metadata.status,
    ddtags: metadata.ddtags,
    timestamp: Math.floor(nowMs),
  };
}
