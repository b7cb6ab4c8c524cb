/**
 * Accessors for schemaless records.
 *
 * Every fallback chain in the normalizer skips "empty" values: undefined,
 * null, false, 0, NaN, '', [] and {}. Everything else is present.
 */

import type { JsonObject, JsonValue } from '../../shared/types';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Record lookups treat non-object records as empty mappings. */
export function asObject(value: JsonValue | undefined): JsonObject {
  return isJsonObject(value) ? value : {};
}

export function isPresent(value: JsonValue | undefined): value is JsonValue {
  if (value === undefined || value === null || value === false || value === '') return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (Array.isArray(value)) return value.length > 0;
  if (isJsonObject(value)) return Object.keys(value).length > 0;
  return true;
}

export function getField(record: JsonValue | undefined, key: string): JsonValue | undefined {
  const obj = asObject(record);
  return Object.prototype.hasOwnProperty.call(obj, key) ? obj[key] : undefined;
}

/** First present value among `keys`, in order. */
export function firstPresent(record: JsonValue | undefined, keys: readonly string[]): JsonValue | undefined {
  for (const key of keys) {
    const value = getField(record, key);
    if (isPresent(value)) return value;
  }
  return undefined;
}

export function stringify(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) return String(value);
  return JSON.stringify(value);
}

/** Present values as strings; empty values as ''. Not trimmed. */
export function toText(value: JsonValue | undefined): string {
  return isPresent(value) ? stringify(value) : '';
}

/** Slice by code point so astral characters are never split. */
export function truncateCodePoints(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}
