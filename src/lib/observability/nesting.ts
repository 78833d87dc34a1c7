/**
 * Path Nesting
 *
 * Turns flat, possibly dotted field keys into nested JSON objects:
 *
 * ```
 * http_request.request_method = "GET"
 * http_request.status = 200
 *   => { httpRequest: { requestMethod: "GET", status: 200 } }
 * ```
 *
 * Entries are applied in order. Sub-objects sharing a prefix are merged;
 * a later scalar at the same path overwrites an earlier value. A literal
 * dotted key and the same path assembled from a nested mapping are the
 * same path, so the last one written wins.
 */

import { splitKey } from './keys';
import {
  isFieldMap,
  serializeError,
  type FieldEntry,
  type FieldMap,
  type FieldValue,
  type JsonObject,
  type JsonValue,
} from './types';

export const CIRCULAR_PLACEHOLDER = '[Circular]';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getOwn(target: JsonObject, key: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(target, key) ? target[key] : undefined;
}

/**
 * Render a single field value as JSON.
 * Nested mappings are nested recursively with normalized keys.
 */
export function renderValue(value: FieldValue, seen: WeakSet<object> = new WeakSet()): JsonValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    // JSON has no NaN or Infinity
    return Number.isFinite(value) ? value : String(value);
  }
  if (value instanceof Error) {
    const { name, message, stack } = serializeError(value);
    return stack === undefined ? { name, message } : { name, message, stack };
  }
  const nested: JsonObject = {};
  mergeMap(nested, value, seen);
  return nested;
}

function mergeMap(target: JsonObject, map: FieldMap, seen: WeakSet<object>): void {
  seen.add(map);
  for (const [key, child] of Object.entries(map)) {
    insertPath(target, splitKey(key), child, seen);
  }
  seen.delete(map);
}

/**
 * Set `value` at the given (already normalized) path inside `target`.
 */
export function insertPath(
  target: JsonObject,
  segments: readonly string[],
  value: FieldValue,
  seen: WeakSet<object> = new WeakSet()
): void {
  if (segments.length === 0) {
    return;
  }

  let cursor = target;
  for (const segment of segments.slice(0, -1)) {
    const existing = getOwn(cursor, segment);
    if (isJsonObject(existing)) {
      cursor = existing;
    } else {
      const created: JsonObject = {};
      cursor[segment] = created;
      cursor = created;
    }
  }

  const leaf = segments[segments.length - 1];

  if (isFieldMap(value)) {
    if (seen.has(value)) {
      cursor[leaf] = CIRCULAR_PLACEHOLDER;
      return;
    }
    const existing = getOwn(cursor, leaf);
    if (isJsonObject(existing)) {
      mergeMap(existing, value, seen);
    } else {
      const created: JsonObject = {};
      cursor[leaf] = created;
      mergeMap(created, value, seen);
    }
    return;
  }

  cursor[leaf] = renderValue(value, seen);
}

/**
 * Build a nested object from ordered, possibly dotted entries.
 */
export function nestFields(entries: readonly FieldEntry[]): JsonObject {
  const root: JsonObject = {};
  for (const [key, value] of entries) {
    insertPath(root, splitKey(key), value);
  }
  return root;
}
