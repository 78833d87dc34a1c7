/**
 * Special Field Routing
 *
 * A handful of key families are reserved by the provider schema and land
 * under fixed output keys instead of the generic field bag. Reservation is
 * decided on the first normalized segment of the full key, so
 * `http_request.status` and `httpRequest.status` route the same way.
 */

import { splitKey } from './keys';
import { insertPath, renderValue } from './nesting';
import { isFieldMap, type FieldEntry, type FieldValue, type JsonObject } from './types';

export const HTTP_REQUEST_KEY = 'httpRequest';
export const LABELS_KEY = 'logging.googleapis.com/labels';
export const INSERT_ID_KEY = 'logging.googleapis.com/insertId';

/**
 * The result of splitting an event's fields into reserved and generic parts.
 */
export interface RoutedFields {
  /** Raw `severity` value, if one was supplied (last one wins) */
  severity?: FieldValue;
  /** Nested `httpRequest` object, if any `http_request.*` field was present */
  httpRequest?: JsonObject;
  /** Flat label map with string values, if any `labels.*` field was present */
  labels?: Record<string, string>;
  insertId?: string;
  /** Everything else, in original order */
  generic: FieldEntry[];
}

/**
 * Render any field value as a string.
 */
export function stringifyValue(value: FieldValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  return JSON.stringify(renderValue(value));
}

function collectLabels(
  labels: Map<string, string>,
  path: readonly string[],
  value: FieldValue,
  seen: WeakSet<object>
): void {
  if (!isFieldMap(value)) {
    // A bare `labels = "x"` has no label name to go under
    if (path.length > 0) {
      labels.set(path.join('.'), stringifyValue(value));
    }
    return;
  }
  if (seen.has(value)) {
    return;
  }
  seen.add(value);
  for (const [key, child] of Object.entries(value)) {
    collectLabels(labels, [...path, ...splitKey(key)], child, seen);
  }
  seen.delete(value);
}

/**
 * Classify event fields into the reserved families and the generic bag.
 */
export function routeFields(entries: readonly FieldEntry[]): RoutedFields {
  const routed: RoutedFields = { generic: [] };
  let httpRequest: JsonObject | undefined;
  let labels: Map<string, string> | undefined;

  for (const entry of entries) {
    const [key, value] = entry;
    const segments = splitKey(key);
    if (segments.length === 0) {
      continue;
    }
    const [head, ...rest] = segments;

    if (head === 'severity' && rest.length === 0) {
      routed.severity = value;
    } else if (head === 'insertId' && rest.length === 0) {
      routed.insertId = stringifyValue(value);
    } else if (head === HTTP_REQUEST_KEY) {
      httpRequest ??= {};
      if (rest.length > 0) {
        insertPath(httpRequest, rest, value);
      } else if (isFieldMap(value)) {
        for (const [childKey, childValue] of Object.entries(value)) {
          insertPath(httpRequest, splitKey(childKey), childValue);
        }
      }
    } else if (head === 'labels') {
      labels ??= new Map();
      collectLabels(labels, rest, value, new WeakSet());
    } else {
      routed.generic.push(entry);
    }
  }

  if (httpRequest && Object.keys(httpRequest).length > 0) {
    routed.httpRequest = httpRequest;
  }
  if (labels && labels.size > 0) {
    routed.labels = Object.fromEntries(labels);
  }
  return routed;
}
