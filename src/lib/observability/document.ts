/**
 * Document Assembly
 *
 * Builds the single JSON object written for each event. Stages run in a
 * fixed order:
 *
 *   classify fields -> nest generic fields -> project span -> enrich -> serialize
 *
 * Key order in the output is part of the contract:
 *
 *   time, [target], severity, httpRequest, logging.googleapis.com/labels,
 *   logging.googleapis.com/insertId, trace fields, sourceLocation, span,
 *   generic fields, message
 *
 * Nothing here holds state between events; the options are read-only.
 */

import { splitKey } from './keys';
import { nestFields } from './nesting';
import { resolveSeverity } from './severity';
import { sourceLocationFields } from './source-location';
import { projectSpan } from './span';
import { HTTP_REQUEST_KEY, INSERT_ID_KEY, LABELS_KEY, routeFields } from './special-fields';
import { traceFields, type TraceCorrelation } from './trace';
import type { FieldEntry, JsonObject, JsonValue, LogEvent } from './types';

export interface DocumentOptions {
  /** Trace correlation mode. Defaults to disabled. */
  traceCorrelation?: TraceCorrelation;
  /** Whether to emit the callsite. Defaults to true. */
  includeSourceLocation?: boolean;
  /** Whether to emit the event target. Defaults to false. */
  includeTarget?: boolean;
}

// Keys owned by the document itself; generic fields may not replace them
const DOCUMENT_KEYS = new Set(['time', 'severity', 'span', HTTP_REQUEST_KEY]);

/**
 * One top-level document key and its value.
 */
export type DocumentEntry = readonly [key: string, value: JsonValue];

/**
 * Top-level generic keys in the order the producer first supplied them.
 */
function genericKeyOrder(entries: readonly FieldEntry[]): string[] {
  const order = new Set<string>();
  for (const [key] of entries) {
    const [head] = splitKey(key);
    if (head !== undefined) {
      order.add(head);
    }
  }
  return [...order];
}

/**
 * Assemble the output document for one event as ordered entries.
 */
export function buildDocument(event: LogEvent, options: DocumentOptions = {}): DocumentEntry[] {
  const correlation = options.traceCorrelation ?? { mode: 'disabled' };
  const includeSourceLocation = options.includeSourceLocation ?? true;
  const includeTarget = options.includeTarget ?? false;

  const routed = routeFields(event.fields);
  const generic = nestFields(routed.generic);

  const document: DocumentEntry[] = [['time', event.timestamp.toISOString()]];
  if (includeTarget) {
    document.push(['target', event.target]);
  }
  document.push(['severity', resolveSeverity(event.level, routed.severity)]);

  if (routed.httpRequest) {
    document.push([HTTP_REQUEST_KEY, routed.httpRequest]);
  }
  if (routed.labels) {
    document.push([LABELS_KEY, routed.labels]);
  }
  if (routed.insertId !== undefined) {
    document.push([INSERT_ID_KEY, routed.insertId]);
  }

  document.push(...Object.entries(traceFields(correlation, event.trace)));
  if (includeSourceLocation) {
    document.push(...Object.entries(sourceLocationFields(event.source)));
  }

  const span = projectSpan(event.scopes);
  if (span) {
    document.push(['span', span]);
  }

  // Without an explicit message, a `message` field takes the message slot
  for (const key of genericKeyOrder(routed.generic)) {
    const value = generic[key];
    if (key === 'message' || value === undefined) {
      continue;
    }
    if (DOCUMENT_KEYS.has(key) || (includeTarget && key === 'target')) {
      continue;
    }
    document.push([key, value]);
  }

  const messageField = generic.message;
  if (event.message !== undefined) {
    document.push(['message', event.message]);
  } else if (messageField !== undefined) {
    document.push(['message', messageField]);
  }

  return document;
}

/**
 * Assemble the output document for one event as a plain object.
 *
 * Property order of the object is not the document order for integer-like
 * keys; serialize with `formatEventLine`, which keeps the entry order.
 */
export function formatEvent(event: LogEvent, options: DocumentOptions = {}): JsonObject {
  return Object.fromEntries(buildDocument(event, options));
}

/**
 * Serialize document entries as one newline-terminated JSON line, in entry order.
 */
export function serializeDocument(document: readonly DocumentEntry[]): string {
  const members = document.map(([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value)}`);
  return `{${members.join(',')}}\n`;
}

/**
 * Format and serialize an event in one step.
 */
export function formatEventLine(event: LogEvent, options: DocumentOptions = {}): string {
  return serializeDocument(buildDocument(event, options));
}
