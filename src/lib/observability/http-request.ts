/**
 * Typed helper for the `httpRequest` field family.
 *
 * Any `http_request.*` field is nested under `httpRequest` as-is; this
 * helper only spares callers from spelling the schema's field names and
 * formats latency the way the provider expects (seconds with an `s` suffix).
 *
 * @example
 * ```typescript
 * logger.info('Request served', httpRequestFields({
 *   requestMethod: 'GET',
 *   requestUrl: req.url,
 *   status: res.statusCode,
 *   latencyMs: 231,
 * }));
 * ```
 */

import type { Fields } from './types';

export interface HttpRequest {
  requestMethod?: string;
  requestUrl?: string;
  requestSize?: number;
  responseSize?: number;
  status?: number;
  userAgent?: string;
  remoteIp?: string;
  serverIp?: string;
  referer?: string;
  /** Server-side processing time in milliseconds */
  latencyMs?: number;
  cacheLookup?: boolean;
  cacheHit?: boolean;
  cacheValidatedWithOriginServer?: boolean;
  cacheFillBytes?: number;
  /** e.g. "HTTP/1.1", "HTTP/2", "websocket" */
  protocol?: string;
}

/**
 * Render a millisecond duration as a provider duration string.
 */
export function formatLatency(latencyMs: number): string {
  return `${latencyMs / 1000}s`;
}

/**
 * Convert a typed request description into `http_request.*` fields.
 * Unset properties are omitted.
 */
export function httpRequestFields(request: HttpRequest): Fields {
  const { latencyMs, ...rest } = request;
  const fields: Record<string, string | number | boolean> = {};

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      fields[`http_request.${key}`] = value;
    }
  }
  if (latencyMs !== undefined) {
    fields['http_request.latency'] = formatLatency(latencyMs);
  }
  return fields;
}
