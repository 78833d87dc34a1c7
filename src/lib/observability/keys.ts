/**
 * Key Normalization
 *
 * Field keys arrive in whatever case the producer used (`request_method`,
 * `http_request.remote_ip`). The provider schema expects camelCase, so
 * every dotted segment is converted independently.
 */

const SNAKE_BOUNDARY = /_+([^_])/g;

/**
 * Convert one key segment to camelCase.
 *
 * `request_method` becomes `requestMethod`; a segment that is already
 * camelCase is returned unchanged.
 */
export function normalizeSegment(segment: string): string {
  const camel = segment.replace(SNAKE_BOUNDARY, (_match, next: string) => next.toUpperCase());
  if (camel.length === 0) {
    return camel;
  }
  return camel.charAt(0).toLowerCase() + camel.slice(1);
}

/**
 * Split a dotted key into normalized segments. Empty segments are dropped.
 */
export function splitKey(key: string): string[] {
  return key
    .split('.')
    .filter((segment) => segment.length > 0)
    .map(normalizeSegment);
}

/**
 * Normalize a full dotted key, keeping its dot separators.
 */
export function normalizeKey(key: string): string {
  return splitKey(key).join('.');
}
