/**
 * Scope Projection
 *
 * Renders the active scope chain as the document's `span` object:
 * the innermost scope's name plus the fields of every scope, merged
 * from the outermost inwards so the most specific value wins.
 */

import { nestFields } from './nesting';
import type { FieldEntry, JsonObject, Scope } from './types';

/**
 * Project a scope chain (oldest first) into a `span` object.
 * Returns undefined when no scope is active.
 */
export function projectSpan(scopes: readonly Scope[]): JsonObject | undefined {
  if (scopes.length === 0) {
    return undefined;
  }

  const innermost = scopes[scopes.length - 1];
  const merged: FieldEntry[] = scopes.flatMap((scope) => scope.fields);
  const fields = nestFields(merged);

  const span: JsonObject = { name: innermost.name };
  for (const [key, value] of Object.entries(fields)) {
    // The scope name is authoritative
    if (key !== 'name') {
      span[key] = value;
    }
  }
  return span;
}
