/**
 * Scope Propagation
 *
 * Uses AsyncLocalStorage to carry the active scope chain through async
 * execution. Any logger call inside `inScope()` sees the scope, across
 * awaits, without passing it around.
 *
 * Usage:
 *   await inScope('handle_request', { request_id: 'abc' }, async () => {
 *     await inScope('load_user', { user_id: 42 }, async () => {
 *       logger.info('Loaded'); // span: { name: 'load_user', requestId: 'abc', userId: 42 }
 *     });
 *   });
 */

import { AsyncLocalStorage } from 'async_hooks';
import { toFieldEntries, type FieldEntry, type FieldInput, type Scope } from './types';

/**
 * One link of the scope chain. Fields stay mutable so `recordInScope()`
 * can add values discovered while the scope runs.
 */
interface ScopeFrame {
  readonly name: string;
  readonly fields: FieldEntry[];
  readonly parent?: ScopeFrame;
}

/**
 * AsyncLocalStorage instance for the innermost scope.
 * Each async execution chain has its own isolated chain.
 */
const asyncLocalStorage = new AsyncLocalStorage<ScopeFrame>();

/**
 * Run a function inside a new scope nested under the current one.
 *
 * @returns The return value of fn
 *
 * @example
 * ```typescript
 * const user = await inScope('load_user', { user_id: id }, () => db.users.find(id));
 * ```
 */
export function inScope<T>(name: string, fields: FieldInput, fn: () => T): T {
  const frame: ScopeFrame = {
    name,
    fields: toFieldEntries(fields),
    parent: asyncLocalStorage.getStore(),
  };
  return asyncLocalStorage.run(frame, fn);
}

/**
 * Check if we're currently inside a scope.
 */
export function hasScope(): boolean {
  return asyncLocalStorage.getStore() !== undefined;
}

/**
 * Record additional fields on the innermost scope.
 * Events emitted afterwards inside the scope include them.
 * Does nothing outside a scope.
 */
export function recordInScope(fields: FieldInput): void {
  const current = asyncLocalStorage.getStore();
  if (current) {
    current.fields.push(...toFieldEntries(fields));
  }
}

/**
 * Snapshot the active scope chain, oldest first.
 * Later records on the live scopes do not affect the snapshot.
 */
export function currentScopes(): Scope[] {
  const chain: Scope[] = [];
  for (let frame = asyncLocalStorage.getStore(); frame; frame = frame.parent) {
    chain.push({ name: frame.name, fields: [...frame.fields] });
  }
  return chain.reverse();
}
