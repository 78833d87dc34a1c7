/**
 * Observability Types
 *
 * Core type definitions shared by the producer side (Logger, scopes)
 * and the document formatter.
 */

/**
 * Producer log levels with numeric priority for filtering.
 * Higher numbers = more severe.
 */
export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
}

/**
 * Human-readable level names for output formatting.
 */
export const LogLevelNames: Record<LogLevel, string> = {
  [LogLevel.TRACE]: 'TRACE',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

/**
 * A nested mapping attached as a single field value.
 */
export interface FieldMap {
  [key: string]: FieldValue;
}

/**
 * The closed set of values a field may carry.
 */
export type FieldValue = string | number | boolean | Error | FieldMap;

/**
 * Call-site fields. Entries whose value is undefined are skipped.
 */
export type Fields = Readonly<Record<string, FieldValue | undefined>>;

/**
 * One ordered key/value pair. Keys may be dotted paths.
 */
export type FieldEntry = readonly [key: string, value: FieldValue];

/**
 * Fields as a record or as ordered entries. Records list integer-like keys
 * (`"404"`) before all others; pass entries to keep such keys in call order.
 */
export type FieldInput = Fields | readonly FieldEntry[];

/**
 * A named execution scope and the fields recorded on it.
 */
export interface Scope {
  readonly name: string;
  readonly fields: readonly FieldEntry[];
}

/**
 * Callsite of an event.
 */
export interface SourceLocation {
  readonly file: string;
  readonly line?: number;
}

/**
 * Resolved distributed-trace identifiers for the current execution.
 */
export interface TraceContext {
  /** Hexadecimal trace id */
  readonly traceId: string;
  /** Hexadecimal span id, if the trace has a span subdivision */
  readonly spanId?: string;
  readonly sampled: boolean;
}

/**
 * Structured log event - the core unit passed to sinks.
 * Immutable once created.
 */
export interface LogEvent {
  /** Severity level */
  readonly level: LogLevel;
  /** Producer identifier, usually a module name */
  readonly target: string;
  /** Human-readable message */
  readonly message?: string;
  /** When the event was created */
  readonly timestamp: Date;
  /** Call-site fields in the order the producer supplied them */
  readonly fields: readonly FieldEntry[];
  /** Active scope chain, oldest first */
  readonly scopes: readonly Scope[];
  readonly trace?: TraceContext;
  readonly source?: SourceLocation;
}

/**
 * JSON values produced by the formatter.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Serialized error for JSON output.
 */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Serialize an Error object for JSON-safe output.
 */
export function serializeError(error: Error): SerializedError {
  const serialized: SerializedError = {
    name: error.name,
    message: error.message,
  };
  if (error.stack) {
    serialized.stack = error.stack;
  }
  return serialized;
}

function isEntryList(fields: FieldInput): fields is readonly FieldEntry[] {
  return Array.isArray(fields);
}

/**
 * Convert call-site fields into ordered entries, dropping undefined values.
 */
export function toFieldEntries(fields: FieldInput | undefined): FieldEntry[] {
  const entries: FieldEntry[] = [];
  if (!fields) {
    return entries;
  }
  if (isEntryList(fields)) {
    return [...fields];
  }
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      entries.push([key, value]);
    }
  }
  return entries;
}

/**
 * Narrow a field value to a nested mapping.
 */
export function isFieldMap(value: FieldValue): value is FieldMap {
  return typeof value === 'object' && !(value instanceof Error);
}
