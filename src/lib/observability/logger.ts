/**
 * Logger
 *
 * The producer-facing logging interface. A Logger turns each call into an
 * immutable LogEvent (fields, active scope chain, trace context, callsite)
 * and dispatches it through a SinkRegistry.
 */

import { currentScopes } from './context';
import type { SinkRegistry } from './sinks';
import { captureSourceLocation } from './source-location';
import { openTelemetryTraceProvider, type TraceContextProvider } from './trace';
import {
  LogLevel,
  toFieldEntries,
  type FieldEntry,
  type FieldInput,
  type Fields,
  type FieldValue,
  type LogEvent,
} from './types';

export interface LoggerOptions {
  /** Producer identifier attached to every event. Defaults to 'app'. */
  target?: string;
  /** Fields attached to every event, before call-site fields. */
  fields?: Fields;
  /** Where trace context comes from. Defaults to the active OpenTelemetry span. */
  traceProvider?: TraceContextProvider;
  /** Whether to capture the callsite of each event. Defaults to true. */
  captureSourceLocation?: boolean;
}

/**
 * Logger - the unified logging interface.
 *
 * Loggers are immutable - child() and forTarget() create new loggers.
 * Sink failures are reported through the registry's onSinkError hook and
 * never thrown into the calling code.
 */
export class Logger {
  private readonly sinkRegistry: SinkRegistry;
  private readonly options: LoggerOptions;
  private readonly target: string;
  private readonly defaultFields: readonly FieldEntry[];
  private readonly traceProvider: TraceContextProvider;
  private readonly captureSource: boolean;

  constructor(sinkRegistry: SinkRegistry, options: LoggerOptions = {}) {
    this.sinkRegistry = sinkRegistry;
    this.options = options;
    this.target = options.target ?? 'app';
    this.defaultFields = toFieldEntries(options.fields);
    this.traceProvider = options.traceProvider ?? openTelemetryTraceProvider;
    this.captureSource = options.captureSourceLocation ?? true;
  }

  /**
   * Create a child logger with additional default fields.
   * The new logger inherits all parent fields plus the new ones.
   * This is immutable - the parent logger is unchanged.
   */
  child(fields: Fields): Logger {
    return new Logger(this.sinkRegistry, {
      ...this.options,
      fields: { ...this.options.fields, ...fields },
    });
  }

  /**
   * Create a logger emitting under a different target.
   */
  forTarget(target: string): Logger {
    return new Logger(this.sinkRegistry, { ...this.options, target });
  }

  trace(message: string, fields?: FieldInput): void {
    this.emit(LogLevel.TRACE, message, toFieldEntries(fields));
  }

  debug(message: string, fields?: FieldInput): void {
    this.emit(LogLevel.DEBUG, message, toFieldEntries(fields));
  }

  info(message: string, fields?: FieldInput): void {
    this.emit(LogLevel.INFO, message, toFieldEntries(fields));
  }

  warn(message: string, fields?: FieldInput): void {
    this.emit(LogLevel.WARN, message, toFieldEntries(fields));
  }

  /**
   * Log an ERROR message.
   *
   * @param error - Recorded as the `error` field. Non-Error values are stringified.
   */
  error(message: string, error?: unknown, fields?: FieldInput): void {
    const entries = toFieldEntries(fields);
    if (error !== undefined) {
      const errorField: FieldValue = error instanceof Error ? error : String(error);
      entries.push(['error', errorField]);
    }
    this.emit(LogLevel.ERROR, message, entries);
  }

  /**
   * Emit an event at any level. The message is optional.
   */
  event(level: LogLevel, fields: FieldInput, message?: string): void {
    this.emit(level, message, toFieldEntries(fields));
  }

  getTarget(): string {
    return this.target;
  }

  /**
   * Get a copy of the default fields.
   */
  getFields(): Fields {
    return { ...this.options.fields };
  }

  /**
   * Get the sink registry.
   * Useful for advanced operations like flushing.
   */
  getSinkRegistry(): SinkRegistry {
    return this.sinkRegistry;
  }

  /**
   * Flush all pending log writes.
   * Call this before process exit.
   */
  async flush(): Promise<void> {
    await this.sinkRegistry.flush();
  }

  private emit(level: LogLevel, message: string | undefined, fields: readonly FieldEntry[]): void {
    const event: LogEvent = {
      level,
      target: this.target,
      message,
      timestamp: new Date(),
      fields: [...this.defaultFields, ...fields],
      scopes: currentScopes(),
      trace: this.traceProvider(),
      source: this.captureSource ? captureSourceLocation() : undefined,
    };
    this.sinkRegistry.dispatch(event);
  }
}
