/**
 * Cloud Logging Formatter
 *
 * Structured logging that writes one Google Cloud Logging JSON document
 * per event, with nested scopes and trace correlation.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createLogger, inScope, httpRequestFields } from './lib/observability';
 *
 * const log = createLogger('api');
 *
 * await inScope('handle_request', { request_id: id }, async () => {
 *   log.info('Request served', {
 *     ...httpRequestFields({ requestMethod: 'GET', status: 200 }),
 *     'labels.tenant': tenant,
 *   });
 * });
 * ```
 *
 * ## Architecture
 *
 * ```
 * Application Code
 *       │
 *       ▼
 *    Logger  ──► LogEvent (fields, scope chain, trace context, callsite)
 *       │
 *       ▼
 *  SinkRegistry  ──► Dispatches to registered sinks
 *       │
 *       ├──► CloudLoggingSink (prod, one JSON document per line)
 *       └──► ConsoleSink (dev, colored)
 * ```
 */

import { loadFormatterConfig, parseFormatterConfig, type FormatterConfig } from './config';
import { ConfigError } from './errors';
import { Logger, type LoggerOptions } from './logger';
import { SinkRegistry } from './sinks';
import { CloudLoggingSink, ConsoleSink, type LineWriter } from './sinks/index';

// ============================================================================
// Global Sink Registry
// ============================================================================

/**
 * Global sink registry - the single point of log dispatch.
 * All loggers from createLogger() use this registry.
 */
export const globalSinkRegistry = new SinkRegistry();

/**
 * Build the sink described by a configuration.
 */
export function createSink(config: FormatterConfig, writer?: LineWriter): CloudLoggingSink | ConsoleSink {
  if (config.format === 'pretty') {
    return new ConsoleSink({ minLevel: config.minLevel });
  }
  return new CloudLoggingSink({
    minLevel: config.minLevel,
    writer,
    traceCorrelation: config.traceCorrelation,
    includeSourceLocation: config.includeSourceLocation,
    includeTarget: config.includeTarget,
  });
}

/**
 * Replace the global sinks with the one described by `config`.
 */
export function configureLogging(config: FormatterConfig, writer?: LineWriter): void {
  for (const name of globalSinkRegistry.getSinkNames()) {
    globalSinkRegistry.unregister(name);
  }
  globalSinkRegistry.register(createSink(config, writer));
}

/**
 * Create a logger for a module, bound to the global registry.
 */
export function createLogger(target: string, options: Omit<LoggerOptions, 'target'> = {}): Logger {
  return new Logger(globalSinkRegistry, { ...options, target });
}

/**
 * Configure the global sinks from environment variables.
 * An invalid environment is reported on console.error and the defaults are
 * used, so importing the library never throws.
 */
export function configureFromEnvironment(env: NodeJS.ProcessEnv = process.env, writer?: LineWriter): FormatterConfig {
  let config: FormatterConfig;
  try {
    config = loadFormatterConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    console.error('[observability] Using default logging configuration:', error.message);
    config = parseFormatterConfig();
  }
  configureLogging(config, writer);
  return config;
}

// Configure sinks from the environment on module load
configureFromEnvironment();

/**
 * Global logger for code that has no module-specific target.
 */
export const globalLogger = createLogger('app');

// ============================================================================
// Re-exports
// ============================================================================

// Types
export {
  LogLevel,
  LogLevelNames,
  type FieldEntry,
  type FieldInput,
  type FieldMap,
  type FieldValue,
  type Fields,
  type JsonObject,
  type JsonValue,
  type LogEvent,
  type Scope,
  type SerializedError,
  type SourceLocation,
  type TraceContext,
  serializeError,
  toFieldEntries,
} from './types';

// Core classes
export { Logger, type LoggerOptions } from './logger';
export {
  SinkRegistry,
  type LogSink,
  type SinkErrorHandler,
  type SinkFailure,
  type SinkRegistryOptions,
} from './sinks';
export { ConfigError, SinkWriteError } from './errors';

// Sink implementations
export {
  CloudLoggingSink,
  ConsoleSink,
  streamWriter,
  type CloudLoggingSinkOptions,
  type ConsoleSinkOptions,
  type LineStream,
  type LineWriter,
} from './sinks/index';

// Document formatting
export {
  buildDocument,
  formatEvent,
  formatEventLine,
  serializeDocument,
  type DocumentEntry,
  type DocumentOptions,
} from './document';
export { normalizeKey, normalizeSegment } from './keys';
export { nestFields } from './nesting';
export {
  LOG_SEVERITIES,
  resolveSeverity,
  severityForLevel,
  type LogSeverity,
} from './severity';
export { HTTP_REQUEST_KEY, INSERT_ID_KEY, LABELS_KEY, routeFields } from './special-fields';
export { projectSpan } from './span';
export {
  SPAN_ID_KEY,
  TRACE_KEY,
  TRACE_SAMPLED_KEY,
  openTelemetryTraceProvider,
  traceContextFromOpenTelemetry,
  traceFields,
  type TraceContextProvider,
  type TraceCorrelation,
} from './trace';
export { SOURCE_LOCATION_KEY, captureSourceLocation } from './source-location';
export { httpRequestFields, type HttpRequest } from './http-request';

// Scope utilities
export { currentScopes, hasScope, inScope, recordInScope } from './context';

// Configuration
export {
  formatterConfigSchema,
  loadFormatterConfig,
  parseFormatterConfig,
  type FormatterConfig,
  type FormatterConfigInput,
} from './config';
