/**
 * Console Sink
 *
 * Human-readable console output with optional color formatting.
 * Meant for local development; production output goes through CloudLoggingSink.
 */

import { normalizeKey } from '../keys';
import type { LogSink } from '../sinks';
import { stringifyValue } from '../special-fields';
import { LogLevel, LogLevelNames, serializeError, type LogEvent } from '../types';

/**
 * ANSI color codes for terminal output.
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.TRACE]: '\x1b[90m', // Gray
  [LogLevel.DEBUG]: '\x1b[34m', // Blue
  [LogLevel.INFO]: '\x1b[36m',  // Cyan
  [LogLevel.WARN]: '\x1b[33m',  // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export interface ConsoleSinkOptions {
  /** Minimum log level to output. Defaults to TRACE (all events). */
  minLevel?: LogLevel;
  /** Whether to use ANSI colors. Defaults to true in non-production. */
  colors?: boolean;
  /** Whether to include timestamp. Defaults to true. */
  timestamps?: boolean;
  /** Whether to include full stack traces of error fields. Defaults to true. */
  stackTraces?: boolean;
}

export class ConsoleSink implements LogSink {
  readonly name = 'console';
  readonly minLevel: LogLevel;

  private readonly useColors: boolean;
  private readonly showTimestamps: boolean;
  private readonly showStackTraces: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.minLevel = options.minLevel ?? LogLevel.TRACE;
    this.useColors = options.colors ?? (process.env.NODE_ENV !== 'production');
    this.showTimestamps = options.timestamps ?? true;
    this.showStackTraces = options.stackTraces ?? true;
  }

  /**
   * Write a log event to the console.
   */
  write(event: LogEvent): void {
    const levelName = LogLevelNames[event.level] ?? 'DEFAULT';
    const color = this.useColors ? (LEVEL_COLORS[event.level] ?? '') : '';
    const dim = this.useColors ? DIM : '';
    const reset = this.useColors ? RESET : '';

    const parts: string[] = [];

    if (this.showTimestamps) {
      parts.push(`${dim}${event.timestamp.toISOString()}${reset}`);
    }

    parts.push(`${color}[${levelName}]${reset}`);
    parts.push(`${dim}${event.target}${reset}`);

    // Scope path, outermost first
    if (event.scopes.length > 0) {
      parts.push(`${dim}${event.scopes.map((scope) => scope.name).join(':')}${reset}`);
    }

    if (event.message !== undefined) {
      parts.push(event.message);
    }

    const fieldStr = event.fields
      .map(([key, value]) => `${normalizeKey(key)}=${stringifyValue(value)}`)
      .join(' ');
    if (fieldStr.length > 0) {
      parts.push(`${dim}${fieldStr}${reset}`);
    }

    const line = parts.join(' ');

    if (event.level >= LogLevel.ERROR) {
      console.error(line);
    } else if (event.level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (!this.showStackTraces) {
      return;
    }
    for (const [, value] of event.fields) {
      if (!(value instanceof Error)) {
        continue;
      }
      const serialized = serializeError(value);
      if (serialized.stack) {
        // Skip first line (already shown)
        for (const stackLine of serialized.stack.split('\n').slice(1)) {
          console.error(`${dim}  ${stackLine.trim()}${reset}`);
        }
      }
    }
  }
}
