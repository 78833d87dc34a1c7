/**
 * Error types raised by the formatter and its configuration.
 */

/**
 * The writer behind a sink rejected a serialized line.
 * Raised for that one event only; the sink stays usable.
 */
export class SinkWriteError extends Error {
  readonly sinkName: string;

  constructor(sinkName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Sink "${sinkName}" failed to write log line: ${reason}`, { cause });
    this.name = 'SinkWriteError';
    this.sinkName = sinkName;
  }
}

/**
 * Configuration failed validation.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid logging configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
