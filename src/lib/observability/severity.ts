/**
 * Severity Mapping
 *
 * The provider's LogSeverity vocabulary is richer than the producer's
 * level set. Levels map onto it with a fixed table; a `severity` field
 * on the event may name any provider token directly.
 */

import { LogLevel, type FieldValue } from './types';

export const LOG_SEVERITIES = [
  'DEFAULT',
  'DEBUG',
  'INFO',
  'NOTICE',
  'WARNING',
  'ERROR',
  'CRITICAL',
  'ALERT',
  'EMERGENCY',
] as const;

export type LogSeverity = (typeof LOG_SEVERITIES)[number];

const LEVEL_SEVERITIES: Partial<Record<number, LogSeverity>> = {
  [LogLevel.TRACE]: 'DEBUG',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARNING',
  [LogLevel.ERROR]: 'ERROR',
};

/**
 * Map a producer level to its provider severity.
 * Levels outside the known set map to `DEFAULT`.
 */
export function severityForLevel(level: LogLevel): LogSeverity {
  return LEVEL_SEVERITIES[level] ?? 'DEFAULT';
}

export function isLogSeverity(value: string): value is LogSeverity {
  return LOG_SEVERITIES.some((severity) => severity === value);
}

/**
 * Parse an explicit override. Only strings naming a provider token
 * (in any case) are accepted.
 */
export function parseSeverity(value: FieldValue): LogSeverity | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const token = value.trim().toUpperCase();
  return isLogSeverity(token) ? token : undefined;
}

/**
 * Resolve the severity written to the document: a valid override wins,
 * anything else falls back to the level mapping.
 */
export function resolveSeverity(level: LogLevel, override?: FieldValue): LogSeverity {
  if (override !== undefined) {
    const parsed = parseSeverity(override);
    if (parsed) {
      return parsed;
    }
  }
  return severityForLevel(level);
}
