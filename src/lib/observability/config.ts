/**
 * Formatter Configuration
 *
 * Settings are resolved once when the pipeline is built and never change
 * afterwards. Values come from the environment:
 *
 * - GOOGLE_CLOUD_PROJECT: project id; enables trace correlation when set
 * - LOG_TRACE_CORRELATION: `off` disables correlation even with a project id
 * - LOG_SOURCE_LOCATION: `true` (default) or `false`
 * - LOG_INCLUDE_TARGET: `true` or `false` (default)
 * - LOG_LEVEL: TRACE, DEBUG, INFO, WARN or ERROR (default TRACE)
 * - LOG_FORMAT: `json` (default) or `pretty`
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { LogLevel } from './types';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const levelName = z
  .enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR'])
  .transform((name) => LogLevel[name]);

const traceCorrelationSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('disabled') }),
  z.object({ mode: z.literal('enabled'), projectId: z.string().min(1, 'projectId must not be empty') }),
]);

export const formatterConfigSchema = z.object({
  traceCorrelation: traceCorrelationSchema.default({ mode: 'disabled' }),
  includeSourceLocation: z.boolean().default(true),
  includeTarget: z.boolean().default(false),
  minLevel: z.nativeEnum(LogLevel).default(LogLevel.TRACE),
  format: z.enum(['json', 'pretty']).default('json'),
});

export type FormatterConfig = z.infer<typeof formatterConfigSchema>;
export type FormatterConfigInput = z.input<typeof formatterConfigSchema>;

const envSchema = z.object({
  GOOGLE_CLOUD_PROJECT: z.string().trim().min(1).optional(),
  LOG_TRACE_CORRELATION: z.enum(['on', 'off']).optional(),
  LOG_SOURCE_LOCATION: booleanFlag.optional(),
  LOG_INCLUDE_TARGET: booleanFlag.optional(),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(levelName)
    .optional(),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a configuration object and fill in defaults.
 *
 * @throws ConfigError listing every invalid setting
 */
export function parseFormatterConfig(input: FormatterConfigInput = {}): FormatterConfig {
  const result = formatterConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Resolve the configuration from environment variables.
 * Unset variables take their defaults; empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadFormatterConfig(env: NodeJS.ProcessEnv = process.env): FormatterConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const vars = result.data;
  const projectId = vars.GOOGLE_CLOUD_PROJECT;
  const correlationOn = vars.LOG_TRACE_CORRELATION !== 'off';

  return parseFormatterConfig({
    traceCorrelation:
      projectId && correlationOn ? { mode: 'enabled', projectId } : { mode: 'disabled' },
    includeSourceLocation: vars.LOG_SOURCE_LOCATION,
    includeTarget: vars.LOG_INCLUDE_TARGET,
    minLevel: vars.LOG_LEVEL,
    format: vars.LOG_FORMAT,
  });
}
