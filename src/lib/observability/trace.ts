/**
 * Trace Correlation
 *
 * Links log entries to Cloud Trace. The formatter only reads a resolved
 * trace id, span id and sampling flag; where they come from is up to the
 * provider function. The default provider reads the active OpenTelemetry
 * span context.
 */

import {
  context as otelContext,
  isSpanContextValid,
  trace,
  TraceFlags,
  type Context,
} from '@opentelemetry/api';
import type { JsonObject, TraceContext } from './types';

export const TRACE_KEY = 'logging.googleapis.com/trace';
export const SPAN_ID_KEY = 'logging.googleapis.com/spanId';
export const TRACE_SAMPLED_KEY = 'logging.googleapis.com/trace_sampled';

const SPAN_ID_WIDTH = 16;
const ZERO_SPAN_ID = '0'.repeat(SPAN_ID_WIDTH);
const HEX = /^[0-9a-f]+$/i;
const ALL_ZEROS = /^0+$/;

/**
 * Trace correlation setting, resolved once at construction.
 */
export type TraceCorrelation =
  | { mode: 'disabled' }
  | { mode: 'enabled'; projectId: string };

/**
 * Resolves the trace context for the code currently executing.
 */
export type TraceContextProvider = () => TraceContext | undefined;

/**
 * A trace id is usable when it is non-empty hex and not all zeros.
 */
export function isValidTraceId(traceId: string): boolean {
  return HEX.test(traceId) && !ALL_ZEROS.test(traceId);
}

/**
 * Render a span id as 16 lowercase hex digits. Missing or malformed ids
 * become the all-zero span id.
 */
export function formatSpanId(spanId: string | undefined): string {
  if (!spanId || !HEX.test(spanId) || spanId.length > SPAN_ID_WIDTH) {
    return ZERO_SPAN_ID;
  }
  return spanId.toLowerCase().padStart(SPAN_ID_WIDTH, '0');
}

/**
 * Build the trace correlation fields, in document order.
 * Returns an empty object when correlation is disabled or no valid trace exists.
 */
export function traceFields(
  correlation: TraceCorrelation,
  traceContext: TraceContext | undefined
): JsonObject {
  if (correlation.mode !== 'enabled' || !traceContext || !isValidTraceId(traceContext.traceId)) {
    return {};
  }

  return {
    [TRACE_KEY]: `projects/${correlation.projectId}/traces/${traceContext.traceId}`,
    [SPAN_ID_KEY]: formatSpanId(traceContext.spanId),
    [TRACE_SAMPLED_KEY]: traceContext.sampled,
  };
}

/**
 * Read the span context stored in an OpenTelemetry context.
 * Defaults to the active context.
 */
export function traceContextFromOpenTelemetry(
  ctx: Context = otelContext.active()
): TraceContext | undefined {
  const spanContext = trace.getSpanContext(ctx);
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return undefined;
  }
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
    sampled: (spanContext.traceFlags & TraceFlags.SAMPLED) === TraceFlags.SAMPLED,
  };
}

/**
 * Default provider: the active OpenTelemetry span, if any.
 */
export const openTelemetryTraceProvider: TraceContextProvider = () =>
  traceContextFromOpenTelemetry();
