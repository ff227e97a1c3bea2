/**
 * Span helper - wraps OpenTelemetry's tracer.startActiveSpan with automatic:
 * - Attribute setting
 * - Error recording + status propagation
 * - Span ending (even on error)
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";

const TRACER_NAME = "archivum";

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Execute an async function within a named OTel span.
 *
 * When no tracer provider is registered the function still runs, inside a
 * no-op span.
 *
 * @param name - Span name (e.g., "repository.ingest.submit")
 * @throws Re-throws any error from fn after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, value);
      }
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
