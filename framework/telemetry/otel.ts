/**
 * OpenTelemetry Integration
 *
 * Thin helpers over `@opentelemetry/api`. The API is a no-op until an SDK
 * registers a global tracer provider, so these helpers are safe to call in
 * any process.
 *
 * @module
 */

import {
  trace,
  SpanKind,
  SpanStatusCode,
  type Attributes,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

/** Cached tracer instance */
let _tracer: Tracer | undefined;

/**
 * Get the tracer used by the router and its middleware
 */
export function getOTELTracer(name = 'junction', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

/**
 * Replace the cached tracer (tests, custom providers)
 */
export function setOTELTracer(tracer: Tracer | undefined): void {
  _tracer = tracer;
}

export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Set the http.route attribute on the active span and rename it
 *
 * @param routePattern - The matched route pattern (e.g., '/users/:id')
 */
export function setRouteAttribute(routePattern: string, method: string, updateName = true): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    if (updateName) {
      span.updateName(`${method} ${routePattern}`);
    }
  }
}

export function recordSpanException(span: Span, error: Error, message?: string): void {
  span.recordException(error);
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: message ?? error.message,
  });
}

export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Run `fn` inside a new active span. The span is ended when `fn` settles;
 * a rejection is recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  const tracer = getOTELTracer();
  return await tracer.startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    async (span) => {
      try {
        return await fn(span);
      } catch (error) {
        recordSpanException(span, error instanceof Error ? error : new Error(String(error)));
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

export { SpanKind, SpanStatusCode };
export type { Attributes, Span, Tracer };
