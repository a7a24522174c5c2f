/**
 * Tracing Middleware
 *
 * Starts an OpenTelemetry server span for every request and makes it the
 * active span while the inner endpoint runs. Once a route has matched, the
 * span is renamed to `METHOD /pattern` and gets `http.route`.
 */

import { context, trace } from '@opentelemetry/api';
import { MATCHED_ROUTE } from '../http/request.ts';
import type { Middleware } from '../http/types.ts';
import {
  getOTELTracer,
  recordSpanException,
  SpanKind,
  SpanStatusCode,
  type Tracer,
} from '../telemetry/otel.ts';
import { around } from './compose.ts';

export interface TracingOptions {
  /** Defaults to the Junction tracer */
  tracer?: Pick<Tracer, 'startSpan'>;
}

export function tracing(options: TracingOptions = {}): Middleware {
  return around(async (req, next) => {
    const tracer = options.tracer ?? getOTELTracer();
    const span = tracer.startSpan(req.method, {
      kind: SpanKind.SERVER,
      attributes: {
        'http.request.method': req.method,
        'url.path': req.originalPath,
        'url.scheme': req.scheme,
      },
    });

    try {
      const response = await context.with(trace.setSpan(context.active(), span), () => next());

      const route = req.state.get(MATCHED_ROUTE);
      if (typeof route === 'string') {
        span.setAttribute('http.route', route);
        span.updateName(`${req.method} ${route}`);
      }

      span.setAttribute('http.response.status_code', response.status);
      if (response.status >= 500) {
        span.setStatus({ code: SpanStatusCode.ERROR });
      }
      return response;
    } catch (error) {
      recordSpanException(span, error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
