/**
 * Layer 18: Telemetry & Observability
 *
 * Cross-cutting observability concerns.
 *
 * Responsibilities:
 * - Structured logging (JSON or pretty lines)
 * - Distributed tracing (OpenTelemetry API)
 * - Request correlation
 */

export {
  createRequestLogger,
  defaultLogSettings,
  formatEntry,
  getLogger,
  isLogFormat,
  isLogLevel,
  type LogEntry,
  type LogFormat,
  Logger,
  type LoggerOptions,
  type LogLevel,
  LOG_LEVELS,
  type LogSettings,
  type LogSink,
  type RequestLogContext,
  setLogger,
  streamSink,
} from './logger.ts';

export {
  type Attributes as OTELAttributes,
  type CreateSpanOptions,
  getActiveSpan,
  getOTELTracer,
  recordSpanException,
  setOTELTracer,
  setRouteAttribute,
  SpanKind,
  SpanStatusCode,
  type Span as OTELSpan,
  type Tracer as OTELTracer,
  withSpan,
} from './otel.ts';
