/**
 * Telemetry & Observability
 *
 * Structured logging and request tracing.
 */

export {
  createRequestLogger,
  getLogger,
  isLogLevel,
  Logger,
  setLogger,
  type LogEntry,
  type LogFormat,
  type LoggerOptions,
  type LogLevel,
  type RequestLogContext,
} from './logger.ts';
export {
  getActiveSpan,
  getTracer,
  recordSpanException,
  setRouteAttribute,
  SpanStatusCode,
  withServerSpan,
  type Span,
} from './otel.ts';
