/**
 * OpenTelemetry Integration
 *
 * Every dispatch runs inside an active server span. Without a registered SDK
 * the API hands out no-op spans, so nothing here needs to be switched off.
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

const TRACER_NAME = 'switchyard';
const TRACER_VERSION = '0.1.0';

/**
 * Get the tracer for the dispatcher
 */
export function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME, TRACER_VERSION);
}

/**
 * Get the currently active span, if any
 */
export function getActiveSpan(): Span | undefined {
  return trace.getActiveSpan();
}

/**
 * Annotate a span with the matched route template and rename it after it
 *
 * @param template - The matched template source (e.g. '/users/:id')
 */
export function setRouteAttribute(span: Span, method: string, template: string): void {
  span.setAttribute('http.route', template);
  span.updateName(`${method} ${template}`);
}

/**
 * Record a routed failure on a span and mark the span as failed
 */
export function recordSpanException(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  } else {
    span.recordException(String(error));
    span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
  }
}

/**
 * Run a dispatch inside an active server span named `METHOD path`.
 * The span ends with the response status code.
 */
export function withServerSpan(
  method: string,
  path: string,
  fn: (span: Span) => Promise<Response>,
  attributes: Attributes = {}
): Promise<Response> {
  return getTracer().startActiveSpan(
    `${method} ${path}`,
    {
      kind: SpanKind.SERVER,
      attributes: {
        'http.request.method': method,
        'url.path': path,
        ...attributes,
      },
    },
    async (span) => {
      try {
        const response = await fn(span);
        span.setAttribute('http.response.status_code', response.status);
        if (response.status < 500) {
          span.setStatus({ code: SpanStatusCode.OK });
        }
        return response;
      } finally {
        span.end();
      }
    }
  );
}

export { SpanStatusCode, type Span };
