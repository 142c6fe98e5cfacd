/**
 * OpenTelemetry tracing for turns, provider calls and tool executions.
 *
 * Tracing is off until `initializeTracing` is called. The provider is not
 * registered globally, so parents are passed explicitly.
 */

import {
  type Attributes,
  type Span,
  type TextMapSetter,
  type Tracer,
  ROOT_CONTEXT,
  SpanStatusCode,
  trace,
} from '@opentelemetry/api';
import { W3CTraceContextPropagator } from '@opentelemetry/core';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  SimpleSpanProcessor,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ name: 'tracing' });

export { type Span, SpanStatusCode };

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

let _tracerProvider: BasicTracerProvider | undefined;
let _tracer: Tracer | undefined;
let _propagator: W3CTraceContextPropagator | undefined;

const mapSetter: TextMapSetter<Record<string, string>> = {
  set(carrier, key, value) {
    carrier[key] = value;
  },
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface TracingConfig {
  exporter: SpanExporter;
  /** Tracer name (default: AGENT_CORE_OTEL_SERVICE_NAME or 'agent-core') */
  serviceName?: string | undefined;
  /** Batch spans before export (default: true) */
  batch?: boolean | undefined;
}

/**
 * Start exporting spans. A second call is ignored until `shutdownTracing`.
 */
export function initializeTracing(config: TracingConfig): void {
  if (_tracer) return;

  if (process.env['AGENT_CORE_OTEL_ENABLED']?.toLowerCase() === 'false') {
    logger.info('Tracing disabled via AGENT_CORE_OTEL_ENABLED=false');
    return;
  }

  const processor =
    config.batch === false
      ? new SimpleSpanProcessor(config.exporter)
      : new BatchSpanProcessor(config.exporter);
  _tracerProvider = new BasicTracerProvider({ spanProcessors: [processor] });

  const serviceName =
    config.serviceName ?? process.env['AGENT_CORE_OTEL_SERVICE_NAME'] ?? 'agent-core';
  _tracer = _tracerProvider.getTracer(serviceName);
  logger.debug('Tracing initialized', { serviceName });
}

export function getTracer(): Tracer | undefined {
  return _tracer;
}

export function isTracingEnabled(): boolean {
  return _tracer !== undefined;
}

/**
 * Flush pending spans and tear the provider down.
 */
export async function shutdownTracing(): Promise<void> {
  if (!_tracerProvider) return;

  try {
    await _tracerProvider.forceFlush();
    await _tracerProvider.shutdown();
  } catch (e) {
    logger.warn(`Error during tracing shutdown: ${String(e)}`);
  } finally {
    _tracerProvider = undefined;
    _tracer = undefined;
  }
}

/**
 * Run `fn` inside a span. Without tracing, `fn` receives undefined and runs as is.
 * A thrown error marks the span failed and is rethrown.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span | undefined) => Promise<T>,
  parent?: Span | undefined
): Promise<T> {
  const tracer = _tracer;
  if (!tracer) {
    return fn(undefined);
  }

  const parentContext = parent ? trace.setSpan(ROOT_CONTEXT, parent) : ROOT_CONTEXT;
  const span = tracer.startSpan(name, { attributes }, parentContext);
  try {
    const result = await fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof Error) {
      span.recordException(error);
    }
    span.setStatus({ code: SpanStatusCode.ERROR, message });
    throw error;
  } finally {
    span.end();
  }
}

/**
 * W3C traceparent of a span, e.g. for linking a snapshot to its turn.
 */
export function extractTraceparent(span: Span): string | undefined {
  _propagator ??= new W3CTraceContextPropagator();
  const carrier: Record<string, string> = {};
  _propagator.inject(trace.setSpan(ROOT_CONTEXT, span), carrier, mapSetter);
  return carrier['traceparent'];
}
