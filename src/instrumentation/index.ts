import {
  type Attributes,
  type Span,
  SpanKind,
  SpanStatusCode,
  trace,
  type Tracer,
} from '@opentelemetry/api';

import type { Gateway } from '../gateway/create-gateway';

type InstrumentableGateway = {
  addEventListener: Gateway['addEventListener'];
};

export type InstrumentationOptions = {
  tracer?: Tracer;
  tracerName?: string;
  tracerVersion?: string;
};

/**
 * Opens one span per gateway call and ends it when the call completes or fails.
 *
 * @returns A function that removes the listeners and drops any span still open.
 */
export function instrument(
  gateway: InstrumentableGateway,
  options: InstrumentationOptions = {},
): () => void {
  const tracer =
    options.tracer ??
    trace.getTracer(options.tracerName ?? 'motorpool', options.tracerVersion ?? '0.1.0');

  const activeSpans = new Map<string, Span>();
  const subscriptions: (() => void)[] = [];

  subscriptions.push(
    gateway.addEventListener('received', (event) => {
      const { callId, requestId, operation } = event.detail;
      const attributes: Attributes = {
        'gen_ai.system': 'motorpool',
        'gen_ai.tool.name': operation,
        'gen_ai.tool.call.id': callId,
      };
      if (requestId !== undefined) attributes['motorpool.request.id'] = requestId;
      const span = tracer.startSpan(`call ${operation || 'unknown'}`, {
        kind: SpanKind.SERVER,
        attributes,
      });
      activeSpans.set(callId, span);
    }),
  );

  for (const state of ['validating', 'dispatching'] as const) {
    subscriptions.push(
      gateway.addEventListener(state, (event) => {
        activeSpans.get(event.detail.callId)?.addEvent(`call.${state}`);
      }),
    );
  }

  subscriptions.push(
    gateway.addEventListener('completed', (event) => {
      const { callId, durationMs } = event.detail;
      const span = activeSpans.get(callId);
      if (!span) return;
      span.setAttributes({ 'gen_ai.tool.duration_ms': durationMs, 'gen_ai.tool.status': 'success' });
      span.setStatus({ code: SpanStatusCode.OK });
      span.end();
      activeSpans.delete(callId);
    }),
  );

  subscriptions.push(
    gateway.addEventListener('failed', (event) => {
      const { callId, durationMs, error, from } = event.detail;
      const span = activeSpans.get(callId);
      if (!span) return;
      const attributes: Attributes = {
        'gen_ai.tool.duration_ms': durationMs,
        'gen_ai.tool.status': 'error',
        'error.type': error.code,
        'motorpool.call.failed_in': from,
        'motorpool.error.retryable': error.retryable,
      };
      span.setAttributes(attributes);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      span.end();
      activeSpans.delete(callId);
    }),
  );

  return () => {
    subscriptions.forEach((unsubscribe) => unsubscribe());
    activeSpans.clear();
  };
}
