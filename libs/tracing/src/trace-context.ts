import { randomUUID } from 'crypto';

export interface TraceContext {
  traceId: string;
  spanId: string;
  parentSpanId: string | null;
}

export interface TraceLogFields {
  traceId: string;
  spanId: string;
  parentSpanId: string | null;
}

export function generateTraceId(): string {
  return randomUUID().replace(/-/g, '');
}

export function generateSpanId(): string {
  return generateTraceId().slice(0, 16);
}

/**
 * Starts a new causal chain. Minted once per ZIP per scheduler tick.
 */
export function createRootTrace(): TraceContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    parentSpanId: null,
  };
}

/**
 * Context for a message derived from `parent`: same trace, fresh span,
 * parented on the sender's span.
 */
export function createChildTrace(parent: TraceContext): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
  };
}

export function traceLogFields(trace: TraceContext): TraceLogFields {
  return {
    traceId: trace.traceId,
    spanId: trace.spanId,
    parentSpanId: trace.parentSpanId,
  };
}
