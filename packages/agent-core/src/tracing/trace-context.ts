/**
 * Trace Context
 *
 * A research session is one trace. The first turn opens the root span;
 * every follow-up turn and every resume opens a child span on the same
 * traceId, so a suspended conversation can be followed end to end.
 */

export type SpanName = 'session' | 'turn' | 'resume';

export interface TraceContext {
  /** Stable for the whole session; doubles as the session id */
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: SpanName;
  /** Epoch milliseconds */
  startTime: number;
  metadata: Record<string, unknown>;
}

const ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

function randomSuffix(length: number): string {
  return Array.from({ length }, () => ID_ALPHABET[Math.floor(Math.random() * ID_ALPHABET.length)]).join('');
}

/** `trace_<epoch ms>_<8 chars>` */
export function generateTraceId(): string {
  return `trace_${Date.now()}_${randomSuffix(8)}`;
}

/** `span_<12 chars>` */
export function generateSpanId(): string {
  return `span_${randomSuffix(12)}`;
}

/**
 * Root span for a new session
 */
export function createTraceContext(firstMessage: string, metadata: Record<string, unknown> = {}): TraceContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    name: 'session',
    startTime: Date.now(),
    metadata: { firstMessage: firstMessage.slice(0, 100), ...metadata },
  };
}

/**
 * Child span on the parent's trace. Metadata is inherited and extended.
 */
export function createChildSpan(
  parent: TraceContext,
  name: SpanName,
  metadata: Record<string, unknown> = {}
): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    name,
    startTime: Date.now(),
    metadata: { ...parent.metadata, ...metadata },
  };
}

export function formatTraceContext(context: TraceContext): string {
  const fields = [`traceId=${context.traceId}`, `spanId=${context.spanId}`];
  if (context.parentSpanId) fields.push(`parentSpanId=${context.parentSpanId}`);
  return fields.join(' ');
}
