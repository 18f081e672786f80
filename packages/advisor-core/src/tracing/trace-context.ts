/**
 * Trace Context
 *
 * Each advisor run gets a unique traceId that flows through the
 * supervisor, the worker adapter and every collaborator call, so log
 * lines from concurrent runs can be told apart.
 */

/**
 * Trace context that flows through all operations of one run
 */
export interface TraceContext {
  /** Unique ID for the entire run */
  traceId: string;
  /** Unique ID for the current step/span */
  spanId: string;
  /** Parent span ID for hierarchical tracing */
  parentSpanId?: string;
  /** Start time of this span in milliseconds */
  startTime: number;
  /** Metadata associated with this trace */
  metadata: Record<string, unknown>;
}

// ============================================
// ID Generation
// ============================================

function randomId(length: number = 8): string {
  const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
  let result = '';
  for (let i = 0; i < length; i++) {
    result += chars.charAt(Math.floor(Math.random() * chars.length));
  }
  return result;
}

export function generateTraceId(): string {
  return `trace_${Date.now()}_${randomId(8)}`;
}

export function generateSpanId(): string {
  return `span_${randomId(12)}`;
}

// ============================================
// Trace Context Management
// ============================================

/**
 * Create a new trace context for a run
 */
export function createTraceContext(query: string, metadata?: Record<string, unknown>): TraceContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    startTime: Date.now(),
    metadata: {
      query: query.substring(0, 100),
      ...metadata,
    },
  };
}

/**
 * Create a child span from a parent context
 */
export function createChildSpan(
  parent: TraceContext,
  name: string,
  additionalMetadata?: Record<string, unknown>
): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    startTime: Date.now(),
    metadata: {
      ...parent.metadata,
      spanName: name,
      ...additionalMetadata,
    },
  };
}
