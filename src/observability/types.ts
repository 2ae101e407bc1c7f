/**
 * Observability Types
 *
 * Tracer abstraction over Langfuse v4 (OpenTelemetry-based). NoopTracer
 * when not configured, LangfuseTracer when keys are present. The
 * orchestrator traces a run without knowing which one it has.
 *
 * One pipeline run is one trace:
 *   trace 'analyze'
 *     span 'index'
 *     span 'agent:basic_info'
 *       generation 'query-expansion'
 *       generation 'extract:project_name'
 *     ...
 *
 * Maps to Langfuse v4 SDK:
 *   tracer.trace()        → startObservation(name, attrs)
 *   handle.span()         → parent.startObservation(name, attrs)
 *   handle.generation()   → parent.startObservation(name, attrs, { asType: 'generation' })
 *   handle.update()       → obs.update({ output, metadata, level, statusMessage })
 *   handle.end()          → obs.end()
 *   tracer.flush()        → processor.forceFlush()
 *   tracer.shutdown()     → sdk.shutdown()
 */

// ============================================================================
// Input Options
// ============================================================================

/** Options for creating a new trace (root observation). */
export interface TraceOptions {
  /** Trace name (e.g., 'analyze') */
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
  /** Groups runs of one analysis session */
  sessionId?: string;
}

/** Options for creating a span. */
export interface SpanOptions {
  /** Span name (e.g., 'index', 'agent:scoring') */
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

/** Options for creating a generation (LLM call). */
export interface GenerationOptions {
  /** Generation name (e.g., 'extract:budget_amount') */
  name: string;
  model?: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

/** Data to update a handle with before ending. */
export interface UpdateData {
  output?: unknown;
  metadata?: Record<string, unknown>;
  /** Marks failed observations */
  level?: 'DEFAULT' | 'WARNING' | 'ERROR';
  statusMessage?: string;
}

// ============================================================================
// Handles
// ============================================================================

/**
 * Handle for a generation. Call end() when the LLM call completes.
 */
export interface GenerationHandle {
  update(data: UpdateData): GenerationHandle;
  end(): void;
}

/**
 * Handle for a span. Spans nest: agent spans hold their generations.
 */
export interface SpanHandle {
  span(options: SpanOptions): SpanHandle;
  generation(options: GenerationOptions): GenerationHandle;
  update(data: UpdateData): SpanHandle;
  end(): void;
}

/**
 * Handle for a trace (root observation).
 */
export interface TraceHandle extends SpanHandle {
  /** The trace ID (Langfuse trace ID when remote, undefined for noop) */
  readonly traceId?: string;
}

// ============================================================================
// Core Tracer Interface
// ============================================================================

export interface Tracer {
  /** Create a new trace for a pipeline run */
  trace(options: TraceOptions): TraceHandle;
  /** Flush all pending events to the backend */
  flush(): Promise<void>;
  /** Shut down the tracer (flushes and prevents further events) */
  shutdown(): Promise<void>;
  /** Whether this tracer sends data to a remote service */
  readonly isRemote: boolean;
}
