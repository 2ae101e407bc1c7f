/**
 * NoopTracer
 *
 * Used when observability is disabled or Langfuse keys are not configured.
 * Every call returns the same frozen handles.
 */

import type { GenerationHandle, SpanHandle, TraceHandle, Tracer } from './types.js';

const NOOP_GENERATION: GenerationHandle = Object.freeze({
  update: () => NOOP_GENERATION,
  end: () => {},
});

const NOOP_SPAN: SpanHandle = Object.freeze({
  span: () => NOOP_SPAN,
  generation: () => NOOP_GENERATION,
  update: () => NOOP_SPAN,
  end: () => {},
});

const NOOP_TRACE: TraceHandle = NOOP_SPAN;

/**
 * Create a no-operation tracer.
 */
export function createNoopTracer(): Tracer {
  return {
    trace: () => NOOP_TRACE,
    async flush(): Promise<void> {},
    async shutdown(): Promise<void> {},
    isRemote: false,
  };
}
