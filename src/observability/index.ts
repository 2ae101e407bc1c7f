/**
 * Observability Module
 *
 * Tracer abstraction for Langfuse v4 (OpenTelemetry-based) observability.
 *
 * @example
 * ```typescript
 * import { createTracer } from '../observability/index.js';
 *
 * const tracer = createTracer(config);
 * const trace = tracer.trace({ name: 'analyze', input: { file } });
 * // ... run the pipeline ...
 * trace.end();
 * await tracer.shutdown();
 * ```
 */

export type {
  Tracer,
  TraceHandle,
  SpanHandle,
  GenerationHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
} from './types.js';

export { createTracer, DEFAULT_LANGFUSE_URL } from './factory.js';
export { createNoopTracer } from './noop-tracer.js';
export { createLangfuseTracer, type LangfuseTracerConfig } from './langfuse-tracer.js';
export { TracedLLM, TracedReranker } from './traced-llm.js';
