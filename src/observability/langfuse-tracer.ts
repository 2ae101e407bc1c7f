/**
 * LangfuseTracer: Langfuse v4 (OpenTelemetry-based) implementation.
 *
 * Initializes an OpenTelemetry NodeSDK with a LangfuseSpanProcessor that
 * exports spans to Langfuse. Uses the handle-based startObservation() API
 * from @langfuse/tracing, since pipeline spans outlive any single callback.
 *
 * Lifecycle:
 *   createLangfuseTracer(config) → Tracer
 *     tracer.trace() → root observation
 *       handle.span() → child span (nestable)
 *       handle.generation() → child generation
 *     tracer.flush() → processor.forceFlush()
 *     tracer.shutdown() → sdk.shutdown() (flushes + closes)
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { startObservation } from '@langfuse/tracing';
import type {
  Tracer,
  TraceHandle,
  SpanHandle,
  GenerationHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
} from './types.js';

// ============================================================================
// Config
// ============================================================================

export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

type Observation = ReturnType<typeof startObservation>;

// ============================================================================
// Handle wrappers
// ============================================================================

function toAttributes(data: UpdateData) {
  return {
    output: data.output,
    metadata: data.metadata,
    ...(data.level && { level: data.level }),
    ...(data.statusMessage && { statusMessage: data.statusMessage }),
  };
}

function wrapGeneration(obs: Observation): GenerationHandle {
  return {
    update(data: UpdateData): GenerationHandle {
      obs.update(toAttributes(data));
      return this;
    },
    end(): void {
      obs.end();
    },
  };
}

function wrapSpan(obs: Observation): SpanHandle {
  return {
    span(options: SpanOptions): SpanHandle {
      return wrapSpan(
        obs.startObservation(options.name, {
          input: options.input,
          metadata: options.metadata,
        })
      );
    },
    generation(options: GenerationOptions): GenerationHandle {
      return wrapGeneration(
        obs.startObservation(
          options.name,
          {
            model: options.model,
            input: options.input,
            metadata: options.metadata,
          },
          { asType: 'generation' }
        )
      );
    },
    update(data: UpdateData): SpanHandle {
      obs.update(toAttributes(data));
      return this;
    },
    end(): void {
      obs.end();
    },
  };
}

// ============================================================================
// LangfuseTracer factory
// ============================================================================

/**
 * Create a Langfuse-backed tracer. The SDK starts here and must be shut
 * down before the process exits.
 */
export function createLangfuseTracer(config: LangfuseTracerConfig): Tracer {
  const processor = new LangfuseSpanProcessor({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });

  const sdk = new NodeSDK({
    spanProcessors: [processor],
  });

  sdk.start();

  return {
    trace(options: TraceOptions): TraceHandle {
      const obs = startObservation(options.name, {
        input: options.input,
        metadata: options.metadata,
      });

      // sessionId is a trace-level attribute in Langfuse v4
      if (options.sessionId) {
        obs.updateTrace({ sessionId: options.sessionId });
      }

      return { ...wrapSpan(obs), traceId: obs.traceId };
    },

    async flush(): Promise<void> {
      await processor.forceFlush();
    },

    async shutdown(): Promise<void> {
      await sdk.shutdown();
    },

    isRemote: true,
  };
}
