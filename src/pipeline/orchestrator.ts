/**
 * Orchestrator
 *
 * Runs one document through the pipeline state machine:
 *
 *   INIT        acquire the namespace (isolated: clear it) and index
 *   INDEXED     dispatch every agent, at most `agentConcurrency` at once
 *   EXTRACTING  wait until all agents settle or the workflow timeout fires
 *   AGGREGATED  merge results into the report
 *   DONE
 *
 * A failure before INDEXED (store down, empty document, timeout) ends the
 * run FAILED with no report. After INDEXED a report is always produced:
 * agents cut off by the timeout are `timed_out` with every field
 * `unavailable`.
 *
 * The timeout aborts one shared AbortSignal. Agents get
 * `cancellationGraceMs` to unwind after it fires; whatever has not
 * settled by then is abandoned.
 */

import { randomUUID } from 'node:crypto';
import { ExtractionAgent, unavailable } from '../agents/extraction-agent.js';
import { loadCatalog } from '../agents/catalog.js';
import { AgentRegistry } from '../agents/registry.js';
import type { AgentSpec, PartialExtractionResult } from '../agents/types.js';
import type { IsolationMode } from '../config/schema.js';
import type { PipelineSettings } from '../config/settings.js';
import { inspectDocument, type LoadedDocument } from '../document/loader.js';
import { EmptyDocumentError, WorkflowTimeoutError } from '../errors/index.js';
import { errorMessage } from '../errors/handler.js';
import { DocumentIndexer, type IndexResult } from '../indexer/indexer.js';
import { NamespaceManager, type NamespaceHandle } from '../namespace/manager.js';
import { createNoopTracer } from '../observability/noop-tracer.js';
import { TracedLLM, TracedReranker } from '../observability/traced-llm.js';
import type { SpanHandle, TraceHandle, Tracer } from '../observability/types.js';
import { retryPolicyFromSettings, withRetries } from '../providers/retry.js';
import type { ProviderSet } from '../providers/types.js';
import { RetrievalPlanner } from '../retrieval/planner.js';
import type { VectorStore } from '../store/types.js';
import { OperationCancelledError, raceAbort } from '../utils/async.js';
import { Semaphore } from '../utils/concurrency.js';
import { scopedLogger, silentLogger, type Logger } from '../utils/logger.js';
import { aggregate, type AggregatedReport } from './aggregator.js';
import { PipelineStateMachine, type PipelineState, type Transition } from './state-machine.js';

// ============================================================================
// TYPES
// ============================================================================

export interface PipelineDeps {
  providers: ProviderSet;
  store: VectorStore;
  /** Defaults to the bundled catalogue */
  agents?: AgentRegistry | readonly AgentSpec[];
  tracer?: Tracer;
  logger?: Logger;
}

export type PipelineEvent =
  | { type: 'state'; transition: Transition }
  | { type: 'indexing'; embedded: number; total: number }
  | { type: 'agent'; agent: string; status: PartialExtractionResult['status'] };

export interface RunOptions {
  /** Defaults to a random UUID */
  sessionId?: string;
  /** Defaults to the session id */
  namespaceId?: string;
  /** Defaults to settings.isolationMode */
  mode?: IsolationMode;
  /** Overrides settings.workflowTimeout */
  timeoutMs?: number;
  signal?: AbortSignal;
  onEvent?: (event: PipelineEvent) => void;
}

interface OutcomeBase {
  sessionId: string;
  history: readonly Transition[];
  durationMs: number;
}

export type PipelineOutcome =
  | (OutcomeBase & { status: 'done'; report: Readonly<AggregatedReport> })
  | (OutcomeBase & { status: 'failed'; error: Error; failedIn: PipelineState });

export const TIMEOUT_REASON = 'workflow timeout';

// ============================================================================
// PIPELINE
// ============================================================================

export class ExtractionPipeline {
  private readonly namespaces: NamespaceManager;
  private readonly providers: ProviderSet;
  private readonly registry: AgentRegistry;
  private readonly tracer: Tracer;
  private readonly logger: Logger;

  constructor(
    deps: PipelineDeps,
    private readonly settings: PipelineSettings
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.tracer = deps.tracer ?? createNoopTracer();
    this.providers = withRetries(
      deps.providers,
      retryPolicyFromSettings(settings),
      scopedLogger(this.logger, 'retry')
    );
    this.namespaces = new NamespaceManager(deps.store, { logger: this.logger });
    this.registry =
      deps.agents instanceof AgentRegistry
        ? deps.agents
        : new AgentRegistry(deps.agents ?? loadCatalog());
  }

  get agents(): readonly AgentSpec[] {
    return this.registry.list();
  }

  /**
   * Run the pipeline over one document. Never rejects: failures are
   * reported through the `failed` outcome.
   */
  async run(document: LoadedDocument, options: RunOptions = {}): Promise<PipelineOutcome> {
    const startedAt = Date.now();
    const sessionId = options.sessionId ?? randomUUID();
    const namespaceId = options.namespaceId ?? sessionId;
    const mode = options.mode ?? this.settings.isolationMode;
    const timeoutMs = options.timeoutMs ?? this.settings.workflowTimeout;

    const machine = new PipelineStateMachine((transition) => {
      this.logger.debug?.(`[pipeline] ${transition.from} → ${transition.to} (+${transition.at}ms)`);
      options.onEvent?.({ type: 'state', transition });
    });

    const controller = new AbortController();
    const timeoutError = new WorkflowTimeoutError(timeoutMs);
    const timer = setTimeout(() => controller.abort(timeoutError), timeoutMs);
    const onExternalAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }
    const signal = controller.signal;

    const trace = this.tracer.trace({
      name: 'analyze',
      input: { documentId: document.documentId, source: document.source, mode, namespaceId },
      sessionId,
    });

    const lease: { handle?: NamespaceHandle } = {};
    const base = (): OutcomeBase => ({
      sessionId,
      history: [...machine.history],
      durationMs: Date.now() - startedAt,
    });

    try {
      let active: NamespaceHandle;
      let indexed: IndexResult;
      try {
        if (document.text.trim().length === 0) {
          throw new EmptyDocumentError(document.source);
        }
        const span = trace.span({ name: 'index', input: { namespaceId, mode } });
        ({ handle: active, indexed } = await this.traced(span, async () => {
          const handle = await raceAbort(
            this.namespaces.acquire(sessionId, mode, namespaceId),
            signal
          );
          lease.handle = handle;
          const indexer = new DocumentIndexer(this.providers.embedder, this.settings, {
            logger: scopedLogger(this.logger, 'indexer'),
            onProgress: (p) => options.onEvent?.({ type: 'indexing', ...p }),
          });
          return { handle, indexed: await raceAbort(indexer.index(document, handle, signal), signal) };
        }, (r) => r.indexed));
        machine.transition('INDEXED');
      } catch (error) {
        const cause = failureCause(error, signal, timeoutError);
        const failedIn = machine.state;
        machine.transition('FAILED');
        this.logger.warn(`Pipeline failed: ${cause.message}`);
        trace.update({ level: 'ERROR', statusMessage: cause.message });
        return { ...base(), status: 'failed', error: cause, failedIn };
      }

      machine.transition('EXTRACTING');
      const results = await this.extract(active, signal, trace, options);

      const notes = [...inspectDocument(document.text)];
      if (indexed.skipped > 0) {
        notes.push(`${indexed.skipped}个文本块向量化失败，已跳过`);
      }
      const cutOff = results.filter((r) => r.status === 'timed_out').map((r) => r.agent);
      if (cutOff.length > 0) {
        notes.push(`处理超时，以下模块未完成：${cutOff.join('、')}`);
      }

      machine.transition('AGGREGATED');
      const report = aggregate({
        documentId: document.documentId,
        namespaceId,
        source: document.source,
        agents: this.registry.list(),
        results,
        notes,
      });
      machine.transition('DONE');

      trace.update({ output: { manifest: report.manifest, summary: report.summary } });
      return { ...base(), status: 'done', report };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
      if (lease.handle) {
        this.namespaces.release(lease.handle);
      }
      trace.end();
    }
  }

  /**
   * Dispatch every agent and wait at the barrier. Agents that did not
   * return in time come back as `timed_out`; agents that crashed are left
   * out for the aggregator to mark.
   */
  private async extract(
    handle: NamespaceHandle,
    signal: AbortSignal,
    trace: TraceHandle,
    options: RunOptions
  ): Promise<PartialExtractionResult[]> {
    const semaphore = new Semaphore(Math.max(1, this.settings.agentConcurrency));
    const returned = new Map<string, PartialExtractionResult>();
    const specs = this.registry.list();

    const tasks = specs.map((spec) =>
      semaphore.run(async () => {
        if (signal.aborted) {
          throw new OperationCancelledError(signal.reason);
        }
        const span = trace.span({ name: `agent:${spec.name}`, metadata: { fields: spec.fields.length } });
        const result = await this.traced(
          span,
          () => this.createAgent(spec, span).run(handle, signal),
          (r) => ({ status: r.status, unavailable: r.fields.filter((f) => f.status === 'unavailable').length })
        );
        returned.set(spec.name, result);
        options.onEvent?.({ type: 'agent', agent: spec.name, status: result.status });
        return result;
      })
    );

    const settled = Promise.allSettled(tasks);
    const grace = afterAbort(signal, this.settings.cancellationGraceMs);
    const outcomes = await Promise.race([settled, grace.promise]);
    grace.cancel();

    if (outcomes) {
      outcomes.forEach((outcome, i) => {
        const spec = specs[i];
        if (outcome.status === 'rejected' && spec && !(outcome.reason instanceof OperationCancelledError)) {
          this.logger.warn(`Agent "${spec.name}" crashed: ${errorMessage(outcome.reason)}`);
        }
      });
    }

    const snapshot = new Map(returned);
    const results: PartialExtractionResult[] = [];
    for (const spec of specs) {
      const result = snapshot.get(spec.name);
      if (result) {
        results.push(result);
      } else if (signal.aborted) {
        const reason = signal.reason instanceof WorkflowTimeoutError ? TIMEOUT_REASON : 'cancelled';
        results.push({
          agent: spec.name,
          status: 'timed_out',
          fields: spec.fields.map((f) => unavailable(f, reason)),
          error: errorMessage(signal.reason),
        });
        options.onEvent?.({ type: 'agent', agent: spec.name, status: 'timed_out' });
      }
    }
    return results;
  }

  private createAgent(spec: AgentSpec, span: SpanHandle): ExtractionAgent {
    const logger = scopedLogger(this.logger, spec.name);
    const llm = new TracedLLM(this.providers.llm, span);
    const reranker = this.providers.reranker ? new TracedReranker(this.providers.reranker, span) : null;
    const planner = new RetrievalPlanner(
      { llm, embedder: this.providers.embedder, reranker },
      this.settings,
      { logger }
    );
    return new ExtractionAgent(spec, { planner, llm }, this.settings, { logger });
  }

  /**
   * Run `fn` inside a span: failures mark it ERROR, the span always ends.
   */
  private async traced<T>(
    span: SpanHandle,
    fn: () => Promise<T>,
    summarize: (result: T) => unknown
  ): Promise<T> {
    try {
      const result = await fn();
      span.update({ output: summarize(result) });
      return result;
    } catch (error) {
      span.update({ level: 'ERROR', statusMessage: errorMessage(error) });
      throw error;
    } finally {
      span.end();
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Resolves with undefined `graceMs` after the signal aborts.
 */
function afterAbort(
  signal: AbortSignal,
  graceMs: number
): { promise: Promise<undefined>; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const promise = new Promise<undefined>((resolve) => {
    const arm = (): void => {
      timer = setTimeout(() => resolve(undefined), graceMs);
    };
    if (signal.aborted) {
      arm();
    } else {
      onAbort = arm;
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  return {
    promise,
    cancel: () => {
      clearTimeout(timer);
      if (onAbort) signal.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * The error to report for a failed run. A fired timeout wins over
 * whatever the interrupted step threw.
 */
function failureCause(error: unknown, signal: AbortSignal, timeoutError: WorkflowTimeoutError): Error {
  if (signal.aborted && signal.reason === timeoutError) {
    return timeoutError;
  }
  if (error instanceof OperationCancelledError && error.reason instanceof Error) {
    return error.reason;
  }
  return error instanceof Error ? error : new Error(String(error));
}
