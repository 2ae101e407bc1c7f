/**
 * ExtractionPipeline tests
 *
 * End-to-end runs over the in-memory store with the hashing embedder and
 * a scripted model. Nothing leaves the process.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ExtractionPipeline, TIMEOUT_REASON, type PipelineEvent, type PipelineOutcome } from '../orchestrator.js';
import type { AggregatedReport } from '../aggregator.js';
import { loadCatalog } from '../../agents/catalog.js';
import { NOT_FOUND_VALUE, type AgentSpec } from '../../agents/types.js';
import { createPipelineSettings, type PipelineSettings } from '../../config/settings.js';
import { createDocument, type LoadedDocument } from '../../document/loader.js';
import { EmptyDocumentError, TransientProviderError, WorkflowTimeoutError } from '../../errors/index.js';
import type {
  GenerationHandle,
  GenerationOptions,
  SpanHandle,
  SpanOptions,
  TraceHandle,
  TraceOptions,
  Tracer,
  UpdateData,
} from '../../observability/types.js';
import type { EmbeddingProvider, RerankerProvider } from '../../providers/types.js';
import { InMemoryVectorStore } from '../../store/memory-store.js';
import { FakeReranker, HashingEmbedder, ScriptedLLM, type Script } from '../../test-utils/fakes.js';
import { OperationCancelledError } from '../../utils/async.js';

// ============================================================================
// FIXTURES
// ============================================================================

const TENDER = [
  '某市政务云平台建设项目招标公告',
  '项目名称：某市政务云平台建设项目',
  '招标编号：ZB-2024-001',
  '预算金额：人民币500万元整',
  '投标截止时间：2024年3月15日9时30分',
  '付款方式：合同签订后支付30%，验收合格后支付70%',
].join('\n');

const AGENTS: AgentSpec[] = [
  {
    name: 'basic',
    title: '基础信息',
    fields: [
      { name: 'budget_amount', label: '预算金额', query: '预算金额', alternates: [], hint: '预算金额' },
      { name: 'project_name', label: '项目名称', query: '项目名称', alternates: [], hint: '项目名称' },
    ],
  },
  {
    name: 'terms',
    title: '其他条款',
    fields: [{ name: 'payment_terms', label: '付款方式', query: '付款方式', alternates: [], hint: '付款条件' }],
  },
];

const BUDGET_QUOTE = '预算金额：人民币500万元整';

const answerBudget: Script = (call) =>
  call.metadata.field === 'budget_amount'
    ? { found: true, value: '人民币500万元整', evidence: 1, quote: BUDGET_QUOTE, confidence: 0.95 }
    : { found: false, value: NOT_FOUND_VALUE };

/** Never answers; rejects once the request signal aborts */
const waitForAbort: Script = (call) =>
  new Promise((_resolve, reject) => {
    call.signal?.addEventListener('abort', () => reject(new OperationCancelledError(call.signal?.reason)), {
      once: true,
    });
  });

/** Never answers and ignores the request signal */
const hang: Script = () => new Promise(() => {});

/** Slack for timer scheduling on a busy machine */
const SCHEDULING_SLACK_MS = 250;

function reportOf(outcome: PipelineOutcome): Readonly<AggregatedReport> {
  if (outcome.status !== 'done') {
    throw new Error(`Expected a report, pipeline failed: ${outcome.error.message}`);
  }
  return outcome.report;
}

function failureOf(outcome: PipelineOutcome): Extract<PipelineOutcome, { status: 'failed' }> {
  if (outcome.status !== 'failed') {
    throw new Error('Expected the pipeline to fail');
  }
  return outcome;
}

// ============================================================================
// TRACER SPY
// ============================================================================

class RecordingGeneration implements GenerationHandle {
  constructor(
    private readonly name: string,
    private readonly log: string[]
  ) {}

  update(data: UpdateData): GenerationHandle {
    if (data.level === 'ERROR') this.log.push(`error:${this.name}`);
    return this;
  }

  end(): void {
    this.log.push(`end:${this.name}`);
  }
}

class RecordingSpan implements TraceHandle {
  constructor(
    private readonly name: string,
    private readonly log: string[]
  ) {}

  span(options: SpanOptions): SpanHandle {
    this.log.push(`span:${options.name}`);
    return new RecordingSpan(options.name, this.log);
  }

  generation(options: GenerationOptions): GenerationHandle {
    this.log.push(`generation:${options.name}`);
    return new RecordingGeneration(options.name, this.log);
  }

  update(data: UpdateData): SpanHandle {
    if (data.level === 'ERROR') this.log.push(`error:${this.name}`);
    return this;
  }

  end(): void {
    this.log.push(`end:${this.name}`);
  }
}

class RecordingTracer implements Tracer {
  readonly isRemote = false;
  readonly log: string[] = [];
  readonly traces: TraceOptions[] = [];

  trace(options: TraceOptions): TraceHandle {
    this.traces.push(options);
    this.log.push(`trace:${options.name}`);
    return new RecordingSpan(options.name, this.log);
  }

  async flush(): Promise<void> {}
  async shutdown(): Promise<void> {}
}

// ============================================================================
// TESTS
// ============================================================================

describe('ExtractionPipeline', () => {
  let store: InMemoryVectorStore;
  let embedder: HashingEmbedder;

  beforeEach(() => {
    store = new InMemoryVectorStore();
    embedder = new HashingEmbedder();
  });

  function createPipeline(
    script: Script,
    options: {
      agents?: AgentSpec[];
      tracer?: Tracer;
      embedder?: EmbeddingProvider;
      reranker?: RerankerProvider;
      timeout?: number;
      settings?: Partial<PipelineSettings>;
    } = {}
  ) {
    const llm = new ScriptedLLM(script);
    const settings = createPipelineSettings({
      similarityThreshold: 0,
      enableReranking: options.reranker !== undefined,
      workflowTimeout: options.timeout ?? 5000,
      cancellationGraceMs: 20,
      retryBaseDelayMs: 0,
      retryMaxDelayMs: 0,
      ...options.settings,
    });
    const pipeline = new ExtractionPipeline(
      {
        providers: { llm, embedder: options.embedder ?? embedder, reranker: options.reranker ?? null },
        store,
        agents: options.agents ?? AGENTS,
        tracer: options.tracer,
      },
      settings
    );
    return { pipeline, llm };
  }

  it('extracts the budget with a citation back into the document', async () => {
    const { pipeline } = createPipeline(answerBudget, { agents: loadCatalog() });
    const document = createDocument(TENDER, 'tender.txt');

    const report = reportOf(await pipeline.run(document, { namespaceId: 'tender' }));

    expect(report.sections.map((s) => s.title)).toEqual(['基础信息', '评分标准', '其他条款']);
    expect(report.summary).toEqual({ total: 29, found: 1, notFound: 28, unavailable: 0 });
    expect(Object.values(report.manifest)).toEqual(['succeeded', 'succeeded', 'succeeded']);

    const budget = report.sections[0]?.fields.find((f) => f.name === 'budget_amount');
    expect(budget?.value).toBe('人民币500万元整');
    expect(budget?.confidence).toBe(0.95);
    const span = budget?.citation?.span;
    expect(span).toEqual({ start: TENDER.indexOf(BUDGET_QUOTE), end: TENDER.indexOf(BUDGET_QUOTE) + 14 });
    expect(document.text.slice(span?.start, span?.end)).toBe(BUDGET_QUOTE);
    expect(report.source).toBe('tender.txt');
  });

  it('walks INIT to DONE and reports every agent', async () => {
    const { pipeline } = createPipeline(answerBudget);
    const events: PipelineEvent[] = [];

    const outcome = await pipeline.run(createDocument(TENDER), { onEvent: (e) => events.push(e) });

    expect(outcome.history.map((t) => t.to)).toEqual(['INDEXED', 'EXTRACTING', 'AGGREGATED', 'DONE']);
    expect(events.filter((e) => e.type === 'state')).toHaveLength(4);
    expect(events.filter((e) => e.type === 'indexing')).toEqual([{ type: 'indexing', embedded: 1, total: 1 }]);
    expect(
      events
        .flatMap((e) => (e.type === 'agent' ? [`${e.agent}:${e.status}`] : []))
        .sort()
    ).toEqual(['basic:succeeded', 'terms:succeeded']);
  });

  it('uses the session id as namespace by default', async () => {
    const { pipeline } = createPipeline(answerBudget);

    const report = reportOf(await pipeline.run(createDocument(TENDER), { sessionId: 'session-42' }));

    expect(report.namespaceId).toBe('session-42');
    expect(await store.count('session-42')).toBe(1);
  });

  describe('isolation', () => {
    const first = createDocument(`${TENDER}\n第一次`);
    const second = createDocument(`${TENDER}\n第二次`);

    it('isolated mode clears the namespace before indexing', async () => {
      const { pipeline } = createPipeline(answerBudget);

      await pipeline.run(first, { namespaceId: 'shared', mode: 'isolated' });
      await pipeline.run(second, { namespaceId: 'shared', mode: 'isolated' });

      expect(await store.count('shared')).toBe(1);
      const hits = await store.query('shared', await embedder.embed([TENDER]).then(([v]) => v ?? []), 10);
      expect(hits.map((h) => h.documentId)).toEqual([second.documentId]);
    });

    it('cumulative mode keeps earlier documents', async () => {
      const { pipeline } = createPipeline(answerBudget);

      await pipeline.run(first, { namespaceId: 'shared', mode: 'cumulative' });
      await pipeline.run(second, { namespaceId: 'shared', mode: 'cumulative' });

      expect(await store.count('shared')).toBe(2);
    });

    it('re-running the same document in cumulative mode is idempotent', async () => {
      const { pipeline } = createPipeline(answerBudget);

      const a = reportOf(await pipeline.run(first, { namespaceId: 'shared', mode: 'cumulative' }));
      const b = reportOf(await pipeline.run(first, { namespaceId: 'shared', mode: 'cumulative' }));

      expect(await store.count('shared')).toBe(1);
      expect(b).toEqual(a);
    });

    it('re-running the same document in isolated mode is idempotent', async () => {
      const { pipeline } = createPipeline(answerBudget);

      const a = reportOf(await pipeline.run(first, { namespaceId: 'shared', mode: 'isolated' }));
      const b = reportOf(await pipeline.run(first, { namespaceId: 'shared', mode: 'isolated' }));

      expect(await store.count('shared')).toBe(1);
      expect(b).toEqual(a);
    });
  });

  describe('retries', () => {
    /** Fails the first budget extraction with a transient error */
    function flakyBudget(): Script {
      let failed = false;
      return (call) => {
        if (call.metadata.field === 'budget_amount' && !failed) {
          failed = true;
          throw new TransientProviderError('scripted', '503');
        }
        return answerBudget(call);
      };
    }

    it('retries a transient provider failure', async () => {
      const { pipeline, llm } = createPipeline(flakyBudget(), { settings: { perCallMaxRetries: 3 } });

      const report = reportOf(await pipeline.run(createDocument(TENDER)));

      expect(report.sections[0]?.fields[0]).toMatchObject({ name: 'budget_amount', status: 'found' });
      expect(llm.callsWhere('field', 'budget_amount')).toHaveLength(2);
    });

    it('gives up after perCallMaxRetries', async () => {
      const { pipeline, llm } = createPipeline(flakyBudget(), { settings: { perCallMaxRetries: 0 } });

      const report = reportOf(await pipeline.run(createDocument(TENDER)));

      expect(report.sections[0]?.fields[0]).toMatchObject({
        name: 'budget_amount',
        status: 'unavailable',
        reason: 'scripted: 503',
      });
      expect(llm.callsWhere('field', 'budget_amount')).toHaveLength(1);
    });
  });

  it('reports an agent whose fields all failed without failing the run', async () => {
    const { pipeline } = createPipeline((call) =>
      call.metadata.agent === 'terms' ? { nonsense: true } : answerBudget(call)
    );

    const report = reportOf(await pipeline.run(createDocument(TENDER)));

    expect(report.manifest).toEqual({ basic: 'succeeded', terms: 'failed' });
    expect(report.sections[1]?.fields[0]).toMatchObject({
      status: 'unavailable',
      reason: 'scripted: extract:payment_terms: malformed output',
    });
    expect(report.sections[0]?.fields[0]?.status).toBe('found');
  });

  it('fails an empty document in INIT without calling any provider', async () => {
    const { pipeline, llm } = createPipeline(answerBudget);
    await pipeline.run(createDocument(TENDER), { namespaceId: 'keep', mode: 'cumulative' });
    embedder.calls.length = 0;
    llm.calls.length = 0;
    const blank: LoadedDocument = { documentId: 'blank', text: ' \n\t ', pageOffsets: [0] };

    const failure = failureOf(await pipeline.run(blank, { namespaceId: 'keep', mode: 'isolated' }));

    expect(failure.error).toBeInstanceOf(EmptyDocumentError);
    expect(failure.failedIn).toBe('INIT');
    expect(failure.history.map((t) => t.to)).toEqual(['FAILED']);
    expect(embedder.calls).toHaveLength(0);
    expect(llm.calls).toHaveLength(0);
    expect(await store.count('keep')).toBe(1);
  });

  it('fails with WorkflowTimeoutError when indexing outlasts the timeout', async () => {
    const stalled: EmbeddingProvider = {
      name: 'stalled',
      model: 'stalled',
      embed: () => new Promise<number[][]>(() => {}),
    };
    const { pipeline } = createPipeline(answerBudget, { embedder: stalled, timeout: 30 });

    const failure = failureOf(await pipeline.run(createDocument(TENDER)));

    expect(failure.error).toBeInstanceOf(WorkflowTimeoutError);
    expect(failure.error.message).toBe('Workflow timed out after 30ms');
    expect(failure.failedIn).toBe('INIT');
  });

  it('still reports when the timeout fires during extraction', async () => {
    const { pipeline } = createPipeline(waitForAbort, { timeout: 50 });

    const report = reportOf(await pipeline.run(createDocument(TENDER)));

    expect(report.manifest).toEqual({ basic: 'timed_out', terms: 'timed_out' });
    expect(report.summary).toEqual({ total: 3, found: 0, notFound: 0, unavailable: 3 });
    expect(report.sections.flatMap((s) => s.fields.map((f) => f.reason))).toEqual([
      TIMEOUT_REASON,
      TIMEOUT_REASON,
      TIMEOUT_REASON,
    ]);
    expect(report.notes).toContain('处理超时，以下模块未完成：basic、terms');
  });

  it('finishes within the timeout plus the cancellation grace', async () => {
    const { pipeline } = createPipeline(waitForAbort, { timeout: 50 });

    const outcome = await pipeline.run(createDocument(TENDER));

    expect(outcome.status).toBe('done');
    expect(outcome.durationMs).toBeLessThan(50 + 20 + SCHEDULING_SLACK_MS);
  });

  it('abandons agents whose provider ignores cancellation', async () => {
    const { pipeline } = createPipeline(hang, { timeout: 50 });

    const outcome = await pipeline.run(createDocument(TENDER));
    const report = reportOf(outcome);

    expect(report.manifest).toEqual({ basic: 'timed_out', terms: 'timed_out' });
    expect(report.summary).toEqual({ total: 3, found: 0, notFound: 0, unavailable: 3 });
    expect(outcome.history.map((t) => t.to)).toEqual(['INDEXED', 'EXTRACTING', 'AGGREGATED', 'DONE']);
    expect(outcome.durationMs).toBeLessThan(50 + 20 + SCHEDULING_SLACK_MS);
  });

  it('fails before indexing when the caller has already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stopped by user'));
    const { pipeline } = createPipeline(answerBudget);

    const failure = failureOf(await pipeline.run(createDocument(TENDER), { signal: controller.signal }));

    expect(failure.error.message).toBe('stopped by user');
    expect(embedder.calls).toHaveLength(0);
  });

  it('traces the run as one trace with a span per stage and agent', async () => {
    const tracer = new RecordingTracer();
    const { pipeline } = createPipeline(answerBudget, { tracer });

    await pipeline.run(createDocument(TENDER), { sessionId: 'session-7' });

    expect(tracer.traces).toHaveLength(1);
    expect(tracer.traces[0]?.name).toBe('analyze');
    expect(tracer.traces[0]?.sessionId).toBe('session-7');
    expect(tracer.log[0]).toBe('trace:analyze');
    expect(tracer.log.at(-1)).toBe('end:analyze');
    expect(tracer.log).toEqual(
      expect.arrayContaining([
        'span:index',
        'end:index',
        'span:agent:basic',
        'span:agent:terms',
        'generation:extract:budget_amount',
        'generation:extract:project_name',
        'generation:extract:payment_terms',
      ])
    );
    expect(tracer.log.filter((l) => l.startsWith('error:'))).toEqual([]);
  });

  it('traces reranking under the agent span', async () => {
    const tracer = new RecordingTracer();
    const reranker = new FakeReranker();
    const { pipeline } = createPipeline(answerBudget, { tracer, reranker });

    await pipeline.run(createDocument(TENDER));

    expect(reranker.calls).toHaveLength(3);
    expect(tracer.log.filter((l) => l === 'span:rerank')).toHaveLength(3);
    expect(tracer.log.filter((l) => l === 'end:rerank')).toHaveLength(3);
  });

  it('rejects a catalogue with a field owned twice', () => {
    const first = AGENTS[0];
    if (!first) throw new Error('fixture');

    expect(() => createPipeline(answerBudget, { agents: [...AGENTS, { ...first, name: 'copy' }] })).toThrow(
      'Field "budget_amount" of agent "copy" is already owned by "basic"'
    );
  });
});
