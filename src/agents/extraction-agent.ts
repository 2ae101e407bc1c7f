/**
 * Extraction Agent
 *
 * Extracts every field of one AgentSpec from a namespace. Per field:
 *
 * 1. Retrieve evidence through the agent's RetrievalPlanner
 * 2. No evidence: `not_found`, no LLM call
 * 3. One structured completion over the evidence
 * 4. Resolve the cited passage and quote into a document span
 *
 * A field that fails becomes `unavailable` and the others carry on.
 * A permanent provider error (bad key, unknown model) stops the agent:
 * fields not yet started are marked `unavailable` without further calls.
 * Cancellation propagates to the caller.
 */

import type { PipelineSettings } from '../config/settings.js';
import {
  AgentTotalFailure,
  FieldExtractionFailure,
  PermanentProviderError,
} from '../errors/index.js';
import { errorMessage } from '../errors/handler.js';
import type { NamespaceHandle } from '../namespace/manager.js';
import type { LLMProvider } from '../providers/types.js';
import type { RetrievalHit, RetrievalPlanner } from '../retrieval/planner.js';
import { checkCancelled, OperationCancelledError } from '../utils/async.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildExtractionPrompt, FieldOutputSchema, type FieldOutput } from './prompts.js';
import {
  NOT_FOUND_VALUE,
  type AgentSpec,
  type AgentStatus,
  type Citation,
  type ExtractionField,
  type FieldSpec,
  type PartialExtractionResult,
} from './types.js';

export type AgentSettings = Pick<PipelineSettings, 'fieldConcurrency'>;

export interface ExtractionAgentDeps {
  planner: RetrievalPlanner;
  llm: LLMProvider;
}

export interface ExtractionAgentOptions {
  logger?: Logger;
}

/** Longest excerpt kept on a citation */
const MAX_EXCERPT_CHARS = 200;

export class ExtractionAgent {
  private readonly logger: Logger;

  constructor(
    readonly spec: AgentSpec,
    private readonly deps: ExtractionAgentDeps,
    private readonly settings: AgentSettings,
    options: ExtractionAgentOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get name(): string {
    return this.spec.name;
  }

  /**
   * Extract all fields. Resolves with a result for every outcome except
   * cancellation, which rejects with OperationCancelledError.
   */
  async run(handle: NamespaceHandle, signal?: AbortSignal): Promise<PartialExtractionResult> {
    let halted: PermanentProviderError | undefined;

    const settled = await mapWithConcurrency(
      this.spec.fields,
      this.settings.fieldConcurrency,
      async (field): Promise<ExtractionField> => {
        checkCancelled(signal);
        if (halted) {
          return unavailable(field, `skipped: ${halted.message}`);
        }

        try {
          return await this.extractField(handle, field, signal);
        } catch (error) {
          if (error instanceof OperationCancelledError || signal?.aborted) {
            throw error;
          }
          if (error instanceof PermanentProviderError) {
            halted ??= error;
          }
          const failure = new FieldExtractionFailure(field.name, errorMessage(error), error);
          this.logger.warn(failure.message);
          return unavailable(field, errorMessage(error));
        }
      }
    );

    const fields: ExtractionField[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      fields.push(outcome.value);
    }

    return this.summarize(fields);
  }

  private summarize(fields: ExtractionField[]): PartialExtractionResult {
    const failed = fields.filter((f) => f.status === 'unavailable');
    let status: AgentStatus = 'succeeded';
    let error: string | undefined;

    if (failed.length === fields.length) {
      status = 'failed';
      error = new AgentTotalFailure(
        this.name,
        failed.map((f) => new FieldExtractionFailure(f.name, f.reason ?? 'unknown'))
      ).message;
      this.logger.warn(error);
    } else if (failed.length > 0) {
      status = 'partial';
    }

    const found = fields.filter((f) => f.status === 'found').length;
    this.logger.debug?.(`${found}/${fields.length} fields found, ${failed.length} unavailable`);

    return { agent: this.name, status, fields, ...(error !== undefined && { error }) };
  }

  private async extractField(
    handle: NamespaceHandle,
    field: FieldSpec,
    signal?: AbortSignal
  ): Promise<ExtractionField> {
    const { hits } = await this.deps.planner.retrieve(
      handle,
      { field: field.name, query: field.query, alternates: field.alternates },
      signal
    );

    if (hits.length === 0) {
      return notFound(field);
    }

    const output = await this.deps.llm.complete({
      name: `extract:${field.name}`,
      prompt: buildExtractionPrompt(field, hits),
      schema: FieldOutputSchema,
      signal,
      metadata: { task: 'extraction', agent: this.name, field: field.name },
    });

    return interpret(field, output, hits);
  }
}

// ============================================================================
// OUTPUT INTERPRETATION
// ============================================================================

function interpret(field: FieldSpec, output: FieldOutput, hits: RetrievalHit[]): ExtractionField {
  const value = output.value?.trim() ?? '';
  if (!output.found || value === '' || value === NOT_FOUND_VALUE) {
    return notFound(field);
  }

  const index = output.evidence ?? 1;
  const source = hits[index - 1] ?? hits[0];

  return {
    name: field.name,
    label: field.label,
    value,
    citation: source ? cite(source, output.quote ?? undefined, value) : null,
    confidence: clamp01(output.confidence ?? 0),
    status: 'found',
  };
}

/**
 * Locate the quote (or else the value) inside the cited chunk. Falls back
 * to the whole chunk when neither occurs verbatim.
 */
export function cite(hit: RetrievalHit, quote: string | undefined, value: string): Citation {
  for (const needle of [quote?.trim(), value]) {
    if (!needle) continue;
    const at = hit.text.indexOf(needle);
    if (at !== -1) {
      const page = pageWithin(hit, at);
      return {
        chunkId: hit.chunkId,
        span: { start: hit.span.start + at, end: hit.span.start + at + needle.length },
        ...(page !== undefined && { page }),
        excerpt: needle.slice(0, MAX_EXCERPT_CHARS),
      };
    }
  }

  return {
    chunkId: hit.chunkId,
    span: { ...hit.span },
    ...(hit.page !== undefined && { page: hit.page }),
    excerpt: hit.text.slice(0, MAX_EXCERPT_CHARS),
  };
}

/**
 * Page of an offset inside a chunk. `hit.page` is where the chunk starts;
 * every form feed before the offset moves one page on.
 */
function pageWithin(hit: RetrievalHit, offset: number): number | undefined {
  if (hit.page === undefined) {
    return undefined;
  }
  let breaks = 0;
  for (let i = hit.text.indexOf('\f'); i !== -1 && i < offset; i = hit.text.indexOf('\f', i + 1)) {
    breaks++;
  }
  return hit.page + breaks;
}

function notFound(field: FieldSpec): ExtractionField {
  return {
    name: field.name,
    label: field.label,
    value: null,
    citation: null,
    confidence: 0,
    status: 'not_found',
  };
}

export function unavailable(field: Pick<FieldSpec, 'name' | 'label'>, reason: string): ExtractionField {
  return {
    name: field.name,
    label: field.label,
    value: null,
    citation: null,
    confidence: 0,
    status: 'unavailable',
    reason,
  };
}

function clamp01(value: number): number {
  return Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;
}
