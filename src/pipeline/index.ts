/**
 * Pipeline Module
 *
 * State machine, orchestrator and aggregator.
 *
 * @example
 * ```typescript
 * const pipeline = new ExtractionPipeline({ providers, store }, settings);
 * const outcome = await pipeline.run(document, { mode: 'isolated' });
 * if (outcome.status === 'done') console.log(outcome.report.manifest);
 * ```
 */

export {
  PipelineStateMachine,
  IllegalTransitionError,
  TRANSITIONS,
  type PipelineState,
  type Transition,
} from './state-machine.js';

export {
  aggregate,
  EXTRACTION_FAILED,
  type AggregatedReport,
  type AggregateInput,
  type ReportSection,
  type ReportSummary,
} from './aggregator.js';

export {
  ExtractionPipeline,
  TIMEOUT_REASON,
  type PipelineDeps,
  type PipelineEvent,
  type PipelineOutcome,
  type RunOptions,
} from './orchestrator.js';
