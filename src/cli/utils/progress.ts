/**
 * Progress Reporter
 *
 * Drives progress display for `analyze` from pipeline events.
 * Supports three output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for CI/CD integration
 * - Text: simple lines for non-TTY environments
 *
 * Spinner updates are throttled to one per 100ms.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { PipelineEvent } from '../../pipeline/orchestrator.js';

/**
 * Stages shown to the user, in the order they occur.
 */
export type AnalyzeStage = 'indexing' | 'extracting';

const STAGE_LABELS: Record<AnalyzeStage, string> = {
  indexing: 'Indexing',
  extracting: 'Extracting',
};

const STAGE_UNITS: Record<AnalyzeStage, string> = {
  indexing: 'chunks embedded',
  extracting: 'agents finished',
};

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** List finished agents under the extraction stage */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'stage_failed'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: AnalyzeStage;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter turns pipeline events into spinner updates.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: ctx.options.json });
 * reporter.startStage('indexing');
 * await pipeline.run(document, { onEvent: (e) => reporter.handle(e) });
 * ```
 */
export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: AnalyzeStage | null = null;
  private currentTotal = 0;
  private processed = 0;
  private stageStartedAt = 0;
  private lastUpdateTime = 0;
  private verboseLines: string[] = [];

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(
    options: ProgressReporterOptions,
    private readonly agentCount = 0
  ) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  get stage(): AnalyzeStage | null {
    return this.currentStage;
  }

  /**
   * Route one pipeline event to the matching display call.
   */
  handle(event: PipelineEvent): void {
    switch (event.type) {
      case 'indexing':
        if (this.currentStage === 'indexing') {
          this.currentTotal = event.total;
          this.updateProgress(event.embedded);
        }
        return;

      case 'agent':
        if (this.currentStage === 'extracting') {
          this.verboseLines.push(`  → ${event.agent}: ${event.status}`);
          this.updateProgress(this.processed + 1, event.agent);
        }
        return;

      case 'state':
        switch (event.transition.to) {
          case 'INDEXED':
            this.completeStage();
            this.startStage('extracting', this.agentCount);
            return;
          case 'AGGREGATED':
            this.completeStage();
            return;
          case 'FAILED':
            this.failStage();
            return;
          default:
            return;
        }
    }
  }

  /**
   * Start a stage.
   *
   * @param total - Expected total items (0 if unknown)
   */
  startStage(stage: AnalyzeStage, total = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.processed = 0;
    this.stageStartedAt = Date.now();
    this.lastUpdateTime = 0;
    this.verboseLines = [];

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  /**
   * Update progress within the current stage. The count is always kept;
   * only the display is throttled.
   */
  updateProgress(processed: number, detail?: string): void {
    if (!this.currentStage) return;
    this.processed = processed;

    const now = Date.now();
    if (this.lastUpdateTime !== 0 && now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        stage: this.currentStage,
        data: { processed, total: this.currentTotal, ...(detail !== undefined && { detail }) },
      });
      return;
    }

    if (this.options.isInteractive && this.spinner) {
      const text =
        this.currentTotal > 0
          ? `${processed}/${this.currentTotal} (${Math.round((processed / this.currentTotal) * 100)}%)`
          : `${processed}`;
      this.spinner.text = detail ? `${text.padEnd(16)} ${chalk.dim(detail)}` : text;
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(): void {
    const stage = this.currentStage;
    if (!stage) return;
    const durationMs = Date.now() - this.stageStartedAt;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        stage,
        data: { processed: this.processed, total: this.currentTotal, durationMs },
      });
    } else {
      const summary = `${this.processed.toLocaleString()} ${STAGE_UNITS[stage]} (${formatDuration(durationMs)})`;
      if (this.options.isInteractive && this.spinner) {
        this.spinner.succeed(summary);
      } else {
        console.log(`${STAGE_LABELS[stage]} complete: ${summary}`);
      }
      if (this.options.verbose) {
        for (const line of this.verboseLines) {
          console.log(chalk.dim(line));
        }
      }
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Mark the current stage as failed. The error itself is reported by
   * the CLI error handler.
   */
  failStage(): void {
    const stage = this.currentStage;
    if (!stage) return;

    if (this.options.json) {
      this.emitJson({ type: 'stage_failed', stage, data: { processed: this.processed } });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.fail(`${STAGE_LABELS[stage]} failed`);
    } else {
      console.log(`${STAGE_LABELS[stage]} failed`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Emit the final result (JSON mode only; text output is the command's).
   */
  complete(data: Record<string, unknown>): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', data });
    }
  }

  private emitJson(event: Omit<ProgressEvent, 'timestamp'>): void {
    const full: ProgressEvent = { ...event, timestamp: new Date().toISOString() };
    console.log(JSON.stringify(full));
  }
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 *
 * @param agentCount - Total shown for the extraction stage
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {},
  agentCount = 0
): ProgressReporter {
  return new ProgressReporter(
    {
      json: options.json ?? false,
      verbose: options.verbose ?? false,
      noColor: options.noColor ?? !!process.env.NO_COLOR,
      isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
    },
    agentCount
  );
}
