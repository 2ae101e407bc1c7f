/**
 * Analyze Command
 *
 * Runs the extraction pipeline over one tender document:
 *   tender-insight analyze ./tender.txt
 *   tender-insight analyze ./tender.txt --mode cumulative --namespace project-a
 *   tender-insight analyze ./tender.txt --in-memory --no-save --json
 *
 * A fatal pipeline failure is rethrown so the CLI exits with the error's
 * code; no report is written in that case.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { AnalyzeArgsSchema, AnalyzeOptionsSchema, validateInput, type AnalyzeOptions } from '../validation.js';
import { createProgressReporter, formatDuration } from '../utils/progress.js';
import { openStore } from '../utils/store.js';
import { loadConfig, resolvePipelineSettings, withOverrides, type Config } from '../../config/index.js';
import { loadText } from '../../document/loader.js';
import { ValidationError } from '../../errors/index.js';
import { createTracer } from '../../observability/index.js';
import { ExtractionPipeline } from '../../pipeline/orchestrator.js';
import type { AggregatedReport } from '../../pipeline/aggregator.js';
import { createProviders } from '../../providers/index.js';
import { writeReport, type WrittenReport } from '../../report/writer.js';
import { formatTable, type Column } from '../../utils/table.js';

const STATUS_MARKS = {
  found: chalk.green('✓'),
  not_found: chalk.dim('-'),
  unavailable: chalk.red('✗'),
} as const;

/**
 * Fold command-line flags into the loaded config.
 */
function applyOptions(config: Config, options: AnalyzeOptions): Config {
  const pipeline = {
    ...(options.mode !== undefined && { isolation_mode: options.mode }),
    ...(options.timeout !== undefined && { workflow_timeout_ms: options.timeout * 1000 }),
  };
  const output = options.output !== undefined ? { dir: options.output } : undefined;
  return withOverrides(config, { pipeline, ...(output && { output }) });
}

function printReport(ctx: CommandContext, report: AggregatedReport): void {
  const columns: Column[] = [
    { header: 'Field', key: 'label' },
    { header: 'Value', key: 'value', maxWidth: 48 },
    { header: '', key: 'status' },
  ];

  for (const section of report.sections) {
    ctx.log('');
    ctx.log(`${chalk.bold(section.title)} ${chalk.dim(`(${section.status})`)}`);
    ctx.log(
      formatTable(
        columns,
        section.fields.map((field) => ({
          label: field.label,
          value: field.value ?? (field.reason ? `(${field.reason})` : ''),
          status: STATUS_MARKS[field.status],
        }))
      )
    );
  }

  const { summary } = report;
  ctx.log('');
  ctx.log(
    `${chalk.bold('Fields:')} ${summary.found}/${summary.total} found, ` +
      `${summary.notFound} not mentioned, ${summary.unavailable} unavailable`
  );
  for (const note of report.notes) {
    ctx.log(chalk.yellow(`  ! ${note}`));
  }
}

/**
 * Create the analyze command
 */
export function createAnalyzeCommand(getContext: () => CommandContext): Command {
  return new Command('analyze')
    .argument('<file>', 'Tender document to analyze (.txt, .md)')
    .description('Extract structured fields from a tender document')
    .option('-n, --namespace <id>', 'Namespace to index into (default: store.namespace)')
    .option('-m, --mode <mode>', 'Namespace isolation: isolated or cumulative')
    .option('-t, --timeout <seconds>', 'Overall workflow timeout in seconds')
    .option('-o, --output <dir>', 'Directory for the Markdown and JSON report')
    .option('--in-memory', 'Use a throwaway in-memory vector store')
    .option('--no-save', 'Print the result without writing report files')
    .action(async (file: string, rawOptions: Record<string, unknown>) => {
      const ctx = getContext();

      const args = validateInput(AnalyzeArgsSchema, { file });
      if (!args.success) {
        throw new ValidationError(args.error);
      }
      const parsed = validateInput(AnalyzeOptionsSchema, rawOptions);
      if (!parsed.success) {
        throw new ValidationError(parsed.error);
      }
      const options = parsed.data;
      ctx.debug(`Options: ${JSON.stringify(options)}`);

      const config = applyOptions(loadConfig(), options);
      const settings = resolvePipelineSettings(config);
      const document = await loadText(args.data.file);
      ctx.debug(`Loaded ${document.text.length} characters, document ${document.documentId.slice(0, 12)}`);

      const providers = createProviders(config);
      const store = openStore(config, { inMemory: options.inMemory });
      const tracer = createTracer(config);

      try {
        const pipeline = new ExtractionPipeline({ providers, store, tracer, logger: ctx }, settings);
        const reporter = createProgressReporter(
          { json: ctx.options.json, verbose: ctx.options.verbose },
          pipeline.agents.length
        );

        reporter.startStage('indexing');
        const outcome = await pipeline.run(document, {
          namespaceId: options.namespace ?? config.store.namespace,
          mode: settings.isolationMode,
          onEvent: (event) => reporter.handle(event),
        });

        if (outcome.status === 'failed') {
          ctx.debug(`Pipeline failed in ${outcome.failedIn} after ${outcome.durationMs}ms`);
          throw outcome.error;
        }

        let written: WrittenReport | null = null;
        if (options.save) {
          written = await writeReport(outcome.report, config.output.dir);
        }

        if (ctx.options.json) {
          reporter.complete({
            sessionId: outcome.sessionId,
            durationMs: outcome.durationMs,
            report: outcome.report,
            files: written,
          });
          return;
        }

        printReport(ctx, outcome.report);
        ctx.log('');
        if (written) {
          ctx.log(`${chalk.green('✓')} Report written to ${chalk.cyan(written.markdownPath)}`);
        }
        ctx.log(chalk.dim(`Completed in ${formatDuration(outcome.durationMs)}`));
      } finally {
        await tracer.shutdown();
        store.close();
      }
    });
}
