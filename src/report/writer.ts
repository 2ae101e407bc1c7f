/**
 * Report files
 *
 * Writes the Markdown report and its JSON twin into the output directory.
 * File names combine the source file name with a document id prefix, so
 * re-analyzing the same document overwrites its previous report.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import type { AggregatedReport } from '../pipeline/aggregator.js';
import { renderMarkdown } from './markdown.js';

export interface WrittenReport {
  markdownPath: string;
  jsonPath: string;
}

/**
 * Base file name (without extension) for a report.
 */
export function reportFileName(report: AggregatedReport): string {
  const stem = report.source ? basename(report.source, extname(report.source)) : 'document';
  const safe = stem.replace(/[\\/:*?"<>|\s]+/g, '_') || 'document';
  return `${safe}-${report.documentId.slice(0, 8)}`;
}

export async function writeReport(report: AggregatedReport, dir: string): Promise<WrittenReport> {
  const outDir = resolve(dir);
  await mkdir(outDir, { recursive: true });

  const name = reportFileName(report);
  const markdownPath = join(outDir, `${name}.md`);
  const jsonPath = join(outDir, `${name}.json`);

  await writeFile(markdownPath, renderMarkdown(report), 'utf-8');
  await writeFile(jsonPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');

  return { markdownPath, jsonPath };
}
