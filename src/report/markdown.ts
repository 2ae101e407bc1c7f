/**
 * Markdown report renderer
 *
 * One section per agent category with a field table, followed by the agent
 * manifest and processing notes. Rendering is a pure function of the
 * report, so identical reports render identically.
 */

import { NOT_FOUND_VALUE, type AgentStatus, type ExtractionField, type FieldStatus } from '../agents/types.js';
import type { AggregatedReport } from '../pipeline/aggregator.js';

/** Source excerpts are cut to this many characters */
export const EXCERPT_LENGTH = 50;

const STATUS_LABELS: Record<FieldStatus, string> = {
  found: '已提取',
  not_found: '未提及',
  unavailable: '不可用',
};

const AGENT_STATUS_LABELS: Record<AgentStatus, string> = {
  succeeded: '成功',
  partial: '部分成功',
  failed: '失败',
  timed_out: '超时',
};

export interface RenderOptions {
  title?: string;
}

/**
 * Escape text for a Markdown table cell: pipes are escaped and line
 * breaks become <br>.
 */
export function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, '<br>');
}

export function formatExcerpt(field: ExtractionField): string {
  if (!field.citation) return '';
  const excerpt = field.citation.excerpt.replace(/\s+/g, ' ').trim();
  const cut = excerpt.length > EXCERPT_LENGTH ? `${excerpt.slice(0, EXCERPT_LENGTH)}...` : excerpt;
  return field.citation.page !== undefined ? `第${field.citation.page}页：${cut}` : cut;
}

function formatValue(field: ExtractionField): string {
  switch (field.status) {
    case 'found':
      return field.value ?? '';
    case 'not_found':
      return NOT_FOUND_VALUE;
    case 'unavailable':
      return field.reason ? `（${field.reason}）` : '';
  }
}

export function renderMarkdown(report: AggregatedReport, options: RenderOptions = {}): string {
  const lines: string[] = [];
  const title = options.title ?? '招标文件分析报告';

  lines.push(`# ${title}`, '');
  if (report.source) {
    lines.push(`- 文件：${report.source}`);
  }
  lines.push(`- 文档ID：\`${report.documentId.slice(0, 12)}\``);
  lines.push(
    `- 字段：共${report.summary.total}项，已提取${report.summary.found}项，` +
      `未提及${report.summary.notFound}项，不可用${report.summary.unavailable}项`,
    ''
  );

  for (const section of report.sections) {
    lines.push(`## ${section.title}`, '');
    lines.push('| 字段 | 内容 | 状态 | 来源 |');
    lines.push('| --- | --- | --- | --- |');
    for (const field of section.fields) {
      const cells = [field.label, formatValue(field), STATUS_LABELS[field.status], formatExcerpt(field)];
      lines.push(`| ${cells.map(escapeCell).join(' | ')} |`);
    }
    lines.push('');
  }

  lines.push('## 模块状态', '');
  lines.push('| 模块 | 状态 |');
  lines.push('| --- | --- |');
  for (const section of report.sections) {
    lines.push(`| ${escapeCell(section.title)} | ${AGENT_STATUS_LABELS[section.status]} |`);
  }
  lines.push('');

  if (report.notes.length > 0) {
    lines.push('## 处理说明', '');
    for (const note of report.notes) {
      lines.push(`- ${note}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
