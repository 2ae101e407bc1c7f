/**
 * Report Module
 *
 * Renders an AggregatedReport as Markdown and writes it to disk.
 */

export {
  renderMarkdown,
  formatExcerpt,
  escapeCell,
  EXCERPT_LENGTH,
  type RenderOptions,
} from './markdown.js';
export { writeReport, reportFileName, type WrittenReport } from './writer.js';
