/**
 * Document Source
 *
 * Loads plain-text tender documents. PDF and DOCX extraction happen
 * upstream; this loader accepts text exports only.
 *
 * Pages are delimited by form feeds (\f), the page separator most
 * PDF-to-text tools emit. `pageOffsets[i]` is the offset where page i+1
 * starts in `text`.
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { EmptyDocumentError, FileNotFoundError, UnsupportedFormatError } from '../errors/index.js';

export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.text'] as const;

const PAGE_BREAK = '\f';

/** Texts shorter than this get a processing note */
const MIN_EXPECTED_LENGTH = 100;

const TENDER_KEYWORDS = [
  '招标',
  '投标',
  '采购',
  '评标',
  '开标',
  '中标',
  '招标公告',
  '招标文件',
  '投标文件',
  '评分标准',
];

/**
 * An ingested document. Immutable once loaded.
 */
export interface LoadedDocument {
  /** sha256 of the text: identical content gives an identical id */
  readonly documentId: string;
  readonly text: string;
  /** Start offset of every page, first entry always 0 */
  readonly pageOffsets: readonly number[];
  /** Where the text came from, for messages */
  readonly source?: string;
}

/**
 * Build a document from text already in memory.
 *
 * @throws EmptyDocumentError when the text is blank
 */
export function createDocument(text: string, source?: string): LoadedDocument {
  const normalized = text.startsWith('\uFEFF') ? text.slice(1) : text;
  if (normalized.trim().length === 0) {
    throw new EmptyDocumentError(source);
  }

  return Object.freeze({
    documentId: createHash('sha256').update(normalized, 'utf8').digest('hex'),
    text: normalized,
    pageOffsets: Object.freeze(computePageOffsets(normalized)),
    ...(source !== undefined && { source }),
  });
}

/**
 * Load a text document from disk.
 *
 * @throws FileNotFoundError when the path does not exist
 * @throws UnsupportedFormatError for anything but .txt, .md and .text
 * @throws EmptyDocumentError when the file has no text
 */
export async function loadText(path: string): Promise<LoadedDocument> {
  const extension = extname(path).toLowerCase();

  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new FileNotFoundError(path);
    }
  } catch (error) {
    if (error instanceof FileNotFoundError) throw error;
    throw new FileNotFoundError(path);
  }

  if (!isSupportedExtension(extension)) {
    throw new UnsupportedFormatError(extension, SUPPORTED_EXTENSIONS);
  }

  const text = await readFile(path, 'utf-8');
  return createDocument(text, path);
}

function isSupportedExtension(extension: string): boolean {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * Start offsets of every form-feed delimited page.
 */
export function computePageOffsets(text: string): number[] {
  const offsets = [0];
  for (let i = text.indexOf(PAGE_BREAK); i !== -1; i = text.indexOf(PAGE_BREAK, i + 1)) {
    offsets.push(i + 1);
  }
  return offsets;
}

/**
 * 1-based page containing `offset`, or undefined for single-page text.
 */
export function pageAt(pageOffsets: readonly number[], offset: number): number | undefined {
  if (pageOffsets.length <= 1) {
    return undefined;
  }

  let page = 1;
  for (let i = 1; i < pageOffsets.length; i++) {
    const start = pageOffsets[i];
    if (start === undefined || start > offset) break;
    page = i + 1;
  }
  return page;
}

/**
 * Processing notes about a document that is usable but suspicious.
 */
export function inspectDocument(text: string): string[] {
  const notes: string[] = [];

  if (text.trim().length < MIN_EXPECTED_LENGTH) {
    notes.push('文档内容过短，可能影响分析质量');
  }

  if (!TENDER_KEYWORDS.some((keyword) => text.includes(keyword))) {
    notes.push('文档中未发现招标相关关键词，请确认文档类型');
  }

  return notes;
}
