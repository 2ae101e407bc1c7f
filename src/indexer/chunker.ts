/**
 * Sliding-window chunker
 *
 * Splits document text into windows of `chunkSize` characters that overlap
 * by `chunkOverlap`. The last window may be shorter. Any substring no longer
 * than the overlap lies wholly inside at least one chunk.
 *
 * Chunk ids hash the document id and the offset span, so re-chunking the
 * same document yields the same ids.
 */

import { createHash } from 'node:crypto';
import { ValidationError } from '../errors/index.js';
import { pageAt, type LoadedDocument } from '../document/loader.js';
import type { TextSpan } from '../store/types.js';

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface TextChunk {
  id: string;
  documentId: string;
  /** 0-based position in the document */
  index: number;
  text: string;
  span: TextSpan;
  page?: number;
}

/**
 * Derive a stable chunk id from its document and span.
 */
export function chunkId(documentId: string, span: TextSpan): string {
  return createHash('sha256')
    .update(`${documentId}:${span.start}:${span.end}`)
    .digest('hex')
    .slice(0, 32);
}

/**
 * Split a document into overlapping chunks.
 *
 * Whitespace-only windows are dropped. Window edges never split a
 * surrogate pair.
 *
 * @throws ValidationError when the overlap is not smaller than the size
 */
export function chunkDocument(document: LoadedDocument, options: ChunkOptions): TextChunk[] {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError(
      `chunkOverlap (${chunkOverlap}) must be between 0 and chunkSize (${chunkSize})`
    );
  }

  const { text, documentId, pageOffsets } = document;
  const step = chunkSize - chunkOverlap;
  const chunks: TextChunk[] = [];

  for (let start = 0; start < text.length; ) {
    const end = safeBoundary(text, Math.min(start + chunkSize, text.length));
    const slice = text.slice(start, end);

    if (slice.trim().length > 0) {
      const span = { start, end };
      const page = pageAt(pageOffsets, start);
      chunks.push({
        id: chunkId(documentId, span),
        documentId,
        index: chunks.length,
        text: slice,
        span,
        ...(page !== undefined && { page }),
      });
    }

    if (end >= text.length) break;
    start = safeBoundary(text, start + step);
  }

  return chunks;
}

/**
 * Move an offset forward past the low half of a surrogate pair.
 */
function safeBoundary(text: string, offset: number): number {
  if (offset <= 0 || offset >= text.length) {
    return offset;
  }
  const previous = text.charCodeAt(offset - 1);
  const isHighSurrogate = previous >= 0xd800 && previous <= 0xdbff;
  return isHighSurrogate ? offset + 1 : offset;
}
