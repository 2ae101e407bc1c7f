/**
 * Extraction agent types
 *
 * An agent owns a fixed list of fields. For each field it retrieves
 * evidence and asks the LLM for a value plus the passage that supports it.
 */

import type { TextSpan } from '../store/types.js';

/** Value the model gives for information the document does not contain */
export const NOT_FOUND_VALUE = '招标文件中未提及';

// ============================================================================
// CATALOGUE
// ============================================================================

export interface FieldSpec {
  /** Stable identifier, unique across all agents */
  name: string;
  /** Display label */
  label: string;
  /** Primary retrieval query */
  query: string;
  /** Queries added by later retrieval rounds */
  alternates: readonly string[];
  /** What the value should contain, shown to the model */
  hint: string;
}

export interface AgentSpec {
  name: string;
  /** Report section heading */
  title: string;
  fields: readonly FieldSpec[];
}

// ============================================================================
// RESULTS
// ============================================================================

export type FieldStatus = 'found' | 'not_found' | 'unavailable';

/** Pointer from an extracted value back to the document */
export interface Citation {
  chunkId: string;
  /** Offsets in the document text */
  span: TextSpan;
  page?: number;
  /** The cited text */
  excerpt: string;
}

export interface ExtractionField {
  name: string;
  label: string;
  value: string | null;
  citation: Citation | null;
  /** 0-1, as reported by the model */
  confidence: number;
  status: FieldStatus;
  /** Why the field is unavailable */
  reason?: string;
}

/**
 * - succeeded: every field found or not_found
 * - partial: some fields unavailable
 * - failed: every field unavailable, or the agent never returned
 * - timed_out: cancelled by the workflow timeout
 */
export type AgentStatus = 'succeeded' | 'partial' | 'failed' | 'timed_out';

export interface PartialExtractionResult {
  agent: string;
  status: AgentStatus;
  /** In the agent's declared field order */
  fields: ExtractionField[];
  error?: string;
}
