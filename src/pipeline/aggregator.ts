/**
 * Aggregator
 *
 * Merges per-agent results into one immutable report. Agents are visited
 * in registration order and their fields in declared order, so the same
 * inputs always give the same report.
 *
 * Aggregation never fails. An agent with no result has every field
 * recorded `unavailable`; fields an agent returns outside its declared
 * domain are dropped.
 */

import { unavailable } from '../agents/extraction-agent.js';
import type {
  AgentSpec,
  AgentStatus,
  ExtractionField,
  PartialExtractionResult,
} from '../agents/types.js';

export const EXTRACTION_FAILED = 'extraction failed';

export interface ReportSection {
  agent: string;
  title: string;
  status: AgentStatus;
  fields: ExtractionField[];
}

export interface ReportSummary {
  total: number;
  found: number;
  notFound: number;
  unavailable: number;
}

export interface AggregatedReport {
  documentId: string;
  namespaceId: string;
  source?: string;
  sections: ReportSection[];
  /** Agent name → status, in registration order */
  manifest: Record<string, AgentStatus>;
  summary: ReportSummary;
  notes: string[];
}

export interface AggregateInput {
  documentId: string;
  namespaceId: string;
  source?: string;
  agents: readonly AgentSpec[];
  results: readonly PartialExtractionResult[];
  notes?: readonly string[];
}

export function aggregate(input: AggregateInput): Readonly<AggregatedReport> {
  const byAgent = new Map(input.results.map((r) => [r.agent, r]));
  const sections: ReportSection[] = [];
  const manifest: Record<string, AgentStatus> = {};

  for (const spec of input.agents) {
    const result = byAgent.get(spec.name);
    const returned = new Map((result?.fields ?? []).map((f) => [f.name, f]));

    const fields = spec.fields.map(
      (field) => returned.get(field.name) ?? unavailable(field, EXTRACTION_FAILED)
    );
    const status = result?.status ?? 'failed';

    sections.push({ agent: spec.name, title: spec.title, status, fields });
    manifest[spec.name] = status;
  }

  const all = sections.flatMap((s) => s.fields);
  const report: AggregatedReport = {
    documentId: input.documentId,
    namespaceId: input.namespaceId,
    ...(input.source !== undefined && { source: input.source }),
    sections,
    manifest,
    summary: {
      total: all.length,
      found: all.filter((f) => f.status === 'found').length,
      notFound: all.filter((f) => f.status === 'not_found').length,
      unavailable: all.filter((f) => f.status === 'unavailable').length,
    },
    notes: [...new Set(input.notes ?? [])],
  };

  return deepFreeze(report);
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
