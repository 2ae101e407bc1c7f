import { describe, it, expect } from 'vitest';
import { aggregate, EXTRACTION_FAILED } from '../aggregator.js';
import type { AgentSpec, ExtractionField, PartialExtractionResult } from '../../agents/types.js';

function spec(name: string, ...fields: string[]): AgentSpec {
  return {
    name,
    title: `${name} title`,
    fields: fields.map((f) => ({ name: f, label: f.toUpperCase(), query: f, alternates: [], hint: f })),
  };
}

function found(name: string, value: string): ExtractionField {
  return { name, label: name.toUpperCase(), value, citation: null, confidence: 0.8, status: 'found' };
}

function notFound(name: string): ExtractionField {
  return { name, label: name.toUpperCase(), value: null, citation: null, confidence: 0, status: 'not_found' };
}

const AGENTS = [spec('basic', 'a', 'b'), spec('terms', 'c')];

describe('aggregate', () => {
  it('orders sections by agent and fields by declaration', () => {
    const results: PartialExtractionResult[] = [
      { agent: 'terms', status: 'succeeded', fields: [found('c', '30天')] },
      { agent: 'basic', status: 'succeeded', fields: [notFound('b'), found('a', '500万元')] },
    ];

    const report = aggregate({ documentId: 'doc', namespaceId: 'ns', agents: AGENTS, results });

    expect(report.sections.map((s) => [s.agent, s.title, s.fields.map((f) => f.name)])).toEqual([
      ['basic', 'basic title', ['a', 'b']],
      ['terms', 'terms title', ['c']],
    ]);
    expect(report.manifest).toEqual({ basic: 'succeeded', terms: 'succeeded' });
    expect(report.summary).toEqual({ total: 3, found: 2, notFound: 1, unavailable: 0 });
    expect(report.source).toBeUndefined();
  });

  it('fills the fields of a missing agent with unavailable', () => {
    const results: PartialExtractionResult[] = [
      { agent: 'basic', status: 'succeeded', fields: [found('a', 'x'), found('b', 'y')] },
    ];

    const report = aggregate({ documentId: 'doc', namespaceId: 'ns', agents: AGENTS, results });

    expect(report.manifest.terms).toBe('failed');
    expect(report.sections[1]?.fields).toEqual([
      {
        name: 'c',
        label: 'C',
        value: null,
        citation: null,
        confidence: 0,
        status: 'unavailable',
        reason: EXTRACTION_FAILED,
      },
    ]);
  });

  it('keeps the status of a timed out agent and fills the fields it never returned', () => {
    const results: PartialExtractionResult[] = [
      { agent: 'basic', status: 'timed_out', fields: [found('a', 'x')] },
      { agent: 'terms', status: 'succeeded', fields: [found('c', 'z')] },
    ];

    const report = aggregate({ documentId: 'doc', namespaceId: 'ns', agents: AGENTS, results });

    expect(report.manifest.basic).toBe('timed_out');
    expect(report.sections[0]?.fields.map((f) => f.status)).toEqual(['found', 'unavailable']);
  });

  it('drops fields outside the agent domain', () => {
    const results: PartialExtractionResult[] = [
      { agent: 'basic', status: 'succeeded', fields: [found('a', 'x'), found('b', 'y'), found('c', 'stolen')] },
      { agent: 'terms', status: 'succeeded', fields: [notFound('c')] },
    ];

    const report = aggregate({ documentId: 'doc', namespaceId: 'ns', agents: AGENTS, results });

    expect(report.sections[0]?.fields.map((f) => f.name)).toEqual(['a', 'b']);
    expect(report.sections[1]?.fields[0]?.status).toBe('not_found');
  });

  it('is deterministic and frozen', () => {
    const results: PartialExtractionResult[] = [
      { agent: 'basic', status: 'partial', fields: [found('a', 'x')] },
    ];
    const input = {
      documentId: 'doc',
      namespaceId: 'ns',
      source: 'tender.txt',
      agents: AGENTS,
      results,
      notes: ['timeout', 'timeout'],
    };

    const first = aggregate(input);
    const second = aggregate(input);

    expect(second).toEqual(first);
    expect(first.source).toBe('tender.txt');
    expect(first.notes).toEqual(['timeout']);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.sections[0]?.fields[0])).toBe(true);
  });
});
