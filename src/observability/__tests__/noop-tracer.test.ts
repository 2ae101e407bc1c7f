import { describe, it, expect } from 'vitest';
import { createNoopTracer } from '../noop-tracer.js';

describe('NoopTracer', () => {
  it('creates a tracer with isRemote = false', () => {
    expect(createNoopTracer().isRemote).toBe(false);
  });

  it('has no trace id', () => {
    expect(createNoopTracer().trace({ name: 'analyze' }).traceId).toBeUndefined();
  });

  it('returns the same handles for every call', () => {
    const tracer = createNoopTracer();
    const a = tracer.trace({ name: 'a' });
    const b = tracer.trace({ name: 'b' });
    expect(a).toBe(b);
    expect(a.span({ name: 'index' }).span({ name: 'nested' })).toBe(a.span({ name: 'other' }));
  });

  it('supports the full handle lifecycle without error', async () => {
    const tracer = createNoopTracer();
    const trace = tracer.trace({ name: 'analyze', input: 'tender.txt', sessionId: 'session-1' });

    const span = trace.span({ name: 'agent:scoring', metadata: { fields: 8 } });
    const gen = span.generation({ name: 'extract:price_score', model: 'gpt-4o-mini' });
    gen.update({ output: { found: true } }).end();
    span.update({ level: 'ERROR', statusMessage: 'failed' }).end();
    trace.update({ output: 'done' }).end();

    await expect(tracer.flush()).resolves.toBeUndefined();
    await expect(tracer.shutdown()).resolves.toBeUndefined();
  });
});
