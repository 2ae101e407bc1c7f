import { describe, it, expect } from 'vitest';
import { AgentRegistry } from '../registry.js';
import { ConfigError } from '../../errors/index.js';
import type { AgentSpec, FieldSpec } from '../types.js';

function field(name: string): FieldSpec {
  return { name, label: name, query: name, alternates: [], hint: name };
}

function agent(name: string, ...fields: string[]): AgentSpec {
  return { name, title: name, fields: fields.map(field) };
}

describe('AgentRegistry', () => {
  it('keeps registration order and records owners', () => {
    const registry = new AgentRegistry([agent('basic', 'a', 'b'), agent('terms', 'c')]);

    expect(registry.list().map((a) => a.name)).toEqual(['basic', 'terms']);
    expect(registry.ownerOf('a')).toBe('basic');
    expect(registry.ownerOf('c')).toBe('terms');
    expect(registry.ownerOf('zzz')).toBeUndefined();
    expect(registry.get('terms')?.fields).toHaveLength(1);
  });

  it('rejects a field owned by another agent', () => {
    const registry = new AgentRegistry([agent('basic', 'a', 'b')]);

    expect(() => registry.register(agent('terms', 'c', 'b'))).toThrow(
      'Field "b" of agent "terms" is already owned by "basic"'
    );
    // Nothing of the rejected agent is kept
    expect(registry.size).toBe(1);
    expect(registry.ownerOf('c')).toBeUndefined();
  });

  it('rejects a field declared twice by one agent', () => {
    expect(() => new AgentRegistry([agent('basic', 'a', 'a')])).toThrow(
      'Field "a" of agent "basic" is already owned by "basic"'
    );
  });

  it('rejects duplicate agent names', () => {
    const registry = new AgentRegistry([agent('basic', 'a')]);

    expect(() => registry.register(agent('basic', 'b'))).toThrow(ConfigError);
  });

  it('rejects agents without fields', () => {
    expect(() => new AgentRegistry([agent('empty')])).toThrow('Agent "empty" declares no fields');
  });
});
