import { describe, it, expect } from 'vitest';
import { loadCatalog, parseCatalog } from '../catalog.js';
import { AgentRegistry } from '../registry.js';
import { ConfigError } from '../../errors/index.js';

describe('loadCatalog', () => {
  it('loads the bundled agents in order', () => {
    const agents = loadCatalog();

    expect(agents.map((a) => [a.name, a.title, a.fields.length])).toEqual([
      ['basic_info', '基础信息', 14],
      ['scoring', '评分标准', 8],
      ['other_terms', '其他条款', 7],
    ]);
  });

  it('bundles a catalogue with one owner per field', () => {
    const registry = new AgentRegistry(loadCatalog());

    expect(registry.size).toBe(3);
    expect(registry.ownerOf('budget_amount')).toBe('basic_info');
    expect(registry.ownerOf('price_score')).toBe('scoring');
    expect(registry.ownerOf('payment_terms')).toBe('other_terms');
  });

  it('wraps unreadable files in ConfigError', () => {
    expect(() => loadCatalog('/nonexistent/agents.json')).toThrow(ConfigError);
    expect(() => loadCatalog('/nonexistent/agents.json')).toThrow(
      /^Cannot read agent catalogue \/nonexistent\/agents\.json: /
    );
  });
});

describe('parseCatalog', () => {
  const field = { name: 'project_name', label: '项目名称', query: '项目名称', hint: '项目名称' };

  it('defaults alternates to an empty list', () => {
    const [agent] = parseCatalog({ version: 1, agents: [{ name: 'basic', title: '基础', fields: [field] }] });

    expect(agent?.fields[0]?.alternates).toEqual([]);
  });

  it('rejects unknown versions', () => {
    expect(() => parseCatalog({ version: 2, agents: [] }, 'custom.json')).toThrow(
      /^Invalid agent catalogue custom\.json: version: /
    );
  });

  it('rejects agents without fields', () => {
    expect(() =>
      parseCatalog({ version: 1, agents: [{ name: 'empty', title: '空', fields: [] }] })
    ).toThrow(ConfigError);
  });

  it('rejects field names that are not snake_case', () => {
    expect(() =>
      parseCatalog({
        version: 1,
        agents: [{ name: 'basic', title: '基础', fields: [{ ...field, name: 'ProjectName' }] }],
      })
    ).toThrow('agents.0.fields.0.name: Field names are snake_case');
  });
});
