/**
 * Agent catalogue
 *
 * The default agents and their fields live in data/agents.json so the
 * queries can be tuned without touching code. The file is validated with
 * zod on load.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { AgentSpec } from './types.js';

const FieldSpecSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'Field names are snake_case'),
  label: z.string().min(1),
  query: z.string().min(1),
  alternates: z.array(z.string().min(1)).default([]),
  hint: z.string().min(1),
});

const AgentSpecSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'Agent names are snake_case'),
  title: z.string().min(1),
  fields: z.array(FieldSpecSchema).min(1),
});

export const CatalogSchema = z.object({
  version: z.literal(1),
  agents: z.array(AgentSpecSchema).min(1),
});

export type Catalog = z.infer<typeof CatalogSchema>;

const DEFAULT_CATALOG_URL = new URL('../../data/agents.json', import.meta.url);

/**
 * Parse and validate a catalogue document.
 *
 * @throws ConfigError listing the first schema violations
 */
export function parseCatalog(raw: unknown, source = 'agents.json'): AgentSpec[] {
  const result = CatalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid agent catalogue ${source}: ${issues}`);
  }
  return result.data.agents;
}

/**
 * Load the agent catalogue from a JSON file (the bundled one by default).
 */
export function loadCatalog(path: string | URL = DEFAULT_CATALOG_URL): AgentSpec[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read agent catalogue ${String(path)}: ${message}`);
  }
  return parseCatalog(raw, String(path));
}
