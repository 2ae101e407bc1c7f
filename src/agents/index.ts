/**
 * Agents Module
 *
 * Domain-scoped extraction agents, their field catalogue and the registry
 * that enforces one owner per field.
 */

export {
  NOT_FOUND_VALUE,
  type FieldSpec,
  type AgentSpec,
  type FieldStatus,
  type Citation,
  type ExtractionField,
  type AgentStatus,
  type PartialExtractionResult,
} from './types.js';

export { loadCatalog, parseCatalog, CatalogSchema, type Catalog } from './catalog.js';
export { AgentRegistry } from './registry.js';
export {
  ExtractionAgent,
  cite,
  unavailable,
  type AgentSettings,
  type ExtractionAgentDeps,
  type ExtractionAgentOptions,
} from './extraction-agent.js';
export { buildExtractionPrompt, formatEvidence, FieldOutputSchema, type FieldOutput } from './prompts.js';
