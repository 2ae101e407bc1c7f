/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { HashingEmbedder, ScriptedLLM } from '../test-utils/index.js';
 *
 * const llm = new ScriptedLLM(() => ({ found: false }));
 * ```
 */

export {
  HashingEmbedder,
  ScriptedLLM,
  FakeReranker,
  hashEmbedding,
  type ScriptedCall,
  type Script,
} from './fakes.js';
