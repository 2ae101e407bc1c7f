/**
 * Retrieval Module
 *
 * Query expansion, multi-round similarity search and reranking over a
 * namespace handle.
 */

export {
  RetrievalPlanner,
  type PlannerSettings,
  type PlannerProviders,
  type FieldQuery,
  type RetrievalHit,
  type RetrievalResult,
  type RetrievalPlannerOptions,
} from './planner.js';
