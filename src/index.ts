/**
 * tender-insight - Library Entry Point
 *
 * The CLI (`tender-insight analyze <file>`) covers most use. This module
 * exposes the pipeline for embedding in other Node.js services.
 *
 * @example
 * ```typescript
 * import {
 *   loadConfig,
 *   resolvePipelineSettings,
 *   createProviders,
 *   InMemoryVectorStore,
 *   ExtractionPipeline,
 *   createDocument,
 *   renderMarkdown,
 * } from 'tender-insight';
 *
 * const config = loadConfig();
 * const pipeline = new ExtractionPipeline(
 *   { providers: createProviders(config), store: new InMemoryVectorStore() },
 *   resolvePipelineSettings(config)
 * );
 * const outcome = await pipeline.run(createDocument(text, 'tender.txt'));
 * if (outcome.status === 'done') console.log(renderMarkdown(outcome.report));
 * ```
 *
 * @packageDocumentation
 */

export * from './errors/index.js';
export * from './config/index.js';
export * from './store/index.js';
export * from './namespace/index.js';
export * from './document/index.js';
export * from './indexer/index.js';
export * from './providers/index.js';
export * from './retrieval/index.js';
export * from './agents/index.js';
export * from './observability/index.js';
export * from './pipeline/index.js';
export * from './report/index.js';
export type { Logger } from './utils/logger.js';
