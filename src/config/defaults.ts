/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and as the base the user's
 * sparse config is merged onto.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  llm: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0,
    timeout_ms: 60000,
  },

  embedding: {
    model: 'text-embedding-3-large',
    batch_size: 32,
    timeout_ms: 120000,
  },

  reranker: {
    provider: 'llm',
  },

  store: {
    namespace: 'default',
  },

  pipeline: {
    // Chunking
    chunk_size: 1000,
    chunk_overlap: 200,

    // Retrieval
    retrieval_k: 5,
    similarity_threshold: 0.5,
    enable_reranking: true,
    rerank_top_k: 15, // candidates passed to the reranker
    rerank_final_k: 8, // evidence passages kept per field
    enable_query_expansion: false,
    max_expansions: 5,
    enable_multi_round_retrieval: true,
    max_retrieval_rounds: 2,
    coverage_threshold: 0.75,

    // Workflow
    isolation_mode: 'isolated',
    workflow_timeout_ms: 300000, // 5 minutes
    per_call_max_retries: 3,
    retry_base_delay_ms: 500,
    retry_max_delay_ms: 8000,
    agent_concurrency: 3,
    field_concurrency: 2,
    cancellation_grace_ms: 1000,
  },

  observability: {
    enabled: false,
    langfuse_host: 'https://cloud.langfuse.com',
  },

  output: {
    dir: './output',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.tender-insight/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# tender-insight configuration
# Location: ~/.tender-insight/config.toml

# Chat model used for query expansion, field extraction and reranking
# API key: OPENAI_API_KEY (env or .env file)
[llm]
provider = "${DEFAULT_CONFIG.llm.provider}"
model = "${DEFAULT_CONFIG.llm.model}"
temperature = ${DEFAULT_CONFIG.llm.temperature}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
# base_url = "https://example.com/v1"   # for openai-compatible endpoints

[embedding]
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
# dimensions = 1024

# "llm" scores candidates with the chat model, "none" keeps similarity order
[reranker]
provider = "${DEFAULT_CONFIG.reranker.provider}"

[store]
namespace = "${DEFAULT_CONFIG.store.namespace}"
# path = "/var/lib/tender-insight/vectors.db"

[pipeline]
chunk_size = ${DEFAULT_CONFIG.pipeline.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.pipeline.chunk_overlap}
retrieval_k = ${DEFAULT_CONFIG.pipeline.retrieval_k}
similarity_threshold = ${DEFAULT_CONFIG.pipeline.similarity_threshold}
enable_reranking = ${DEFAULT_CONFIG.pipeline.enable_reranking}
rerank_top_k = ${DEFAULT_CONFIG.pipeline.rerank_top_k}
rerank_final_k = ${DEFAULT_CONFIG.pipeline.rerank_final_k}
enable_query_expansion = ${DEFAULT_CONFIG.pipeline.enable_query_expansion}
max_expansions = ${DEFAULT_CONFIG.pipeline.max_expansions}
enable_multi_round_retrieval = ${DEFAULT_CONFIG.pipeline.enable_multi_round_retrieval}
max_retrieval_rounds = ${DEFAULT_CONFIG.pipeline.max_retrieval_rounds}
coverage_threshold = ${DEFAULT_CONFIG.pipeline.coverage_threshold}
isolation_mode = "${DEFAULT_CONFIG.pipeline.isolation_mode}"   # or "cumulative"
workflow_timeout_ms = ${DEFAULT_CONFIG.pipeline.workflow_timeout_ms}
per_call_max_retries = ${DEFAULT_CONFIG.pipeline.per_call_max_retries}
retry_base_delay_ms = ${DEFAULT_CONFIG.pipeline.retry_base_delay_ms}
retry_max_delay_ms = ${DEFAULT_CONFIG.pipeline.retry_max_delay_ms}
agent_concurrency = ${DEFAULT_CONFIG.pipeline.agent_concurrency}
field_concurrency = ${DEFAULT_CONFIG.pipeline.field_concurrency}
cancellation_grace_ms = ${DEFAULT_CONFIG.pipeline.cancellation_grace_ms}

# Langfuse tracing is opt-in
[observability]
enabled = ${DEFAULT_CONFIG.observability.enabled}
langfuse_host = "${DEFAULT_CONFIG.observability.langfuse_host ?? ''}"
# langfuse_public_key = "pk-lf-..."  # or set LANGFUSE_PUBLIC_KEY env var
# langfuse_secret_key = "sk-lf-..."  # or set LANGFUSE_SECRET_KEY env var

[output]
dir = "${DEFAULT_CONFIG.output.dir}"
`;
