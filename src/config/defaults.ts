/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml on top of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  llm: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    max_output_tokens: 1000,
    temperature: 0,
  },

  // text-embedding-3-small: 1536 dimensions
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimensions: 1536,
    batch_size: 32,
    timeout_ms: 30000,
    max_retries: 3,
    retry_base_delay_ms: 500,
  },

  chunking: {
    max_tokens: 300,
    overlap_tokens: 50,
  },

  index: {
    metric: 'cosine',
  },

  retrieval: {
    top_k: 5,
    oversample_factor: 3,
    diversity: 'none',
    min_score: 0,
  },

  agent: {
    max_steps: 6,
    max_plan_retries: 2,
    max_tool_retries: 2,
    plan_timeout_ms: 60000,
    tool_timeout_ms: 30000,
    retry_base_delay_ms: 250,
    persist_sessions: true,
  },

  ingestion: {
    max_file_size_mb: 50,
    allowed_extensions: ['.txt', '.md', '.markdown', '.csv', '.json', '.pdf'],
    concurrency: 4,
  },
};

/**
 * Written to ~/.docent/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Docent Configuration
# Location: ~/.docent/config.toml (override the directory with DOCENT_HOME)

[llm]
# anthropic | openai | ollama
provider = "${DEFAULT_CONFIG.llm.provider}"
model = "${DEFAULT_CONFIG.llm.model}"
max_output_tokens = ${DEFAULT_CONFIG.llm.max_output_tokens}
temperature = ${DEFAULT_CONFIG.llm.temperature}

[embedding]
# openai | ollama
# Changing provider, model or dimensions requires re-ingesting every document
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
max_retries = ${DEFAULT_CONFIG.embedding.max_retries}
retry_base_delay_ms = ${DEFAULT_CONFIG.embedding.retry_base_delay_ms}

[chunking]
max_tokens = ${DEFAULT_CONFIG.chunking.max_tokens}
overlap_tokens = ${DEFAULT_CONFIG.chunking.overlap_tokens}

[index]
# cosine | euclidean (fixed once documents are ingested)
metric = "${DEFAULT_CONFIG.index.metric}"

[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
oversample_factor = ${DEFAULT_CONFIG.retrieval.oversample_factor}
# none | page
diversity = "${DEFAULT_CONFIG.retrieval.diversity}"
min_score = ${DEFAULT_CONFIG.retrieval.min_score}

[agent]
max_steps = ${DEFAULT_CONFIG.agent.max_steps}
max_plan_retries = ${DEFAULT_CONFIG.agent.max_plan_retries}
max_tool_retries = ${DEFAULT_CONFIG.agent.max_tool_retries}
plan_timeout_ms = ${DEFAULT_CONFIG.agent.plan_timeout_ms}
tool_timeout_ms = ${DEFAULT_CONFIG.agent.tool_timeout_ms}
retry_base_delay_ms = ${DEFAULT_CONFIG.agent.retry_base_delay_ms}
persist_sessions = ${DEFAULT_CONFIG.agent.persist_sessions}

[ingestion]
max_file_size_mb = ${DEFAULT_CONFIG.ingestion.max_file_size_mb}
# PDF pages are separated by form feeds, so chunks keep their page number
allowed_extensions = [${DEFAULT_CONFIG.ingestion.allowed_extensions.map((e) => `"${e}"`).join(', ')}]
concurrency = ${DEFAULT_CONFIG.ingestion.concurrency}
`;
