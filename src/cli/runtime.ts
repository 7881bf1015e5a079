/**
 * CLI Runtime Wiring
 *
 * Builds the engine from config for one command invocation:
 * config → database → vector index → embedding provider → retriever,
 * then the ingestion service or the agent stack on top.
 *
 * Each command builds only what it needs, so `list` never asks for an
 * API key and `search` never creates an LLM client.
 */

import { loadConfig, type Config } from '../config/index.js';
import { getDatabase, type DatabaseOperations } from '../database/index.js';
import { createEmbeddingProvider, IngestionService, type EmbeddingProvider } from '../indexer/index.js';
import {
  createDatabasePersistence,
  getVectorIndexManager,
  Retriever,
  type VectorIndex,
} from '../search/index.js';
import { createLLMProvider, LlmTextGenerator } from '../providers/index.js';
import {
  AgentOrchestrator,
  LlmReasoningProvider,
  QueryService,
  createDefaultToolRegistry,
} from '../agent/index.js';
import type { Logger } from '../utils/index.js';

export interface IndexRuntime {
  config: Config;
  database: DatabaseOperations;
  index: VectorIndex;
}

export interface RetrievalRuntime extends IndexRuntime {
  embeddingProvider: EmbeddingProvider;
  retriever: Retriever;
}

/**
 * Open the store and load the persisted vector index. Needs no API key.
 */
export async function openIndex(logger: Logger, config: Config = loadConfig()): Promise<IndexRuntime> {
  const database = getDatabase();
  const index = await getVectorIndexManager().getIndex({
    dimensions: config.embedding.dimensions,
    metric: config.index.metric,
    persistence: createDatabasePersistence(database),
    logger,
  });
  logger.debug?.(`Vector index: ${index.size} entries (${index.metric})`);
  return { config, database, index };
}

/**
 * openIndex plus the embedding provider and a configured Retriever.
 */
export async function createRetrievalRuntime(logger: Logger, config: Config = loadConfig()): Promise<RetrievalRuntime> {
  const embeddingProvider = createEmbeddingProvider(config.embedding);
  logger.debug?.(`Embedding: ${embeddingProvider.name}/${embeddingProvider.model} (${embeddingProvider.dimensions}d)`);
  const { database, index } = await openIndex(logger, config);

  const retriever = new Retriever(
    index,
    embeddingProvider,
    database,
    {
      oversampleFactor: config.retrieval.oversample_factor,
      diversity: config.retrieval.diversity,
      minScore: config.retrieval.min_score,
      embedTimeoutMs: config.embedding.timeout_ms,
      maxRetries: config.embedding.max_retries,
      retryBaseDelayMs: config.embedding.retry_base_delay_ms,
    },
    logger
  );

  return { config, database, index, embeddingProvider, retriever };
}

export function createIngestionService(runtime: RetrievalRuntime, logger: Logger): IngestionService {
  const { config } = runtime;
  return new IngestionService({
    store: runtime.database,
    index: runtime.index,
    embeddingProvider: runtime.embeddingProvider,
    chunking: {
      maxTokens: config.chunking.max_tokens,
      overlapTokens: config.chunking.overlap_tokens,
    },
    embedding: {
      batchSize: config.embedding.batch_size,
      timeoutMs: config.embedding.timeout_ms,
      maxRetries: config.embedding.max_retries,
      retryBaseDelayMs: config.embedding.retry_base_delay_ms,
    },
    files: {
      maxFileSizeMb: config.ingestion.max_file_size_mb,
      allowedExtensions: config.ingestion.allowed_extensions,
    },
    logger,
  });
}

/**
 * Wire the agent: LLM → planner, built-in tools → orchestrator → QueryService.
 */
export function createQueryService(runtime: RetrievalRuntime, logger: Logger): QueryService {
  const { config } = runtime;
  const generator = new LlmTextGenerator(createLLMProvider(config), config.llm);
  logger.debug?.(`Reasoning model: ${generator.name}`);

  const tools = createDefaultToolRegistry({
    retriever: runtime.retriever,
    generator,
    defaultK: config.retrieval.top_k,
  });

  const orchestrator = new AgentOrchestrator({
    planner: new LlmReasoningProvider(generator),
    tools,
    logger,
    maxSteps: config.agent.max_steps,
    maxPlanRetries: config.agent.max_plan_retries,
    maxToolRetries: config.agent.max_tool_retries,
    planTimeoutMs: config.agent.plan_timeout_ms,
    toolTimeoutMs: config.agent.tool_timeout_ms,
    retryBaseDelayMs: config.agent.retry_base_delay_ms,
  });

  return new QueryService({
    orchestrator,
    store: runtime.database,
    persistSessions: config.agent.persist_sessions,
    logger,
  });
}
