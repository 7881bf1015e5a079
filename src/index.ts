/**
 * Docent - Library Entry Point
 *
 * The CLI (`docent`) covers the common workflow:
 * ```bash
 * docent ingest ./statements          # Chunk, embed and index documents
 * docent search "rent"                # Nearest chunks for a query
 * docent ask "What did I spend on travel?" --trace
 * ```
 *
 * The same engine is available as a library for embedding it elsewhere.
 *
 * @example Asking a question
 * ```typescript
 * import {
 *   AgentOrchestrator, LlmReasoningProvider, LlmTextGenerator, QueryService,
 *   Retriever, createDefaultToolRegistry, createEmbeddingProvider,
 *   createLLMProvider, createDatabasePersistence, getDatabase,
 *   getVectorIndexManager, loadConfig, consoleLogger,
 * } from 'docent';
 *
 * const config = loadConfig();
 * const database = getDatabase();
 * const index = getVectorIndexManager().getIndex({
 *   dimensions: config.embedding.dimensions,
 *   persistence: createDatabasePersistence(database),
 * });
 * const retriever = new Retriever(index, createEmbeddingProvider(config.embedding), database);
 * const generator = new LlmTextGenerator(createLLMProvider(config), config.llm);
 * const orchestrator = new AgentOrchestrator({
 *   tools: createDefaultToolRegistry({ retriever, generator }),
 *   planner: new LlmReasoningProvider(generator),
 * });
 * const service = new QueryService({ orchestrator, store: database, logger: consoleLogger });
 *
 * const session = await service.submitQuery('What did I spend on travel?');
 * console.log(session.finalAnswer ?? session.partialAnswer);
 * ```
 *
 * @packageDocumentation
 */

export * from './config/index.js';
export * from './errors/index.js';
export * from './database/index.js';
export * from './indexer/index.js';
export * from './search/index.js';
export * from './providers/index.js';
export * from './agent/index.js';
export * from './utils/index.js';
