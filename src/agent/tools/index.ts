/**
 * Agent Tools
 *
 * The built-in tools and the registry that runs them.
 */

import type { TextGenerator } from '../../providers/llm.js';
import { createCategorizeExpensesTool } from './categorize-expenses.js';
import { createDetectAnomaliesTool } from './detect-anomalies.js';
import { createExtractFinancialEntitiesTool } from './extract-financial-entities.js';
import { createForecastExpensesTool } from './forecast-expenses.js';
import { createGenerateCodeTool } from './generate-code.js';
import { ToolRegistry } from './registry.js';
import { createRetrieveKnowledgeTool, type KnowledgeRetriever } from './retrieve-knowledge.js';

export { ToolRegistry, DEFAULT_TOOL_TIMEOUT_MS, describeSchemaType, formatZodIssues } from './registry.js';
export { defineTool, type ToolContext, type ToolDefinition, type ToolDescriptor, type InvokeOptions } from './types.js';
export { createRetrieveKnowledgeTool, scopeToFilter, type KnowledgeRetriever } from './retrieve-knowledge.js';
export { createGenerateCodeTool, extractCodeBlock } from './generate-code.js';
export {
  createCategorizeExpensesTool,
  categorizeDescription,
  DEFAULT_CATEGORY_TABLE,
  type CategoryTable,
} from './categorize-expenses.js';
export { createDetectAnomaliesTool, detectAnomalies, type AnomalyReport } from './detect-anomalies.js';
export { createForecastExpensesTool, forecastExpenses, type Forecast } from './forecast-expenses.js';
export {
  createExtractFinancialEntitiesTool,
  extractFinancialEntities,
  type FinancialEntities,
} from './extract-financial-entities.js';

export interface BuiltinToolDependencies {
  retriever: KnowledgeRetriever;
  generator: TextGenerator;
  /** retrieval.top_k */
  defaultK?: number;
}

/**
 * Registry holding every built-in tool.
 */
export function createDefaultToolRegistry(deps: BuiltinToolDependencies): ToolRegistry {
  return new ToolRegistry()
    .register(createRetrieveKnowledgeTool(deps.retriever, { defaultK: deps.defaultK }))
    .register(createGenerateCodeTool(deps.generator))
    .register(createCategorizeExpensesTool())
    .register(createDetectAnomaliesTool())
    .register(createForecastExpensesTool())
    .register(createExtractFinancialEntitiesTool());
}
