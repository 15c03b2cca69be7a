import { getConfig, type Config } from "../../config/index.js";
import { loadIntentExtractionTemplate } from "../../prompts/index.js";
import { createIntentExtractor } from "../intent/intent-extractor.js";
import { createOpenAIExtractionClient } from "../intent/openai-extraction-client.js";
import type { LlmExtractionClient } from "../intent/types.js";
import { createOpenAIEmbeddingService } from "../search/embedding-service.js";
import type { EmbeddingService, VectorIndex } from "../search/types.js";
import { createQdrantVectorIndex } from "../search/vector-index.js";
import { QueryOrchestrator } from "./query-orchestrator.js";
import { toQuerySettings } from "./settings.js";

export interface QueryOrchestratorFactoryOverrides {
  config?: Config;
  llmClient?: LlmExtractionClient | null;
  embeddingService?: EmbeddingService;
  vectorIndex?: VectorIndex;
  readFile?: (file: string) => Promise<string>;
}

/** Wires the production collaborators from the validated environment. */
export async function createQueryOrchestrator(overrides: QueryOrchestratorFactoryOverrides = {}): Promise<QueryOrchestrator> {
  const config = overrides.config ?? getConfig();
  const settings = toQuerySettings(config);
  const { template } = await loadIntentExtractionTemplate(config.EXTRACTION_PROMPT_FILE, overrides.readFile);

  const llmClient =
    overrides.llmClient !== undefined
      ? overrides.llmClient
      : config.LLM_EXTRACTION_ENABLED
        ? createOpenAIExtractionClient({
            model: config.OPENAI_EXTRACTION_MODEL,
            temperature: config.LLM_TEMPERATURE,
            maxTokens: config.LLM_MAX_TOKENS
          })
        : null;

  return new QueryOrchestrator({
    intentExtractor: createIntentExtractor({
      llmClient,
      timeoutMs: settings.timeouts.extractionMs,
      template
    }),
    embeddingService:
      overrides.embeddingService ??
      createOpenAIEmbeddingService({
        model: config.OPENAI_EMBEDDING_MODEL,
        cacheTtlMs: config.EMBEDDING_CACHE_TTL_SECONDS * 1000,
        cacheMaxEntries: config.EMBEDDING_CACHE_MAX_ENTRIES
      }),
    vectorIndex: overrides.vectorIndex ?? createQdrantVectorIndex({ collection: config.QDRANT_COLLECTION }),
    settings
  });
}
