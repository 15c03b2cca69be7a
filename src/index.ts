export { buildApp, type BuildAppOptions } from "./app.js";
export { getConfig, parseEnv, type Config, type Env } from "./config/index.js";
export {
  CallAbortedError,
  CallTimeoutError,
  ConfigurationInvalidError,
  StageSearchFailedError
} from "./errors.js";

export { aggregate } from "./modules/aggregation/aggregator.js";
export { toFinalAnswerJson, type FinalAnswerJson } from "./modules/aggregation/serialize.js";
export type {
  AggregatedItem,
  AmbiguityGroup,
  ConfidenceLevel,
  FinalAnswer,
  QueryDiagnostic,
  ResultCategory
} from "./modules/aggregation/types.js";

export { createIntentExtractor, type IntentExtractor } from "./modules/intent/intent-extractor.js";
export { createOpenAIExtractionClient } from "./modules/intent/openai-extraction-client.js";
export { extractRuleBasedIntent } from "./modules/intent/rule-based-extractor.js";
export type {
  EventIntent,
  ExtractionResult,
  LlmExtractionClient,
  ProfileAttributeIntent,
  StructuredIntent
} from "./modules/intent/types.js";

export { route, type ExecutionPlan, type IntentType } from "./modules/routing/router.js";

export { createOpenAIEmbeddingService } from "./modules/search/embedding-service.js";
export { createQdrantVectorIndex } from "./modules/search/vector-index.js";
export type { EmbeddingService, SearchHit, StageResult, VectorIndex } from "./modules/search/types.js";

export { createQueryOrchestrator } from "./modules/query/create-query-orchestrator.js";
export { QueryOrchestrator } from "./modules/query/query-orchestrator.js";
export { DEFAULT_QUERY_SETTINGS, mergeQuerySettings, type QuerySettings } from "./modules/query/settings.js";
export type { QueryRun, QueryRunTrace, QueryState } from "./modules/query/types.js";
