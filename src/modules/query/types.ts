import type { FinalAnswer } from "../aggregation/types.js";
import type { IntentExtractor } from "../intent/intent-extractor.js";
import type { ExecutionPlan } from "../routing/router.js";
import type { EmbeddingService, VectorIndex } from "../search/types.js";
import type { QuerySettings } from "./settings.js";

export type { FinalAnswer, QueryDiagnostic } from "../aggregation/types.js";

export type QueryState = "START" | "EXTRACTING" | "ROUTING" | "EXECUTING" | "AGGREGATING" | "DONE" | "ERRORED";

export interface StateTransition {
  from: QueryState;
  to: QueryState;
  /** Milliseconds since the run started. */
  atMs: number;
}

export interface QueryRunTrace {
  queryId: string;
  plan: ExecutionPlan | null;
  transitions: readonly StateTransition[];
  stateDurationsMs: Readonly<Partial<Record<QueryState, number>>>;
  deadlineExceeded: boolean;
}

export interface QueryRun {
  answer: FinalAnswer;
  trace: QueryRunTrace;
}

export interface QueryRunOptions {
  requestId?: string | null;
}

export interface QueryOrchestratorDependencies {
  intentExtractor: IntentExtractor;
  embeddingService: EmbeddingService;
  vectorIndex: VectorIndex;
  settings?: QuerySettings;
  now?: () => number;
  createQueryId?: () => string;
}
