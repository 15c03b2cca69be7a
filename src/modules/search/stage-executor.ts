import { withTimeout } from "../../clients/timeout.js";
import { CallAbortedError, ConfigurationInvalidError, StageSearchFailedError, mapErrorMessage, serializeError } from "../../errors.js";
import { logDebug, logError, logInfo, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate, recordStageLatency } from "../../observability/metrics.js";
import type {
  EmbeddingService,
  SearchHit,
  SearchStageName,
  StageDiagnostic,
  StageHit,
  StageQuery,
  StageResult,
  VectorIndex
} from "./types.js";

export interface StageRuntime {
  embeddingService: EmbeddingService;
  vectorIndex: VectorIndex;
  searchTimeoutMs: number;
  /** Query-wide cancellation; aborting it abandons every in-flight call of the stage. */
  signal?: AbortSignal;
  context?: CorrelationContext;
  now?: () => number;
  logInfo?: typeof logInfo;
  logError?: typeof logError;
}

const resolveRuntime = (runtime: StageRuntime) => ({
  ...runtime,
  context: runtime.context ?? {},
  now: runtime.now ?? Date.now,
  logInfo: runtime.logInfo ?? logInfo,
  logError: runtime.logError ?? logError
});

export const emptyStageResult = (stage: SearchStageName, diagnostics: StageDiagnostic[] = []): StageResult => ({
  stage,
  hits: [],
  diagnostics,
  latencyMs: 0
});

const toDiagnostic = (stage: SearchStageName, error: unknown, searchText?: string): StageDiagnostic => ({
  kind: error instanceof CallAbortedError ? "deadline_exceeded" : "stage_search_failed",
  stage,
  message: mapErrorMessage(error),
  ...(searchText === undefined ? {} : { searchText })
});

const uniqueTexts = (queries: readonly StageQuery[]): string[] => [...new Set(queries.map((query) => query.searchText))];

/**
 * Shared body of every search stage: one batched embedding call for all
 * distinct search texts, then one filtered index search per query. Failures
 * are folded into diagnostics; only configuration faults propagate.
 */
export async function runSearchStage(
  stage: SearchStageName,
  queries: readonly StageQuery[],
  runtime: StageRuntime
): Promise<StageResult> {
  const resolved = resolveRuntime(runtime);
  if (queries.length === 0) {
    return emptyStageResult(stage);
  }

  const startedAt = resolved.now();
  const diagnostics: StageDiagnostic[] = [];
  const finish = (hits: StageHit[]): StageResult => {
    const latencyMs = resolved.now() - startedAt;
    recordStageLatency(stage, latencyMs);
    resolved.logInfo("search.stage.complete", resolved.context, {
      stage,
      query_count: queries.length,
      hit_count: hits.length,
      diagnostic_count: diagnostics.length,
      latency_ms: latencyMs
    });
    return { stage, hits, diagnostics, latencyMs };
  };
  const fail = (error: unknown, searchText?: string): void => {
    if (error instanceof ConfigurationInvalidError) {
      throw error;
    }
    const diagnostic = toDiagnostic(stage, error, searchText);
    diagnostics.push(diagnostic);
    recordErrorRate(`stage_${stage}_${diagnostic.kind}`);
    resolved.logError("search.stage.failed", resolved.context, {
      stage,
      search_text: searchText ?? null,
      ...serializeError(error)
    });
  };

  const texts = uniqueTexts(queries);
  const vectorsByText = new Map<string, number[]>();
  try {
    const vectors = await withTimeout(
      `${stage}.embedding`,
      (signal) => resolved.embeddingService.encode(texts, signal),
      resolved.searchTimeoutMs,
      resolved.signal
    );
    if (vectors.length !== texts.length) {
      throw new StageSearchFailedError(
        stage,
        `Embedding service returned ${vectors.length} vectors for ${texts.length} texts.`
      );
    }
    texts.forEach((text, index) => {
      const vector = vectors[index];
      if (vector) {
        vectorsByText.set(text, vector);
      }
    });
  } catch (error) {
    fail(error);
    return finish([]);
  }

  const perQuery = await Promise.all(
    queries.map(async (query): Promise<StageHit[]> => {
      const vector = vectorsByText.get(query.searchText);
      if (!vector) {
        return [];
      }
      let hits: SearchHit[];
      try {
        hits = await withTimeout(
          `${stage}.index_search`,
          (signal) =>
            resolved.vectorIndex.search(
              {
                vector,
                recordType: query.recordType,
                groupKeys: query.groupKeys,
                limit: query.limit
              },
              signal
            ),
          resolved.searchTimeoutMs,
          resolved.signal
        );
      } catch (error) {
        fail(error, query.searchText);
        return [];
      }

      logDebug("search.stage.query", resolved.context, {
        stage,
        search_text: query.searchText,
        group_keys: query.groupKeys ?? null,
        hits: hits.map((hit) => ({ field_id: hit.fieldId, score: hit.score }))
      });

      return hits.map((hit) => ({
        hit,
        originalSearchText: query.searchText,
        ...(stage === "event_attribute" ? { parentEventId: hit.groupKey } : {}),
        ...(query.attributeName === undefined ? {} : { attributeName: query.attributeName })
      }));
    })
  );

  return finish(perQuery.flat());
}
