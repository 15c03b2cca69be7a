import { randomUUID } from "node:crypto";
import { serializeError } from "../../errors.js";
import { createLogger, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate, recordQueryLatency } from "../../observability/metrics.js";
import { acceptEventHits, aggregate, toAcceptedEvents } from "../aggregation/aggregator.js";
import type { AggregationInput, FinalAnswer } from "../aggregation/types.js";
import type { IntentExtractor } from "../intent/intent-extractor.js";
import type { StructuredIntent } from "../intent/types.js";
import { route, toIntentType, type ExecutionPlan } from "../routing/router.js";
import { emptyStageResult, type StageRuntime } from "../search/stage-executor.js";
import { searchEventAttributes, searchEvents, searchProfileAttributes } from "../search/stages.js";
import type { SearchStageName, StageResult } from "../search/types.js";
import { DEFAULT_QUERY_SETTINGS, assertValidQuerySettings, type QuerySettings } from "./settings.js";
import { QueryStateMachine } from "./state-machine.js";
import type {
  QueryOrchestratorDependencies,
  QueryRun,
  QueryRunOptions,
  QueryState
} from "./types.js";

const DEADLINE_MESSAGE = "query deadline exceeded";

const deadlineResult = (stage: SearchStageName): StageResult =>
  emptyStageResult(stage, [{ kind: "deadline_exceeded", stage, message: DEADLINE_MESSAGE }]);

/**
 * Resolves with the stage result, or with an empty deadline result as soon as
 * the query signal aborts, whichever comes first.
 */
const untilDeadline = (stage: SearchStageName, work: () => Promise<StageResult>, signal: AbortSignal): Promise<StageResult> => {
  if (signal.aborted) {
    return Promise.resolve(deadlineResult(stage));
  }

  return new Promise<StageResult>((resolve, reject) => {
    const onAbort = () => resolve(deadlineResult(stage));
    signal.addEventListener("abort", onAbort, { once: true });
    work().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
};

/**
 * Runs one natural-language query through extraction, routing, the search
 * stages and aggregation. Collaborators and settings are shared read-only
 * across runs; every run gets its own state machine and deadline.
 */
export class QueryOrchestrator {
  private readonly intentExtractor: IntentExtractor;
  private readonly settings: QuerySettings;
  private readonly now: () => number;
  private readonly createQueryId: () => string;

  constructor(private readonly dependencies: QueryOrchestratorDependencies) {
    this.settings = dependencies.settings ?? DEFAULT_QUERY_SETTINGS;
    assertValidQuerySettings(this.settings);
    this.intentExtractor = dependencies.intentExtractor;
    this.now = dependencies.now ?? Date.now;
    this.createQueryId = dependencies.createQueryId ?? randomUUID;
  }

  async processQuery(text: string, options: QueryRunOptions = {}): Promise<FinalAnswer> {
    const run = await this.runQuery(text, options);
    return run.answer;
  }

  async runQuery(text: string, options: QueryRunOptions = {}): Promise<QueryRun> {
    const query = text.trim();
    const queryId = this.createQueryId();
    const context: CorrelationContext = { requestId: options.requestId ?? null, queryId };
    const logger = createLogger(context);
    const startedAt = this.now();
    const machine = new QueryStateMachine(startedAt, this.now);
    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), this.settings.timeouts.queryDeadlineMs);
    let plan: ExecutionPlan | null = null;

    const enter = (state: QueryState) => {
      const transition = machine.transition(state);
      logger.debug("query.state.transition", {
        from: transition.from,
        to: transition.to,
        at_ms: transition.atMs
      });
    };

    logger.info("query.run.start", { query_length: query.length });

    try {
      enter("EXTRACTING");
      const extraction = await this.intentExtractor.extract(query, controller.signal, context);

      enter("ROUTING");
      plan = route(extraction.intent);
      logger.info("query.routed", { plan });

      enter("EXECUTING");
      const stages = await this.execute(plan, extraction.intent, controller.signal, context);

      enter("AGGREGATING");
      const answer = aggregate(
        stages,
        { query, intentType: toIntentType(plan), extraction, startedAt, now: this.now },
        this.settings
      );

      enter("DONE");
      const latencyMs = this.now() - startedAt;
      recordQueryLatency(latencyMs);
      logger.info("query.run.complete", {
        plan,
        extraction_method: extraction.provenance,
        total_results: answer.totalResults,
        has_ambiguity: answer.hasAmbiguity,
        diagnostic_count: answer.diagnostics.length,
        deadline_exceeded: controller.signal.aborted,
        state_durations_ms: machine.stateDurationsMs,
        latency_ms: latencyMs
      });

      return {
        answer,
        trace: {
          queryId,
          plan,
          transitions: machine.transitions,
          stateDurationsMs: machine.stateDurationsMs,
          deadlineExceeded: controller.signal.aborted
        }
      };
    } catch (error) {
      if (!machine.isTerminal()) {
        enter("ERRORED");
      }
      recordErrorRate("query_errored");
      logger.error("query.run.failed", {
        plan,
        state_durations_ms: machine.stateDurationsMs,
        ...serializeError(error)
      });
      throw error;
    } finally {
      clearTimeout(deadline);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }

  private async execute(
    plan: ExecutionPlan,
    intent: StructuredIntent,
    signal: AbortSignal,
    context: CorrelationContext
  ): Promise<AggregationInput> {
    const runtime: StageRuntime = {
      embeddingService: this.dependencies.embeddingService,
      vectorIndex: this.dependencies.vectorIndex,
      searchTimeoutMs: this.settings.timeouts.searchMs,
      signal,
      context,
      now: this.now
    };
    const limits = this.settings.searchLimits;

    const runAttributes = () =>
      untilDeadline("attribute", () => searchProfileAttributes(intent.profileAttributes, limits, runtime), signal);

    const runEventChain = async (): Promise<Pick<AggregationInput, "event" | "eventAttribute">> => {
      const event = await untilDeadline("event", () => searchEvents(intent.events, limits, runtime), signal);
      const accepted = toAcceptedEvents(acceptEventHits(event.hits, this.settings.similarityThreshold));
      if (accepted.length === 0) {
        return {
          event,
          eventAttribute: signal.aborted ? deadlineResult("event_attribute") : emptyStageResult("event_attribute")
        };
      }
      const eventAttribute = await untilDeadline(
        "event_attribute",
        () => searchEventAttributes(intent.events, accepted, limits, runtime),
        signal
      );
      return { event, eventAttribute };
    };

    switch (plan) {
      case "ATTRIBUTE_ONLY": {
        const attribute = await runAttributes();
        return { attribute, event: emptyStageResult("event"), eventAttribute: emptyStageResult("event_attribute") };
      }
      case "EVENT_ONLY": {
        const chain = await runEventChain();
        return { attribute: emptyStageResult("attribute"), ...chain };
      }
      case "MIXED": {
        const [attribute, chain] = await Promise.all([runAttributes(), runEventChain()]);
        return { attribute, ...chain };
      }
    }
  }
}
