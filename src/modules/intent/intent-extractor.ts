import { withTimeout } from "../../clients/timeout.js";
import { CallAbortedError, CallTimeoutError, mapErrorMessage } from "../../errors.js";
import { logInfo, logWarn, type CorrelationContext } from "../../observability/logger.js";
import { recordExtractionFallback, recordExtractionLatency } from "../../observability/metrics.js";
import {
  DEFAULT_INTENT_EXTRACTION_TEMPLATE,
  INTENT_EXTRACTION_SYSTEM_PROMPT,
  buildIntentExtractionUserPrompt
} from "../../prompts/index.js";
import { parseLlmExtractionResponse } from "./llm-response.js";
import { RULE_BASED_CONFIDENCE, extractRuleBasedIntent } from "./rule-based-extractor.js";
import {
  freezeIntent,
  type ExtractionFallbackReason,
  type ExtractionResult,
  type LlmExtractionClient
} from "./types.js";

export const DEFAULT_LLM_CONFIDENCE = 0.9;

export interface IntentExtractor {
  /** Resolves with the LLM reading of the query, or the rule-based one when the LLM path fails. Never rejects. */
  extract(query: string, signal?: AbortSignal, context?: CorrelationContext): Promise<ExtractionResult>;
}

export interface IntentExtractorDependencies {
  /** `null` disables the LLM path. */
  llmClient: LlmExtractionClient | null;
  timeoutMs: number;
  template?: string;
  systemPrompt?: string;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

type LlmAttempt =
  | { ok: true; result: ExtractionResult }
  | { ok: false; reason: ExtractionFallbackReason; detail: string };

const classifyFailure = (error: unknown): ExtractionFallbackReason => {
  if (error instanceof CallTimeoutError) {
    return "timeout";
  }
  if (error instanceof CallAbortedError) {
    return "aborted";
  }
  return "transport_error";
};

export function createIntentExtractor(dependencies: IntentExtractorDependencies): IntentExtractor {
  const resolved = {
    ...dependencies,
    template: dependencies.template ?? DEFAULT_INTENT_EXTRACTION_TEMPLATE,
    systemPrompt: dependencies.systemPrompt ?? INTENT_EXTRACTION_SYSTEM_PROMPT,
    now: dependencies.now ?? Date.now,
    logInfo: dependencies.logInfo ?? logInfo,
    logWarn: dependencies.logWarn ?? logWarn
  };

  const attemptLlm = async (
    client: LlmExtractionClient,
    query: string,
    signal: AbortSignal | undefined
  ): Promise<LlmAttempt> => {
    let raw: string;
    try {
      raw = await withTimeout(
        "intent.llm_extraction",
        (callSignal) =>
          client.complete(
            {
              system: resolved.systemPrompt,
              user: buildIntentExtractionUserPrompt(resolved.template, query)
            },
            callSignal
          ),
        resolved.timeoutMs,
        signal
      );
    } catch (error) {
      return { ok: false, reason: classifyFailure(error), detail: mapErrorMessage(error) };
    }

    const parsed = parseLlmExtractionResponse(raw);
    if (!parsed.ok) {
      return parsed;
    }

    return {
      ok: true,
      result: {
        provenance: "llm",
        intent: freezeIntent(parsed.intent),
        confidence: parsed.confidence ?? DEFAULT_LLM_CONFIDENCE
      }
    };
  };

  return {
    async extract(query, signal, context = {}) {
      const startedAt = resolved.now();
      const attempt: LlmAttempt = resolved.llmClient
        ? await attemptLlm(resolved.llmClient, query, signal)
        : { ok: false, reason: "disabled", detail: "LLM extraction is disabled" };

      let result: ExtractionResult;
      if (attempt.ok) {
        result = attempt.result;
      } else {
        recordExtractionFallback(attempt.reason);
        resolved.logWarn("intent.extraction.degraded", context, {
          reason: attempt.reason,
          detail: attempt.detail
        });
        result = {
          provenance: "rule_based",
          intent: freezeIntent(extractRuleBasedIntent(query)),
          confidence: RULE_BASED_CONFIDENCE,
          reason: attempt.reason
        };
      }

      const latencyMs = resolved.now() - startedAt;
      recordExtractionLatency(latencyMs);
      resolved.logInfo("intent.extraction.complete", context, {
        provenance: result.provenance,
        confidence: result.confidence,
        profile_attribute_count: result.intent.profileAttributes.length,
        event_count: result.intent.events.length,
        latency_ms: latencyMs
      });
      return result;
    }
  };
}
