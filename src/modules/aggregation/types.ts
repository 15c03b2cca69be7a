import type { ExtractionFallbackReason, ExtractionResult } from "../intent/types.js";
import type { IntentType } from "../routing/router.js";
import type { StageDiagnostic, StageResult } from "../search/types.js";

export type ResultCategory = "profile_attribute" | "event" | "event_attribute";

export type ConfidenceLevel = "high" | "medium" | "low";

export interface AggregatedItem {
  readonly recordId: string;
  readonly fieldId: string;
  readonly displayName: string;
  readonly groupKey: string;
  readonly originalSearchText: string;
  /** Other phrases of the same query that matched this record with a lower score. */
  readonly secondarySearchTexts: readonly string[];
  readonly score: number;
  readonly confidenceLevel: ConfidenceLevel;
  readonly explanation: string;
  readonly attributeName?: string;
  readonly eventId?: string;
  readonly eventName?: string;
}

export interface AmbiguityGroup {
  readonly category: ResultCategory;
  readonly originalSearchText: string;
  /** Best first. Event-attribute candidates carry their own `eventId`. */
  readonly candidates: readonly AggregatedItem[];
}

export type QueryDiagnostic = StageDiagnostic | { kind: "extraction_degraded"; reason: ExtractionFallbackReason };

export interface FinalAnswer {
  readonly query: string;
  readonly intentType: IntentType;
  readonly profileAttributes: readonly AggregatedItem[];
  readonly events: readonly AggregatedItem[];
  readonly eventAttributes: readonly AggregatedItem[];
  readonly summary: string;
  readonly totalResults: number;
  /**
   * Mean score of the accepted items, multiplied by `ruleBasedConfidenceWeight`
   * when the intent came from the rule-based extractor. Not a plain mean then.
   */
  readonly confidenceScore: number;
  readonly hasAmbiguity: boolean;
  readonly ambiguousGroups: readonly AmbiguityGroup[];
  /** Seconds. */
  readonly elapsedTime: number;
  readonly extraction: ExtractionResult;
  readonly diagnostics: readonly QueryDiagnostic[];
}

export interface AggregationInput {
  attribute: StageResult;
  event: StageResult;
  eventAttribute: StageResult;
}

export interface AggregationContext {
  query: string;
  intentType: IntentType;
  extraction: ExtractionResult;
  /** Epoch milliseconds at which the run started. */
  startedAt: number;
  now?: () => number;
}
