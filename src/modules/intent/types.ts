export interface ProfileAttributeIntent {
  readonly attributeName: string;
  readonly searchText: string;
}

export interface EventIntent {
  readonly eventSearchText: string;
  readonly eventAttributeTexts: readonly string[];
}

export interface StructuredIntent {
  readonly profileAttributes: readonly ProfileAttributeIntent[];
  readonly events: readonly EventIntent[];
}

export type ExtractionFallbackReason =
  | "timeout"
  | "aborted"
  | "transport_error"
  | "empty_response"
  | "invalid_json"
  | "schema_mismatch"
  | "disabled";

export interface LlmExtraction {
  provenance: "llm";
  intent: StructuredIntent;
  confidence: number;
}

export interface RuleBasedExtraction {
  provenance: "rule_based";
  intent: StructuredIntent;
  confidence: number;
  reason: ExtractionFallbackReason;
}

export type ExtractionResult = LlmExtraction | RuleBasedExtraction;

export interface LlmCompletionRequest {
  system: string;
  user: string;
}

/** Sends one prompt pair to a chat model and resolves with the raw reply text. */
export interface LlmExtractionClient {
  complete(request: LlmCompletionRequest, signal?: AbortSignal): Promise<string>;
}

export const EMPTY_INTENT: StructuredIntent = Object.freeze({
  profileAttributes: [],
  events: []
});

export const freezeIntent = (intent: StructuredIntent): StructuredIntent =>
  Object.freeze({
    profileAttributes: Object.freeze(intent.profileAttributes.map((attribute) => Object.freeze({ ...attribute }))),
    events: Object.freeze(
      intent.events.map((event) =>
        Object.freeze({
          eventSearchText: event.eventSearchText,
          eventAttributeTexts: Object.freeze([...event.eventAttributeTexts])
        })
      )
    )
  });
