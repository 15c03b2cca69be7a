import type { QueryDiagnostic, AggregatedItem, AmbiguityGroup, FinalAnswer } from "./types.js";

export interface AggregatedItemJson {
  field_id: string;
  display_name: string;
  group_key: string;
  original_search_text: string;
  score: number;
  confidence_level: string;
  explanation: string;
  original_attribute?: string;
  event_idname?: string;
  event_name?: string;
}

export interface AmbiguityGroupJson {
  category: string;
  original_search_text: string;
  candidates: AggregatedItemJson[];
}

export interface DiagnosticJson {
  kind: string;
  stage?: string;
  reason?: string;
  message?: string;
  search_text?: string;
}

export interface FinalAnswerJson {
  query: string;
  intent_type: string;
  profile_attributes: AggregatedItemJson[];
  events: AggregatedItemJson[];
  event_attributes: AggregatedItemJson[];
  summary: string;
  total_results: number;
  confidence_score: number;
  has_ambiguity: boolean;
  ambiguous_options: AmbiguityGroupJson[];
  execution_time: number;
  extraction_method: string;
  diagnostics: DiagnosticJson[];
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const itemToJson = (item: AggregatedItem): AggregatedItemJson => ({
  field_id: item.fieldId,
  display_name: item.displayName,
  group_key: item.groupKey,
  original_search_text: item.originalSearchText,
  score: round(item.score, 3),
  confidence_level: item.confidenceLevel,
  explanation: item.explanation,
  ...(item.attributeName === undefined ? {} : { original_attribute: item.attributeName }),
  ...(item.eventId === undefined ? {} : { event_idname: item.eventId }),
  ...(item.eventName === undefined ? {} : { event_name: item.eventName })
});

const groupToJson = (group: AmbiguityGroup): AmbiguityGroupJson => ({
  category: group.category,
  original_search_text: group.originalSearchText,
  candidates: group.candidates.map(itemToJson)
});

const diagnosticToJson = (diagnostic: QueryDiagnostic): DiagnosticJson => {
  if (diagnostic.kind === "extraction_degraded") {
    return { kind: diagnostic.kind, reason: diagnostic.reason };
  }
  return {
    kind: diagnostic.kind,
    stage: diagnostic.stage,
    message: diagnostic.message,
    ...(diagnostic.searchText === undefined ? {} : { search_text: diagnostic.searchText })
  };
};

/** Flat snake_case document returned by the HTTP surface. */
export const toFinalAnswerJson = (answer: FinalAnswer): FinalAnswerJson => ({
  query: answer.query,
  intent_type: answer.intentType,
  profile_attributes: answer.profileAttributes.map(itemToJson),
  events: answer.events.map(itemToJson),
  event_attributes: answer.eventAttributes.map(itemToJson),
  summary: answer.summary,
  total_results: answer.totalResults,
  confidence_score: round(answer.confidenceScore, 2),
  has_ambiguity: answer.hasAmbiguity,
  ambiguous_options: answer.ambiguousGroups.map(groupToJson),
  execution_time: round(answer.elapsedTime, 2),
  extraction_method: answer.extraction.provenance,
  diagnostics: answer.diagnostics.map(diagnosticToJson)
});
