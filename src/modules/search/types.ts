export type RecordType = "PROFILE_ATTRIBUTE" | "EVENT" | "EVENT_ATTRIBUTE";

export type SearchStageName = "attribute" | "event" | "event_attribute";

export interface SearchHit {
  recordId: string;
  score: number;
  recordType: RecordType;
  /** Scoping value: the source table for attributes and events, the parent event's fieldId for event attributes. */
  groupKey: string;
  displayName: string;
  fieldId: string;
  rawMetadata: Record<string, unknown>;
}

export interface StageHit {
  hit: SearchHit;
  originalSearchText: string;
  parentEventId?: string;
  attributeName?: string;
}

export interface StageDiagnostic {
  kind: "stage_search_failed" | "deadline_exceeded";
  stage: SearchStageName;
  message: string;
  searchText?: string;
}

export interface StageResult {
  stage: SearchStageName;
  hits: StageHit[];
  diagnostics: StageDiagnostic[];
  latencyMs: number;
}

export interface VectorSearchRequest {
  vector: number[];
  recordType: RecordType;
  /** Restricts results to records whose groupKey is one of these values. */
  groupKeys?: string[];
  limit: number;
}

export interface EmbeddingService {
  encode(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface VectorIndex {
  search(request: VectorSearchRequest, signal?: AbortSignal): Promise<SearchHit[]>;
}

export interface StageQuery {
  searchText: string;
  recordType: RecordType;
  groupKeys?: string[];
  limit: number;
  attributeName?: string;
}

/** An event the Event stage's hits were narrowed down to, keyed by the search text that found it. */
export interface AcceptedEvent {
  eventSearchText: string;
  eventId: string;
}
