import type { ExtractionResult } from "../intent/types.js";
import { DEFAULT_QUERY_SETTINGS, type ConfidenceBands, type QuerySettings } from "../query/settings.js";
import type { AcceptedEvent, SearchHit, StageHit } from "../search/types.js";
import type {
  AggregatedItem,
  AggregationContext,
  AggregationInput,
  AmbiguityGroup,
  ConfidenceLevel,
  FinalAnswer,
  QueryDiagnostic,
  ResultCategory
} from "./types.js";

export const EMPTY_SUMMARY = "No matching fields found";

const SUMMARY_NAMES_PER_CATEGORY = 3;

/** A record after merging every stage hit that pointed at it. */
export interface MergedHit {
  hit: SearchHit;
  originalSearchText: string;
  secondarySearchTexts: string[];
  parentEventId?: string;
  attributeName?: string;
}

const compareMerged = (left: MergedHit, right: MergedHit): number =>
  right.hit.score - left.hit.score || left.hit.recordId.localeCompare(right.hit.recordId);

const fromStageHit = (stageHit: StageHit, secondarySearchTexts: string[]): MergedHit => ({
  hit: stageHit.hit,
  originalSearchText: stageHit.originalSearchText,
  secondarySearchTexts,
  ...(stageHit.parentEventId === undefined ? {} : { parentEventId: stageHit.parentEventId }),
  ...(stageHit.attributeName === undefined ? {} : { attributeName: stageHit.attributeName })
});

/**
 * Collapses hits sharing a recordId into the best-scoring one. The phrases
 * behind the other hits are kept as secondary search texts.
 */
export const mergeByRecordId = (hits: readonly StageHit[]): MergedHit[] => {
  const byRecord = new Map<string, MergedHit>();

  for (const stageHit of hits) {
    const recordId = stageHit.hit.recordId;
    const existing = byRecord.get(recordId);
    if (!existing) {
      byRecord.set(recordId, fromStageHit(stageHit, []));
      continue;
    }

    if (stageHit.hit.score > existing.hit.score) {
      const secondary = [existing.originalSearchText, ...existing.secondarySearchTexts].filter(
        (text, index, all) => text !== stageHit.originalSearchText && all.indexOf(text) === index
      );
      byRecord.set(recordId, fromStageHit(stageHit, secondary));
      continue;
    }

    if (
      stageHit.originalSearchText !== existing.originalSearchText &&
      !existing.secondarySearchTexts.includes(stageHit.originalSearchText)
    ) {
      existing.secondarySearchTexts.push(stageHit.originalSearchText);
    }
  }

  return [...byRecord.values()].sort(compareMerged);
};

const groupBy = (items: readonly MergedHit[], keyOf: (item: MergedHit) => string): Map<string, MergedHit[]> => {
  const groups = new Map<string, MergedHit[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
};

/**
 * Event acceptance shared by the Event-Attribute stage and the aggregator:
 * merge by recordId, drop hits under the similarity threshold, keep the best
 * hit per event search text.
 */
export const acceptEventHits = (hits: readonly StageHit[], similarityThreshold: number): MergedHit[] => {
  const surviving = mergeByRecordId(hits).filter((item) => item.hit.score >= similarityThreshold);
  const best: MergedHit[] = [];
  for (const group of groupBy(surviving, (item) => item.originalSearchText).values()) {
    const [first] = group;
    if (first) {
      best.push(first);
    }
  }
  return best.sort(compareMerged);
};

export const toAcceptedEvents = (accepted: readonly MergedHit[]): AcceptedEvent[] =>
  accepted.map((item) => ({ eventSearchText: item.originalSearchText, eventId: item.hit.fieldId }));

export const toConfidenceLevel = (score: number, bands: ConfidenceBands): ConfidenceLevel => {
  if (score >= bands.high) {
    return "high";
  }
  if (score >= bands.medium) {
    return "medium";
  }
  return "low";
};

export const buildExplanation = (item: MergedHit): string => {
  const primary = `matched "${item.originalSearchText}" (score ${item.hit.score.toFixed(3)})`;
  if (item.secondarySearchTexts.length === 0) {
    return primary;
  }
  return `${primary}; also matched ${item.secondarySearchTexts.map((text) => `"${text}"`).join(", ")}`;
};

const summarizeCategory = (label: string, items: readonly AggregatedItem[]): string | null => {
  if (items.length === 0) {
    return null;
  }
  const names = items.slice(0, SUMMARY_NAMES_PER_CATEGORY).map((item) => item.displayName);
  const remaining = items.length - names.length;
  return `${label}: ${names.join(", ")}${remaining > 0 ? ` and ${remaining} more` : ""}`;
};

export const buildSummary = (
  profileAttributes: readonly AggregatedItem[],
  events: readonly AggregatedItem[],
  eventAttributes: readonly AggregatedItem[]
): string => {
  const parts = [
    summarizeCategory("Profile attributes", profileAttributes),
    summarizeCategory("Events", events),
    summarizeCategory("Event attributes", eventAttributes)
  ].filter((part): part is string => part !== null);

  return parts.length > 0 ? `${parts.join(". ")}.` : EMPTY_SUMMARY;
};

export const extractionWeight = (extraction: ExtractionResult, settings: QuerySettings): number =>
  extraction.provenance === "llm" ? 1 : settings.ruleBasedConfidenceWeight;

interface CategoryResolution {
  kept: MergedHit[];
  groups: Array<{ originalSearchText: string; members: MergedHit[] }>;
}

const parentEventOf = (item: MergedHit): string => item.parentEventId ?? item.hit.groupKey;

/**
 * Flags every originalSearchText with more than one member at or above the
 * ambiguity threshold. `keepKey` picks the best member per key for the result
 * list; without one every member stays.
 */
const resolveCategory = (
  items: readonly MergedHit[],
  ambiguityThreshold: number,
  keepKey?: (item: MergedHit) => string
): CategoryResolution => {
  const groups: CategoryResolution["groups"] = [];
  for (const [originalSearchText, members] of groupBy(items, (item) => item.originalSearchText)) {
    const ambiguous = members.filter((member) => member.hit.score >= ambiguityThreshold);
    if (ambiguous.length > 1) {
      groups.push({ originalSearchText, members: ambiguous });
    }
  }

  const kept = keepKey
    ? [...groupBy(items, keepKey).values()].flatMap((members) => members.slice(0, 1))
    : [...items];

  return { kept: kept.sort(compareMerged), groups };
};

const freezeList = <T>(items: T[]): readonly T[] => Object.freeze(items);

/**
 * Folds the three stage results into the final answer: merge by recordId,
 * similarity threshold, linkage repair of event attributes, ambiguity
 * detection, confidence banding and the summary line. Never throws.
 */
export function aggregate(
  input: AggregationInput,
  context: AggregationContext,
  settings: QuerySettings = DEFAULT_QUERY_SETTINGS
): FinalAnswer {
  const threshold = settings.similarityThreshold;
  const passes = (item: MergedHit) => item.hit.score >= threshold;

  const profileCandidates = mergeByRecordId(input.attribute.hits).filter(passes);
  const eventCandidates = mergeByRecordId(input.event.hits).filter(passes);
  const acceptedEvents = acceptEventHits(input.event.hits, threshold);
  const eventNames = new Map(acceptedEvents.map((event) => [event.hit.fieldId, event.hit.displayName]));

  const eventAttributeCandidates = mergeByRecordId(input.eventAttribute.hits)
    .filter(passes)
    .filter((item) => eventNames.has(parentEventOf(item)));

  const profile = resolveCategory(profileCandidates, settings.ambiguityThreshold);
  const events = resolveCategory(eventCandidates, settings.ambiguityThreshold, (item) => item.originalSearchText);
  const eventAttributes = resolveCategory(eventAttributeCandidates, settings.ambiguityThreshold, (item) =>
    JSON.stringify([item.originalSearchText, parentEventOf(item)])
  );

  const toItem = (item: MergedHit, category: ResultCategory): AggregatedItem => {
    const eventId = parentEventOf(item);
    return Object.freeze({
      recordId: item.hit.recordId,
      fieldId: item.hit.fieldId,
      displayName: item.hit.displayName,
      groupKey: item.hit.groupKey,
      originalSearchText: item.originalSearchText,
      secondarySearchTexts: freezeList([...item.secondarySearchTexts]),
      score: item.hit.score,
      confidenceLevel: toConfidenceLevel(item.hit.score, settings.confidenceBands),
      explanation: buildExplanation(item),
      ...(category === "profile_attribute" && item.attributeName !== undefined
        ? { attributeName: item.attributeName }
        : {}),
      ...(category === "event_attribute" ? { eventId, eventName: eventNames.get(eventId) ?? eventId } : {})
    });
  };

  const profileItems = profile.kept.map((item) => toItem(item, "profile_attribute"));
  const eventItems = events.kept.map((item) => toItem(item, "event"));
  const eventAttributeItems = eventAttributes.kept.map((item) => toItem(item, "event_attribute"));

  const toGroups = (category: ResultCategory, resolution: CategoryResolution): AmbiguityGroup[] =>
    resolution.groups.map((group) =>
      Object.freeze({
        category,
        originalSearchText: group.originalSearchText,
        candidates: freezeList(group.members.map((member) => toItem(member, category)))
      })
    );
  const ambiguousGroups = [
    ...toGroups("profile_attribute", profile),
    ...toGroups("event", events),
    ...toGroups("event_attribute", eventAttributes)
  ];

  const allItems = [...profileItems, ...eventItems, ...eventAttributeItems];
  const meanScore = allItems.length > 0 ? allItems.reduce((sum, item) => sum + item.score, 0) / allItems.length : 0;

  const diagnostics: QueryDiagnostic[] = [
    ...(context.extraction.provenance === "rule_based"
      ? [{ kind: "extraction_degraded" as const, reason: context.extraction.reason }]
      : []),
    ...input.attribute.diagnostics,
    ...input.event.diagnostics,
    ...input.eventAttribute.diagnostics
  ];

  const now = context.now ?? Date.now;

  return Object.freeze({
    query: context.query,
    intentType: context.intentType,
    profileAttributes: freezeList(profileItems),
    events: freezeList(eventItems),
    eventAttributes: freezeList(eventAttributeItems),
    summary: buildSummary(profileItems, eventItems, eventAttributeItems),
    totalResults: allItems.length,
    confidenceScore: meanScore * extractionWeight(context.extraction, settings),
    hasAmbiguity: ambiguousGroups.length > 0,
    ambiguousGroups: freezeList(ambiguousGroups),
    elapsedTime: Math.max(0, now() - context.startedAt) / 1000,
    extraction: context.extraction,
    diagnostics: freezeList(diagnostics)
  });
}
