import type { EventIntent, ProfileAttributeIntent } from "../intent/types.js";
import type { SearchLimits } from "../query/settings.js";
import { runSearchStage, type StageRuntime } from "./stage-executor.js";
import type { AcceptedEvent, StageQuery, StageResult } from "./types.js";

export const searchProfileAttributes = (
  attributes: readonly ProfileAttributeIntent[],
  limits: Pick<SearchLimits, "profile">,
  runtime: StageRuntime
): Promise<StageResult> => {
  const queries: StageQuery[] = attributes
    .filter((attribute) => attribute.searchText.trim().length > 0)
    .map((attribute) => ({
      searchText: attribute.searchText,
      attributeName: attribute.attributeName,
      recordType: "PROFILE_ATTRIBUTE",
      limit: limits.profile
    }));
  return runSearchStage("attribute", queries, runtime);
};

export const searchEvents = (
  events: readonly EventIntent[],
  limits: Pick<SearchLimits, "event">,
  runtime: StageRuntime
): Promise<StageResult> => {
  const queries: StageQuery[] = events
    .filter((event) => event.eventSearchText.trim().length > 0)
    .map((event) => ({
      searchText: event.eventSearchText,
      recordType: "EVENT",
      limit: limits.event
    }));
  return runSearchStage("event", queries, runtime);
};

/**
 * Searches each event's attribute phrases inside the events accepted for
 * that event's own search text. Events with no accepted match are skipped.
 */
export const searchEventAttributes = (
  events: readonly EventIntent[],
  acceptedEvents: readonly AcceptedEvent[],
  limits: Pick<SearchLimits, "eventAttribute">,
  runtime: StageRuntime
): Promise<StageResult> => {
  const queries: StageQuery[] = [];
  for (const event of events) {
    const scope = [
      ...new Set(
        acceptedEvents
          .filter((accepted) => accepted.eventSearchText === event.eventSearchText)
          .map((accepted) => accepted.eventId)
      )
    ];
    if (scope.length === 0) {
      continue;
    }
    for (const text of event.eventAttributeTexts) {
      if (text.trim().length === 0) {
        continue;
      }
      queries.push({
        searchText: text,
        recordType: "EVENT_ATTRIBUTE",
        groupKeys: scope,
        limit: limits.eventAttribute
      });
    }
  }
  return runSearchStage("event_attribute", queries, runtime);
};
