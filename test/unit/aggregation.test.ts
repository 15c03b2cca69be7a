import { describe, expect, it } from "vitest";
import {
  EMPTY_SUMMARY,
  acceptEventHits,
  aggregate,
  mergeByRecordId,
  toConfidenceLevel
} from "../../src/modules/aggregation/aggregator.js";
import { toFinalAnswerJson } from "../../src/modules/aggregation/serialize.js";
import type { AggregationContext, AggregationInput } from "../../src/modules/aggregation/types.js";
import { EMPTY_INTENT, type ExtractionResult } from "../../src/modules/intent/types.js";
import type { SearchHit, SearchStageName, StageDiagnostic, StageHit, StageResult } from "../../src/modules/search/types.js";
import { makeHit } from "../../tests/helpers/fakes.js";

const LLM_EXTRACTION: ExtractionResult = { provenance: "llm", intent: EMPTY_INTENT, confidence: 0.9 };

const stage = (name: SearchStageName, hits: StageHit[] = [], diagnostics: StageDiagnostic[] = []): StageResult => ({
  stage: name,
  hits,
  diagnostics,
  latencyMs: 5
});

const stageHit = (hit: SearchHit, originalSearchText: string, extra: Partial<StageHit> = {}): StageHit => ({
  hit,
  originalSearchText,
  ...extra
});

const eventHit = (fieldId: string, score: number, displayName = fieldId): SearchHit =>
  makeHit({ recordId: `evt-${fieldId}`, fieldId, displayName, score, recordType: "EVENT", groupKey: "events" });

const eventAttributeHit = (fieldId: string, parent: string, score: number, displayName = fieldId): SearchHit =>
  makeHit({ recordId: `ea-${fieldId}`, fieldId, displayName, score, recordType: "EVENT_ATTRIBUTE", groupKey: parent });

const input = (parts: Partial<AggregationInput>): AggregationInput => ({
  attribute: parts.attribute ?? stage("attribute"),
  event: parts.event ?? stage("event"),
  eventAttribute: parts.eventAttribute ?? stage("event_attribute")
});

const context = (overrides: Partial<AggregationContext> = {}): AggregationContext => ({
  query: "test query",
  intentType: "profile",
  extraction: LLM_EXTRACTION,
  startedAt: 1000,
  now: () => 3500,
  ...overrides
});

describe("modules/aggregation/aggregator", () => {
  it("merges hits on the same record, keeping the best score and the other phrases", () => {
    const merged = mergeByRecordId([
      stageHit(makeHit({ recordId: "city", score: 0.7 }), "in Berlin"),
      stageHit(makeHit({ recordId: "country", score: 0.9 }), "Germany"),
      stageHit(makeHit({ recordId: "city", score: 0.82 }), "lives in Berlin"),
      stageHit(makeHit({ recordId: "city", score: 0.82 }), "in Berlin")
    ]);

    expect(merged.map((item) => [item.hit.recordId, item.hit.score, item.originalSearchText, item.secondarySearchTexts])).toEqual([
      ["country", 0.9, "Germany", []],
      ["city", 0.82, "lives in Berlin", ["in Berlin"]]
    ]);
  });

  it("keeps the first hit on a score tie", () => {
    const merged = mergeByRecordId([
      stageHit(makeHit({ recordId: "age", score: 0.8 }), "aged 30"),
      stageHit(makeHit({ recordId: "age", score: 0.8 }), "thirty years old")
    ]);

    expect(merged).toHaveLength(1);
    expect(merged[0]?.originalSearchText).toBe("aged 30");
    expect(merged[0]?.secondarySearchTexts).toEqual(["thirty years old"]);
  });

  it("accepts the best event hit per search text above the threshold", () => {
    const accepted = acceptEventHits(
      [
        stageHit(eventHit("buy_in_store", 0.8), "purchase"),
        stageHit(eventHit("buy_online", 0.9), "purchase"),
        stageHit(eventHit("view_item", 0.5), "browse")
      ],
      0.65
    );

    expect(accepted.map((item) => [item.originalSearchText, item.hit.fieldId])).toEqual([["purchase", "buy_online"]]);
  });

  it("bands confidence levels inclusively", () => {
    const bands = { high: 0.8, medium: 0.6 };
    expect(toConfidenceLevel(0.8, bands)).toBe("high");
    expect(toConfidenceLevel(0.6, bands)).toBe("medium");
    expect(toConfidenceLevel(0.59, bands)).toBe("low");
  });

  it("answers an attribute-only query with one matching hit", () => {
    const answer = aggregate(
      input({
        attribute: stage("attribute", [
          stageHit(makeHit({ recordId: "age", score: 0.85 }), "age 25 to 35", { attributeName: "age" })
        ])
      }),
      context()
    );

    expect(answer.intentType).toBe("profile");
    expect(answer.events).toEqual([]);
    expect(answer.profileAttributes).toEqual([
      {
        recordId: "age",
        fieldId: "age",
        displayName: "age",
        groupKey: "user_profile",
        originalSearchText: "age 25 to 35",
        secondarySearchTexts: [],
        score: 0.85,
        confidenceLevel: "high",
        explanation: 'matched "age 25 to 35" (score 0.850)',
        attributeName: "age"
      }
    ]);
    expect(answer.confidenceScore).toBe(0.85);
    expect(answer.totalResults).toBe(1);
    expect(answer.summary).toBe("Profile attributes: age.");
    expect(answer.elapsedTime).toBe(2.5);
    expect(answer.hasAmbiguity).toBe(false);
  });

  it("drops hits below the similarity threshold", () => {
    const answer = aggregate(
      input({
        attribute: stage("attribute", [
          stageHit(makeHit({ recordId: "age", score: 0.65 }), "aged 30"),
          stageHit(makeHit({ recordId: "income", score: 0.64 }), "earns a lot")
        ])
      }),
      context()
    );

    expect(answer.profileAttributes.map((item) => item.fieldId)).toEqual(["age"]);
  });

  it("links event attributes to their accepted event and drops orphans", () => {
    const answer = aggregate(
      input({
        event: stage("event", [
          stageHit(eventHit("buy_online", 0.9, "Buy online"), "purchase"),
          stageHit(eventHit("view_item", 0.5), "browse")
        ]),
        eventAttribute: stage("event_attribute", [
          stageHit(eventAttributeHit("purchase_amount", "buy_online", 0.88), "purchase amount", { parentEventId: "buy_online" }),
          stageHit(eventAttributeHit("refund_amount", "refund", 0.9), "purchase amount", { parentEventId: "refund" }),
          stageHit(eventAttributeHit("item_category", "view_item", 0.85), "electronics", { parentEventId: "view_item" })
        ])
      }),
      context({ intentType: "event" })
    );

    expect(answer.events.map((item) => item.fieldId)).toEqual(["buy_online"]);
    expect(answer.eventAttributes).toHaveLength(1);
    expect(answer.eventAttributes[0]).toMatchObject({
      fieldId: "purchase_amount",
      eventId: "buy_online",
      eventName: "Buy online"
    });
    expect(answer.confidenceScore).toBeCloseTo(0.89, 10);
    expect(answer.summary).toBe("Events: Buy online. Event attributes: purchase_amount.");
  });

  it("flags ambiguous events and keeps only the best one in the result list", () => {
    const answer = aggregate(
      input({
        event: stage("event", [
          stageHit(eventHit("buy_online", 0.9), "purchase"),
          stageHit(eventHit("buy_in_store", 0.8), "purchase"),
          stageHit(eventHit("order_created", 0.7), "purchase")
        ])
      }),
      context({ intentType: "mixed" })
    );

    expect(answer.hasAmbiguity).toBe(true);
    expect(answer.events.map((item) => item.fieldId)).toEqual(["buy_online"]);
    expect(answer.ambiguousGroups).toHaveLength(1);
    expect(answer.ambiguousGroups[0]?.category).toBe("event");
    expect(answer.ambiguousGroups[0]?.originalSearchText).toBe("purchase");
    expect(answer.ambiguousGroups[0]?.candidates.map((item) => item.fieldId)).toEqual(["buy_online", "buy_in_store"]);
  });

  it("keeps every surviving profile match in score order and flags the near ties", () => {
    const answer = aggregate(
      input({
        attribute: stage("attribute", [
          stageHit(makeHit({ recordId: "city", score: 0.85 }), "location"),
          stageHit(makeHit({ recordId: "region", score: 0.8 }), "location"),
          stageHit(makeHit({ recordId: "country", score: 0.7 }), "location")
        ])
      }),
      context()
    );

    expect(answer.profileAttributes.map((item) => [item.fieldId, item.score])).toEqual([
      ["city", 0.85],
      ["region", 0.8],
      ["country", 0.7]
    ]);
    expect(answer.ambiguousGroups.map((group) => [group.category, group.candidates.map((item) => item.fieldId)])).toEqual([
      ["profile_attribute", ["city", "region"]]
    ]);
  });

  it("flags event attribute ambiguity across parent events for the same phrase", () => {
    const answer = aggregate(
      input({
        event: stage("event", [
          stageHit(eventHit("buy_online", 0.9), "purchase"),
          stageHit(eventHit("refund", 0.88), "refund")
        ]),
        eventAttribute: stage("event_attribute", [
          stageHit(eventAttributeHit("order_amount", "buy_online", 0.86), "amount", { parentEventId: "buy_online" }),
          stageHit(eventAttributeHit("refund_amount", "refund", 0.84), "amount", { parentEventId: "refund" })
        ])
      }),
      context({ intentType: "event" })
    );

    expect(answer.eventAttributes.map((item) => [item.fieldId, item.eventId])).toEqual([
      ["order_amount", "buy_online"],
      ["refund_amount", "refund"]
    ]);
    expect(answer.hasAmbiguity).toBe(true);
    expect(answer.ambiguousGroups).toHaveLength(1);
    expect(answer.ambiguousGroups[0]?.category).toBe("event_attribute");
    expect(answer.ambiguousGroups[0]?.originalSearchText).toBe("amount");
    expect(answer.ambiguousGroups[0]?.candidates.map((item) => [item.fieldId, item.eventId])).toEqual([
      ["order_amount", "buy_online"],
      ["refund_amount", "refund"]
    ]);
  });

  it("keeps the best event attribute per parent event", () => {
    const answer = aggregate(
      input({
        event: stage("event", [stageHit(eventHit("buy_online", 0.9), "purchase")]),
        eventAttribute: stage("event_attribute", [
          stageHit(eventAttributeHit("order_amount", "buy_online", 0.86), "amount", { parentEventId: "buy_online" }),
          stageHit(eventAttributeHit("total_amount", "buy_online", 0.7), "amount", { parentEventId: "buy_online" })
        ])
      }),
      context({ intentType: "event" })
    );

    expect(answer.eventAttributes.map((item) => item.fieldId)).toEqual(["order_amount"]);
    expect(answer.hasAmbiguity).toBe(false);
  });

  it("weights confidence for rule-based extraction and lists diagnostics after the degradation notice", () => {
    const failure: StageDiagnostic = { kind: "deadline_exceeded", stage: "event", message: "event.index_search was aborted" };
    const answer = aggregate(
      input({
        attribute: stage("attribute", [stageHit(makeHit({ recordId: "age", score: 0.85 }), "aged 30")]),
        event: stage("event", [], [failure])
      }),
      context({
        intentType: "mixed",
        extraction: { provenance: "rule_based", intent: EMPTY_INTENT, confidence: 0.3, reason: "timeout" }
      })
    );

    expect(answer.confidenceScore).toBeCloseTo(0.68, 10);
    expect(answer.profileAttributes).toHaveLength(1);
    expect(answer.events).toEqual([]);
    expect(answer.diagnostics).toEqual([{ kind: "extraction_degraded", reason: "timeout" }, failure]);
  });

  it("summarizes at most three names per category", () => {
    const answer = aggregate(
      input({
        attribute: stage(
          "attribute",
          ["a", "b", "c", "d"].map((name, index) => stageHit(makeHit({ recordId: name, score: 0.9 - index * 0.01 }), name))
        )
      }),
      context()
    );

    expect(answer.summary).toBe("Profile attributes: a, b, c and 1 more.");
  });

  it("returns a frozen empty answer when nothing matched", () => {
    const answer = aggregate(input({}), context());

    expect(answer.summary).toBe(EMPTY_SUMMARY);
    expect(answer.totalResults).toBe(0);
    expect(answer.confidenceScore).toBe(0);
    expect(answer.hasAmbiguity).toBe(false);
    expect(Object.isFrozen(answer)).toBe(true);
    expect(Object.isFrozen(answer.profileAttributes)).toBe(true);
  });
});

describe("modules/aggregation/serialize", () => {
  it("renders the snake_case answer document with rounded numbers", () => {
    const answer = aggregate(
      input({
        attribute: stage("attribute", [], [
          { kind: "stage_search_failed", stage: "attribute", message: "index unavailable", searchText: "aged 30" }
        ]),
        event: stage("event", [stageHit(eventHit("buy_online", 0.9, "Buy online"), "purchase")]),
        eventAttribute: stage("event_attribute", [
          stageHit(eventAttributeHit("purchase_amount", "buy_online", 0.8764, "Purchase amount"), "purchase amount", {
            parentEventId: "buy_online"
          })
        ])
      }),
      context({
        query: "people who purchased",
        intentType: "event",
        extraction: { provenance: "rule_based", intent: EMPTY_INTENT, confidence: 0.3, reason: "invalid_json" },
        now: () => 2234
      })
    );

    expect(toFinalAnswerJson(answer)).toEqual({
      query: "people who purchased",
      intent_type: "event",
      profile_attributes: [],
      events: [
        {
          field_id: "buy_online",
          display_name: "Buy online",
          group_key: "events",
          original_search_text: "purchase",
          score: 0.9,
          confidence_level: "high",
          explanation: 'matched "purchase" (score 0.900)'
        }
      ],
      event_attributes: [
        {
          field_id: "purchase_amount",
          display_name: "Purchase amount",
          group_key: "buy_online",
          original_search_text: "purchase amount",
          score: 0.876,
          confidence_level: "high",
          explanation: 'matched "purchase amount" (score 0.876)',
          event_idname: "buy_online",
          event_name: "Buy online"
        }
      ],
      summary: "Events: Buy online. Event attributes: Purchase amount.",
      total_results: 2,
      confidence_score: 0.71,
      has_ambiguity: false,
      ambiguous_options: [],
      execution_time: 1.23,
      extraction_method: "rule_based",
      diagnostics: [
        { kind: "extraction_degraded", reason: "invalid_json" },
        { kind: "stage_search_failed", stage: "attribute", message: "index unavailable", search_text: "aged 30" }
      ]
    });
  });

  it("includes the original attribute name and ambiguity candidates", () => {
    const answer = aggregate(
      input({
        attribute: stage("attribute", [
          stageHit(makeHit({ recordId: "city", score: 0.85 }), "in Berlin", { attributeName: "location" }),
          stageHit(makeHit({ recordId: "region", score: 0.8 }), "in Berlin", { attributeName: "location" })
        ])
      }),
      context()
    );

    const json = toFinalAnswerJson(answer);
    expect(json.profile_attributes.map((item) => [item.field_id, item.original_attribute])).toEqual([
      ["city", "location"],
      ["region", "location"]
    ]);
    expect(json.ambiguous_options).toEqual([
      {
        category: "profile_attribute",
        original_search_text: "in Berlin",
        candidates: [
          expect.objectContaining({ field_id: "city", score: 0.85 }),
          expect.objectContaining({ field_id: "region", score: 0.8 })
        ]
      }
    ]);
  });
});
