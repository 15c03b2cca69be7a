import type { StructuredIntent } from "../intent/types.js";

export type ExecutionPlan = "ATTRIBUTE_ONLY" | "EVENT_ONLY" | "MIXED";

export type IntentType = "profile" | "event" | "mixed";

const INTENT_TYPE_BY_PLAN: Record<ExecutionPlan, IntentType> = {
  ATTRIBUTE_ONLY: "profile",
  EVENT_ONLY: "event",
  MIXED: "mixed"
};

/**
 * Picks the task graph for an intent. An intent with nothing extracted still
 * routes to ATTRIBUTE_ONLY so the run completes with an empty answer.
 */
export const route = (intent: StructuredIntent): ExecutionPlan => {
  const hasProfiles = intent.profileAttributes.length > 0;
  const hasEvents = intent.events.length > 0;

  if (hasProfiles && hasEvents) {
    return "MIXED";
  }
  if (hasEvents) {
    return "EVENT_ONLY";
  }
  return "ATTRIBUTE_ONLY";
};

export const toIntentType = (plan: ExecutionPlan): IntentType => INTENT_TYPE_BY_PLAN[plan];
