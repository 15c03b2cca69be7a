import { z } from "zod";
import type { EventIntent, ProfileAttributeIntent, StructuredIntent } from "./types.js";

const keyValueOrListSchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);

const structuredQuerySchema = z.object({
  person_attributes: keyValueOrListSchema.nullable().optional(),
  behavioral_events: z.array(z.unknown()).nullable().optional(),
  events: z.array(z.unknown()).nullable().optional()
});

const llmResponseSchema = structuredQuerySchema.extend({
  intent_confidence: z.union([z.number(), z.string()]).optional(),
  structured_query: structuredQuerySchema.optional()
});

const eventSchema = z.object({
  event_type: z.unknown().optional(),
  event_description: z.unknown().optional(),
  attributes: keyValueOrListSchema.nullable().optional()
});

export type LlmResponseParseResult =
  | { ok: true; intent: StructuredIntent; confidence: number | null }
  | { ok: false; reason: "empty_response" | "invalid_json" | "schema_mismatch"; detail: string };

export const stripJsonFences = (value: string): string => {
  let text = value.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text);
  if (fenced?.[1] !== undefined) {
    text = fenced[1].trim();
  }
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start >= 0 && end > start) {
    text = text.slice(start, end + 1);
  }
  return text;
};

const formatValue = (value: unknown): string => {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map(formatValue).filter(Boolean).join(", ");
  }
  return JSON.stringify(value);
};

const toKeyValueText = (key: string, value: unknown): string => {
  const trimmedKey = key.trim();
  const formatted = formatValue(value);
  if (!formatted) {
    return trimmedKey;
  }
  return trimmedKey ? `${trimmedKey}: ${formatted}` : formatted;
};

const parseProfileAttributes = (
  value: z.infer<typeof keyValueOrListSchema> | null | undefined
): ProfileAttributeIntent[] => {
  if (!value) {
    return [];
  }
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string" && item.trim().length > 0)
      .map((name) => ({ attributeName: name.trim(), searchText: name.trim() }));
  }
  return Object.entries(value)
    .filter(([name]) => name.trim().length > 0)
    .map(([name, attributeValue]) => ({
      attributeName: name.trim(),
      searchText: toKeyValueText(name, attributeValue)
    }));
};

const parseEventAttributes = (value: z.infer<typeof keyValueOrListSchema> | null | undefined): string[] => {
  if (!value) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map(formatValue).filter((text) => text.length > 0);
  }
  return Object.entries(value)
    .map(([name, attributeValue]) => toKeyValueText(name, attributeValue))
    .filter((text) => text.length > 0);
};

const parseEvents = (values: unknown[] | null | undefined): EventIntent[] => {
  const events: EventIntent[] = [];
  for (const raw of values ?? []) {
    const parsed = eventSchema.safeParse(raw);
    if (!parsed.success) {
      continue;
    }
    const description = formatValue(parsed.data.event_type) || formatValue(parsed.data.event_description);
    if (!description) {
      continue;
    }
    events.push({
      eventSearchText: description,
      eventAttributeTexts: parseEventAttributes(parsed.data.attributes)
    });
  }
  return events;
};

const parseConfidence = (value: number | string | undefined): number | null => {
  const numeric = typeof value === "string" ? Number.parseFloat(value) : value;
  if (numeric === undefined || !Number.isFinite(numeric) || numeric <= 0) {
    return null;
  }
  return Math.min(1, numeric);
};

/**
 * Reads a chat model reply into a StructuredIntent. Accepts the top-level
 * `{person_attributes, behavioral_events}` layout as well as the nested
 * `{structured_query: {person_attributes, events}}` one.
 */
export const parseLlmExtractionResponse = (raw: string): LlmResponseParseResult => {
  if (raw.trim().length === 0) {
    return { ok: false, reason: "empty_response", detail: "extraction model returned empty content" };
  }

  let json: unknown;
  try {
    json = JSON.parse(stripJsonFences(raw));
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    return { ok: false, reason: "invalid_json", detail: message };
  }

  const parsed = llmResponseSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      reason: "schema_mismatch",
      detail: parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`).join("; ")
    };
  }

  const source = parsed.data.structured_query ?? parsed.data;
  const hasStructuredFields =
    source.person_attributes !== undefined || source.behavioral_events !== undefined || source.events !== undefined;
  if (!hasStructuredFields) {
    return { ok: false, reason: "schema_mismatch", detail: "response has no person_attributes or events" };
  }

  return {
    ok: true,
    intent: {
      profileAttributes: parseProfileAttributes(source.person_attributes),
      events: parseEvents(source.behavioral_events ?? source.events)
    },
    confidence: parseConfidence(parsed.data.intent_confidence)
  };
};
