import type { EventIntent, ProfileAttributeIntent, StructuredIntent } from "./types.js";

export const RULE_BASED_CONFIDENCE = 0.3;

interface KeywordRule {
  name: string;
  pattern: RegExp;
}

const CLAUSE_SEPARATOR = /[,;.!?]+|\s+(?:and|but|who|whose|which|while|then)\s+/i;

const EVENT_RULES: readonly KeywordRule[] = [
  { name: "add to cart", pattern: /\badd(?:s|ed|ing)?\b[\w\s]*?\bto\s+(?:the\s+|their\s+)?cart\b/i },
  { name: "purchase", pattern: /\b(?:purchas(?:e|es|ed|ing)|bought|buy(?:s|ing)?|order(?:s|ed|ing)?)\b/i },
  { name: "refund", pattern: /\brefund(?:s|ed|ing)?\b/i },
  { name: "login", pattern: /\b(?:log(?:s|ged|ging)?\s*in|logins?|sign(?:s|ed|ing)?\s*in)\b/i },
  { name: "register", pattern: /\b(?:regist(?:er|ers|ered|ering|ration)|sign(?:s|ed|ing)?\s*up|signup)\b/i },
  { name: "browse", pattern: /\b(?:brows(?:e|es|ed|ing)|view(?:s|ed|ing)?|visit(?:s|ed|ing)?)\b/i },
  { name: "search", pattern: /\bsearch(?:es|ed|ing)?\b/i },
  { name: "subscribe", pattern: /\b(?:subscrib(?:e|es|ed|ing)|renew(?:s|ed|ing)?)\b/i },
  { name: "cancel", pattern: /\bcancel(?:s|led|ed|ling|ing)?\b/i },
  { name: "share", pattern: /\bshar(?:e|es|ed|ing)\b/i },
  { name: "review", pattern: /\b(?:review(?:s|ed|ing)?|comment(?:s|ed|ing)?)\b/i },
  { name: "click", pattern: /\bclick(?:s|ed|ing)?\b/i }
];

const PROFILE_RULES: readonly KeywordRule[] = [
  { name: "age", pattern: /\b(?:age[ds]?|years?\s+old)\b/i },
  { name: "gender", pattern: /\b(?:male|female|men|women|gender)\b/i },
  { name: "location", pattern: /\b(?:city|country|region|province|live[sd]?|living|located|based|resid\w*)\b/i },
  {
    name: "occupation",
    pattern: /\b(?:occupation|job|profession|engineers?|teachers?|students?|doctors?|nurses?|developers?|managers?)\b/i
  },
  { name: "income", pattern: /\b(?:income|salary|earn(?:s|ing)?)\b/i },
  { name: "membership", pattern: /\b(?:members?|membership|vip|tier|subscribers?)\b/i },
  { name: "marital_status", pattern: /\b(?:married|single|divorced|marital)\b/i },
  { name: "education", pattern: /\b(?:education|degree|graduates?|university|college)\b/i }
];

/** Time windows, amounts, channels and frequencies that qualify the preceding event. */
const QUALIFIER_PATTERN =
  /\d|\$|\b(?:last|past|within|since|before|after|yesterday|today|days?|weeks?|months?|times?|once|twice|at least|more than|less than|over|under|app|online|website|web|mobile|store|channel|frequently|often|daily|weekly|monthly)\b/i;

const EDGE_FILLER =
  /^(?:(?:the|a|an|in|on|at|to|of|for|their|have|has|had|did|do|does|users?|customers?|people|placed|made)\s+)+|(?:\s+(?:the|a|an|in|on|at|to|of|for))+$/i;

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

const splitClauses = (query: string): string[] =>
  query
    .split(CLAUSE_SEPARATOR)
    .map(collapseWhitespace)
    .filter((clause) => clause.length > 0);

const findEvent = (clause: string): { rule: KeywordRule; match: RegExpExecArray } | null => {
  let best: { rule: KeywordRule; match: RegExpExecArray } | null = null;
  for (const rule of EVENT_RULES) {
    const match = rule.pattern.exec(clause);
    if (match && (best === null || match.index < best.match.index)) {
      best = { rule, match };
    }
  }
  return best;
};

const findProfileRule = (clause: string): KeywordRule | null =>
  PROFILE_RULES.find((rule) => rule.pattern.test(clause)) ?? null;

const eventRemainder = (clause: string, match: RegExpExecArray): string => {
  const withoutVerb = `${clause.slice(0, match.index)} ${clause.slice(match.index + match[0].length)}`;
  let remainder = collapseWhitespace(withoutVerb);
  let previous = "";
  while (previous !== remainder) {
    previous = remainder;
    remainder = collapseWhitespace(remainder.replace(EDGE_FILLER, ""));
  }
  return /[\p{L}\p{N}]/u.test(remainder) ? remainder : "";
};

interface MutableEvent {
  eventSearchText: string;
  eventAttributeTexts: string[];
}

/**
 * Keyword extraction used when the chat model is unavailable or returns
 * something unusable. Splits the query into clauses, turns clauses holding an
 * event verb into events (the rest of the clause and following qualifier
 * clauses become the event's attribute texts) and clauses holding a profile
 * keyword into profile attributes. A query with no recognised keyword is
 * searched as one profile attribute.
 */
export function extractRuleBasedIntent(query: string): StructuredIntent {
  const trimmed = collapseWhitespace(query);
  if (!trimmed) {
    return { profileAttributes: [], events: [] };
  }

  const profileAttributes: ProfileAttributeIntent[] = [];
  const events: MutableEvent[] = [];
  let currentEvent: MutableEvent | null = null;

  const addAttributeText = (event: MutableEvent, text: string): void => {
    if (text && !event.eventAttributeTexts.includes(text)) {
      event.eventAttributeTexts.push(text);
    }
  };

  for (const clause of splitClauses(trimmed)) {
    const eventMatch = findEvent(clause);
    if (eventMatch) {
      const existing = events.find((event) => event.eventSearchText === eventMatch.rule.name);
      currentEvent = existing ?? { eventSearchText: eventMatch.rule.name, eventAttributeTexts: [] };
      if (!existing) {
        events.push(currentEvent);
      }
      addAttributeText(currentEvent, eventRemainder(clause, eventMatch.match));
      continue;
    }

    const profileRule = findProfileRule(clause);
    if (profileRule) {
      if (!profileAttributes.some((attribute) => attribute.searchText === clause)) {
        profileAttributes.push({ attributeName: profileRule.name, searchText: clause });
      }
      currentEvent = null;
      continue;
    }

    if (currentEvent && QUALIFIER_PATTERN.test(clause)) {
      addAttributeText(currentEvent, clause);
    }
  }

  if (profileAttributes.length === 0 && events.length === 0) {
    return { profileAttributes: [{ attributeName: "query", searchText: trimmed }], events: [] };
  }

  return { profileAttributes, events };
}
