import type { Env } from "../../config/env.js";
import { ConfigurationInvalidError } from "../../errors.js";

export interface ConfidenceBands {
  high: number;
  medium: number;
}

export interface SearchLimits {
  profile: number;
  event: number;
  eventAttribute: number;
}

export interface QueryTimeouts {
  extractionMs: number;
  searchMs: number;
  queryDeadlineMs: number;
}

export interface QuerySettings {
  similarityThreshold: number;
  ambiguityThreshold: number;
  confidenceBands: ConfidenceBands;
  ruleBasedConfidenceWeight: number;
  searchLimits: SearchLimits;
  timeouts: QueryTimeouts;
}

export const DEFAULT_QUERY_SETTINGS: QuerySettings = Object.freeze({
  similarityThreshold: 0.65,
  ambiguityThreshold: 0.75,
  confidenceBands: Object.freeze({ high: 0.8, medium: 0.6 }),
  ruleBasedConfidenceWeight: 0.8,
  searchLimits: Object.freeze({ profile: 5, event: 5, eventAttribute: 10 }),
  timeouts: Object.freeze({ extractionMs: 15000, searchMs: 5000, queryDeadlineMs: 30000 })
});

export const toQuerySettings = (env: Env): QuerySettings => ({
  similarityThreshold: env.SIMILARITY_THRESHOLD,
  ambiguityThreshold: env.AMBIGUITY_THRESHOLD,
  confidenceBands: {
    high: env.HIGH_CONFIDENCE_SCORE,
    medium: env.MEDIUM_CONFIDENCE_SCORE
  },
  ruleBasedConfidenceWeight: env.RULE_BASED_CONFIDENCE_WEIGHT,
  searchLimits: {
    profile: env.PROFILE_SEARCH_LIMIT,
    event: env.EVENT_SEARCH_LIMIT,
    eventAttribute: env.EVENT_ATTR_SEARCH_LIMIT
  },
  timeouts: {
    extractionMs: env.EXTRACTION_TIMEOUT_MS,
    searchMs: env.SEARCH_TIMEOUT_MS,
    queryDeadlineMs: env.QUERY_DEADLINE_MS
  }
});

export type QuerySettingsOverrides = Partial<Omit<QuerySettings, "confidenceBands" | "searchLimits" | "timeouts">> & {
  confidenceBands?: Partial<ConfidenceBands>;
  searchLimits?: Partial<SearchLimits>;
  timeouts?: Partial<QueryTimeouts>;
};

export const mergeQuerySettings = (
  overrides: QuerySettingsOverrides = {},
  base: QuerySettings = DEFAULT_QUERY_SETTINGS
): QuerySettings => ({
  similarityThreshold: overrides.similarityThreshold ?? base.similarityThreshold,
  ambiguityThreshold: overrides.ambiguityThreshold ?? base.ambiguityThreshold,
  confidenceBands: { ...base.confidenceBands, ...overrides.confidenceBands },
  ruleBasedConfidenceWeight: overrides.ruleBasedConfidenceWeight ?? base.ruleBasedConfidenceWeight,
  searchLimits: { ...base.searchLimits, ...overrides.searchLimits },
  timeouts: { ...base.timeouts, ...overrides.timeouts }
});

const isUnitInterval = (value: number): boolean => Number.isFinite(value) && value >= 0 && value <= 1;
const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

export function assertValidQuerySettings(settings: QuerySettings): void {
  const issues: string[] = [];

  const unitChecks: Array<[string, number]> = [
    ["similarityThreshold", settings.similarityThreshold],
    ["ambiguityThreshold", settings.ambiguityThreshold],
    ["confidenceBands.high", settings.confidenceBands.high],
    ["confidenceBands.medium", settings.confidenceBands.medium],
    ["ruleBasedConfidenceWeight", settings.ruleBasedConfidenceWeight]
  ];
  for (const [name, value] of unitChecks) {
    if (!isUnitInterval(value)) {
      issues.push(`${name}: must be between 0 and 1 (got ${value})`);
    }
  }
  if (settings.confidenceBands.medium > settings.confidenceBands.high) {
    issues.push("confidenceBands.medium: must not exceed confidenceBands.high");
  }

  const integerChecks: Array<[string, number]> = [
    ["searchLimits.profile", settings.searchLimits.profile],
    ["searchLimits.event", settings.searchLimits.event],
    ["searchLimits.eventAttribute", settings.searchLimits.eventAttribute],
    ["timeouts.extractionMs", settings.timeouts.extractionMs],
    ["timeouts.searchMs", settings.timeouts.searchMs],
    ["timeouts.queryDeadlineMs", settings.timeouts.queryDeadlineMs]
  ];
  for (const [name, value] of integerChecks) {
    if (!isPositiveInteger(value)) {
      issues.push(`${name}: must be a positive integer (got ${value})`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationInvalidError(
      `Invalid query settings:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
      issues
    );
  }
}
