import fs from "node:fs/promises";
import path from "node:path";
import { logWarn } from "../observability/logger.js";

export const QUERY_PLACEHOLDER = "{query}";

export const INTENT_EXTRACTION_SYSTEM_PROMPT = [
  "You are an information extraction assistant for a customer-data metadata catalog.",
  "Extract structured information from the user's natural-language audience description.",
  "Return only a strict JSON object and no explanatory text."
].join(" ");

export const DEFAULT_INTENT_EXTRACTION_TEMPLATE = [
  "# Role",
  "You turn a description of a group of people into key-value pairs that can be searched in a metadata catalog.",
  "",
  "# Task",
  "Read the text below and:",
  "1. extract every static attribute that describes the people;",
  "2. extract every behavioral event the people performed, with the attributes of that event;",
  "3. answer with one JSON object.",
  "",
  "# Rules",
  "1. Values must be copied verbatim from the text.",
  "2. Invent a short, meaningful key for every value, e.g. \"aged between 25 and 35\" becomes \"age\": \"between 25 and 35\".",
  "3. Static attributes go under `person_attributes`; actions go under `behavioral_events`.",
  "4. When nothing is found, return an empty object and an empty list.",
  "",
  "# Output structure",
  "- `person_attributes`: object of dynamically named keys.",
  "- `behavioral_events`: list of objects with `event_type` (the core action, e.g. \"purchase\", \"login\") and",
  "  `attributes` (object of dynamically named keys).",
  "",
  "# Example",
  "Input:",
  "Male software engineers in Seattle aged between 25 and 35 who placed at least 3 orders in the app in the last 90 days, mostly electronics, and logged in yesterday.",
  "Output:",
  JSON.stringify(
    {
      person_attributes: {
        location: "Seattle",
        age: "between 25 and 35",
        gender: "Male",
        occupation: "software engineers"
      },
      behavioral_events: [
        {
          event_type: "order",
          attributes: {
            time_range: "in the last 90 days",
            channel: "in the app",
            frequency: "at least 3 orders",
            category: "electronics"
          }
        },
        {
          event_type: "login",
          attributes: {
            last_login: "yesterday"
          }
        }
      ]
    },
    null,
    2
  ),
  "",
  "# Text to process",
  QUERY_PLACEHOLDER
].join("\n");

export const buildIntentExtractionUserPrompt = (template: string, query: string): string =>
  template.includes(QUERY_PLACEHOLDER)
    ? template.split(QUERY_PLACEHOLDER).join(query)
    : `${template}\n\n${query}`;

/**
 * Reads an extraction template from disk. Relative paths resolve against the
 * working directory; an unreadable or blank file yields the built-in template.
 */
export async function loadIntentExtractionTemplate(
  filePath: string | undefined,
  readFile: (file: string) => Promise<string> = (file) => fs.readFile(file, "utf8")
): Promise<{ template: string; source: "file" | "default" }> {
  if (!filePath) {
    return { template: DEFAULT_INTENT_EXTRACTION_TEMPLATE, source: "default" };
  }

  const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  try {
    const content = await readFile(resolved);
    if (content.trim().length === 0) {
      return { template: DEFAULT_INTENT_EXTRACTION_TEMPLATE, source: "default" };
    }
    return { template: content, source: "file" };
  } catch (error) {
    logWarn("prompts.template.unreadable", {}, {
      path: resolved,
      error_message: error instanceof Error ? error.message : String(error)
    });
    return { template: DEFAULT_INTENT_EXTRACTION_TEMPLATE, source: "default" };
  }
}
