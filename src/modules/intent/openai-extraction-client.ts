import { getOpenAIClient } from "../../clients/openai.js";
import { getConfig } from "../../config/index.js";
import type { LlmCompletionRequest, LlmExtractionClient } from "./types.js";

export interface OpenAIExtractionClientDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }

  return "";
};

export function createOpenAIExtractionClient(dependencies?: OpenAIExtractionClientDependencies): LlmExtractionClient {
  const resolveSettings = () => {
    const needsConfig =
      dependencies?.model === undefined ||
      dependencies.temperature === undefined ||
      dependencies.maxTokens === undefined;
    const config = needsConfig ? getConfig() : null;
    return {
      getOpenAIClient: dependencies?.getOpenAIClient ?? getOpenAIClient,
      model: dependencies?.model ?? config?.OPENAI_EXTRACTION_MODEL ?? "",
      temperature: dependencies?.temperature ?? config?.LLM_TEMPERATURE ?? 0,
      maxTokens: dependencies?.maxTokens ?? config?.LLM_MAX_TOKENS ?? 1024
    };
  };

  return {
    async complete(request: LlmCompletionRequest, signal?: AbortSignal): Promise<string> {
      const resolved = resolveSettings();
      const { client } = await resolved.getOpenAIClient();
      const response = await client.chat.completions.create(
        {
          model: resolved.model,
          temperature: resolved.temperature,
          max_tokens: resolved.maxTokens,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user }
          ]
        },
        { signal }
      );

      return normalizeCompletionContent(response.choices[0]?.message?.content);
    }
  };
}
