import OpenAI from "openai";
import { getConfig } from "../config/index.js";
import { mapErrorMessage } from "../errors.js";
import { logInfo } from "../observability/logger.js";
import type { ClientHealth } from "./registry.js";
import { withTimeout } from "./timeout.js";

export interface OpenAISingleton {
  client: OpenAI;
  /** Verifies that the extraction and embedding models are reachable with the configured key. */
  healthCheck: () => Promise<ClientHealth>;
}

const HEALTH_CHECK_TIMEOUT_MS = 7000;

let singleton: OpenAISingleton | null = null;

function initialize(): OpenAISingleton {
  const config = getConfig();
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: config.OPENAI_MAX_RETRIES,
    timeout: config.OPENAI_TIMEOUT_MS
  });
  const models = [...new Set([config.OPENAI_EXTRACTION_MODEL, config.OPENAI_EMBEDDING_MODEL])];

  logInfo("clients.openai.initialized", {}, { models, max_retries: config.OPENAI_MAX_RETRIES });

  return {
    client,
    async healthCheck() {
      const failures = await Promise.all(
        models.map(async (model) => {
          try {
            await withTimeout(
              "openai.models.retrieve",
              (signal) => client.models.retrieve(model, { signal }),
              HEALTH_CHECK_TIMEOUT_MS
            );
            return null;
          } catch (error) {
            return `${model}: ${mapErrorMessage(error)}`;
          }
        })
      );
      const details = failures.filter((failure): failure is string => failure !== null);
      return details.length === 0 ? { status: "ok" } : { status: "error", details: details.join("; ") };
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  singleton ??= initialize();
  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }
  singleton = null;
  logInfo("clients.openai.shutdown", {});
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
