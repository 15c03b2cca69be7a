import { getOpenAIClient } from "../../clients/openai.js";
import { getConfig } from "../../config/index.js";
import type { EmbeddingService } from "./types.js";

export interface OpenAIEmbeddingServiceDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
  model?: string;
  /** Defaults to one hour. */
  cacheTtlMs?: number;
  /** Defaults to 1000; the oldest entry is evicted first. */
  cacheMaxEntries?: number;
  now?: () => number;
}

interface CachedVector {
  vector: number[];
  storedAt: number;
}

const DEFAULT_CACHE_TTL_MS = 3_600_000;
const DEFAULT_CACHE_MAX_ENTRIES = 1000;

/** Insertion-ordered map: re-storing a key moves it to the back. */
class EmbeddingCache {
  private readonly entries = new Map<string, CachedVector>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number,
    private readonly now: () => number
  ) {}

  get(key: string): number[] | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.vector;
  }

  set(key: string, vector: number[]): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { vector, storedAt: this.now() });
  }
}

/**
 * Embeds a batch with at most one OpenAI embeddings request. Texts seen within
 * the cache TTL are served from memory and only the misses (deduplicated) are
 * sent; the response is re-ordered by `index` so vectors line up with inputs.
 */
export function createOpenAIEmbeddingService(dependencies: OpenAIEmbeddingServiceDependencies = {}): EmbeddingService {
  const resolveClient = dependencies.getOpenAIClient ?? getOpenAIClient;
  const cache = new EmbeddingCache(
    dependencies.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
    dependencies.cacheMaxEntries ?? DEFAULT_CACHE_MAX_ENTRIES,
    dependencies.now ?? Date.now
  );

  return {
    async encode(texts, signal) {
      if (texts.length === 0) {
        return [];
      }

      const model = dependencies.model ?? getConfig().OPENAI_EMBEDDING_MODEL;
      const keyOf = (text: string): string => `${model}\u0000${text}`;

      const found = new Map<string, number[]>();
      const missing: string[] = [];
      for (const text of texts) {
        if (found.has(text) || missing.includes(text)) {
          continue;
        }
        const cached = cache.get(keyOf(text));
        if (cached) {
          found.set(text, cached);
        } else {
          missing.push(text);
        }
      }

      if (missing.length > 0) {
        const { client } = await resolveClient();
        const response = await client.embeddings.create({ model, input: missing }, { signal });

        const fetched: number[][] = new Array<number[]>(missing.length);
        for (const item of response.data ?? []) {
          if (item.index >= 0 && item.index < missing.length) {
            fetched[item.index] = item.embedding;
          }
        }

        missing.forEach((text, index) => {
          const vector = fetched[index];
          if (!vector || !Array.isArray(vector) || vector.length === 0) {
            throw new Error(`Embedding response missing vector payload for input ${texts.indexOf(text)}.`);
          }
          cache.set(keyOf(text), vector);
          found.set(text, vector);
        });
      }

      return texts.map((text) => {
        const vector = found.get(text);
        if (!vector) {
          throw new Error(`Embedding response missing vector payload for input ${texts.indexOf(text)}.`);
        }
        return vector;
      });
    }
  };
}
