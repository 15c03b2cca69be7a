import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

type MatchClause = {
  key: string;
  match: { value: string | number | boolean } | { any: string[] };
};

export type VectorStoreFilter = {
  must?: MatchClause[];
};

export type StoredPoint = {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
};

export interface VectorStoreSearchRequest {
  vector: number[];
  limit?: number;
  filter?: VectorStoreFilter;
  with_payload?: boolean;
  with_vector?: boolean;
}

export interface VectorStorePoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

/** The subset of the Qdrant REST client the search layer relies on. */
export interface VectorStoreSearchClient {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  collectionExists(name: string): Promise<{ exists: boolean }>;
  search(collection: string, request: VectorStoreSearchRequest): Promise<VectorStorePoint[]>;
}

export interface LocalVectorStoreClient extends VectorStoreSearchClient {
  search(collection: string, request: VectorStoreSearchRequest): Promise<Array<{ id: string; score: number; payload: Record<string, unknown> }>>;
  upsert(collection: string, payload: { points: StoredPoint[] }): Promise<{ status: "ok" }>;
}

type StoredCollections = Record<string, StoredPoint[]>;

/** Where the collections live between calls: a JSON file on disk or process memory. */
interface CollectionsBackend {
  load(): Promise<StoredCollections>;
  save(collections: StoredCollections): Promise<void>;
}

const storeFileSchema = z.object({
  collections: z
    .record(
      z.array(
        z.object({
          id: z.string(),
          vector: z.array(z.number()),
          payload: z.record(z.unknown()).default({})
        })
      )
    )
    .default({})
});

const DEFAULT_STORE_FILE = "data/local-vector-store.json";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }
  const { dot, normA, normB } = a.reduce(
    (acc, left, index) => {
      const right = b[index] ?? 0;
      return {
        dot: acc.dot + left * right,
        normA: acc.normA + left * left,
        normB: acc.normB + right * right
      };
    },
    { dot: 0, normA: 0, normB: 0 }
  );
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

/** Every `must` clause holds; `any` matches string payload values only. */
export function matchesFilter(payload: Record<string, unknown>, filter?: VectorStoreFilter): boolean {
  return (filter?.must ?? []).every(({ key, match }) => {
    const value = payload[key];
    return "any" in match ? typeof value === "string" && match.any.includes(value) : value === match.value;
  });
}

class JsonFileBackend implements CollectionsBackend {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StoredCollections> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }
    const parsed = storeFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? "invalid shape";
      throw new Error(`Local vector store file ${this.filePath} is malformed: ${reason}`);
    }
    return parsed.data.collections;
  }

  async save(collections: StoredCollections): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify({ collections }, null, 2), "utf8");
  }
}

class MemoryBackend implements CollectionsBackend {
  private collections: StoredCollections;

  constructor(initial: StoredCollections) {
    this.collections = { ...initial };
  }

  async load(): Promise<StoredCollections> {
    return this.collections;
  }

  async save(collections: StoredCollections): Promise<void> {
    this.collections = collections;
  }
}

/** Brute-force cosine search with the Qdrant client's method shapes. */
class LocalVectorStore implements LocalVectorStoreClient {
  constructor(private readonly backend: CollectionsBackend) {}

  async getCollections(): Promise<{ collections: Array<{ name: string }> }> {
    const collections = await this.backend.load();
    return { collections: Object.keys(collections).map((name) => ({ name })) };
  }

  async collectionExists(name: string): Promise<{ exists: boolean }> {
    const collections = await this.backend.load();
    return { exists: Object.hasOwn(collections, name) };
  }

  async search(
    collection: string,
    request: VectorStoreSearchRequest
  ): Promise<Array<{ id: string; score: number; payload: Record<string, unknown> }>> {
    const collections = await this.backend.load();
    const limit = Math.max(1, request.limit ?? 10);
    return (collections[collection] ?? [])
      .filter((point) => matchesFilter(point.payload, request.filter))
      .map((point) => ({ id: point.id, score: cosineSimilarity(point.vector, request.vector), payload: point.payload }))
      .sort((left, right) => right.score - left.score)
      .slice(0, limit);
  }

  async upsert(collection: string, payload: { points: StoredPoint[] }): Promise<{ status: "ok" }> {
    const collections = await this.backend.load();
    const merged = new Map((collections[collection] ?? []).map((point) => [point.id, point]));
    payload.points.forEach((point) => merged.set(point.id, point));
    await this.backend.save({ ...collections, [collection]: [...merged.values()] });
    return { status: "ok" };
  }
}

export function createLocalVectorStoreClient(options: { filePath?: string } = {}): LocalVectorStoreClient {
  const filePath = path.resolve(process.cwd(), options.filePath || DEFAULT_STORE_FILE);
  return new LocalVectorStore(new JsonFileBackend(filePath));
}

export function createInMemoryVectorStoreClient(collections: StoredCollections = {}): LocalVectorStoreClient {
  return new LocalVectorStore(new MemoryBackend(collections));
}
