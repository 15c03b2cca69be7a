import { getQdrantClient } from "../../clients/qdrant.js";
import type { VectorStoreFilter, VectorStorePoint } from "../../clients/local-vector-store.js";
import { getConfig } from "../../config/index.js";
import { ConfigurationInvalidError } from "../../errors.js";
import type { RecordType, SearchHit, VectorIndex, VectorSearchRequest } from "./types.js";

const RECORD_TYPES: readonly RecordType[] = ["PROFILE_ATTRIBUTE", "EVENT", "EVENT_ATTRIBUTE"];

export interface QdrantVectorIndexDependencies {
  getQdrantClient?: typeof getQdrantClient;
  collection?: string;
}

export const buildIndexFilter = (request: Pick<VectorSearchRequest, "recordType" | "groupKeys">): VectorStoreFilter => {
  const must: NonNullable<VectorStoreFilter["must"]> = [
    { key: "record_type", match: { value: request.recordType } }
  ];
  if (request.groupKeys) {
    must.push({ key: "group_key", match: { any: [...request.groupKeys] } });
  }
  return { must };
};

const pickFirstString = (source: Record<string, unknown>, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
};

const isRecordType = (value: unknown): value is RecordType =>
  RECORD_TYPES.some((recordType) => recordType === value);

const toMetadata = (value: unknown): Record<string, unknown> => {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  if (typeof value === "string" && value.trim().length > 0) {
    try {
      const parsed: unknown = JSON.parse(value);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch {
      return { raw: value };
    }
    return { raw: value };
  }
  return {};
};

/**
 * Maps one index point onto a SearchHit. Points without a field identifier
 * cannot be linked or displayed and are skipped.
 */
export const normalizePoint = (point: VectorStorePoint, fallbackType: RecordType): SearchHit | null => {
  const payload = point.payload ?? {};
  const fieldId = pickFirstString(payload, ["field_id", "idname"]);
  if (!fieldId) {
    return null;
  }

  const recordType = isRecordType(payload.record_type)
    ? payload.record_type
    : isRecordType(payload.source_type)
      ? payload.source_type
      : fallbackType;

  return {
    recordId: String(point.id),
    score: typeof point.score === "number" && Number.isFinite(point.score) ? point.score : 0,
    recordType,
    groupKey: pickFirstString(payload, ["group_key", "source"]) ?? "",
    displayName: pickFirstString(payload, ["display_name", "source_name"]) ?? fieldId,
    fieldId,
    rawMetadata: toMetadata(payload.raw_metadata)
  };
};

export function createQdrantVectorIndex(dependencies: QdrantVectorIndexDependencies = {}): VectorIndex {
  const resolveClient = dependencies.getQdrantClient ?? getQdrantClient;
  let verifiedCollection: string | null = null;

  return {
    async search(request, signal) {
      // the REST client takes no AbortSignal; check it between round trips instead
      signal?.throwIfAborted();
      const collection = dependencies.collection ?? getConfig().QDRANT_COLLECTION;
      const { client } = await resolveClient();
      if (verifiedCollection !== collection) {
        const { exists } = await client.collectionExists(collection);
        if (!exists) {
          throw new ConfigurationInvalidError(`Vector collection "${collection}" does not exist.`, [
            `QDRANT_COLLECTION: collection ${collection} not found`
          ]);
        }
        verifiedCollection = collection;
      }

      signal?.throwIfAborted();
      const points = await client.search(collection, {
        vector: request.vector,
        limit: request.limit,
        filter: buildIndexFilter(request),
        with_payload: true,
        with_vector: false
      });
      signal?.throwIfAborted();

      return points
        .map((point) => normalizePoint(point, request.recordType))
        .filter((hit): hit is SearchHit => hit !== null);
    }
  };
}
