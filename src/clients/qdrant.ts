import { QdrantClient } from "@qdrant/js-client-rest";
import { getConfig, type Config } from "../config/index.js";
import { mapErrorMessage } from "../errors.js";
import { logInfo, logWarn } from "../observability/logger.js";
import { createLocalVectorStoreClient, type VectorStoreSearchClient } from "./local-vector-store.js";
import type { ClientHealth } from "./registry.js";
import { retryWithLinearBackoff } from "./retry.js";

export type VectorStoreBackend = "qdrant" | "local";

export interface QdrantSingleton {
  backend: VectorStoreBackend;
  client: VectorStoreSearchClient;
  /** Reports whether the catalog collection exists on the backend. */
  healthCheck: () => Promise<ClientHealth>;
}

const CONNECT_ATTEMPTS = 3;
const CONNECT_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

const catalogHealthCheck =
  (client: VectorStoreSearchClient, collection: string, backend: VectorStoreBackend) =>
  async (): Promise<ClientHealth> => {
    try {
      const { exists } = await client.collectionExists(collection);
      if (!exists) {
        return { status: "error", details: `collection ${collection} not found` };
      }
      return backend === "local" ? { status: "ok", details: "local file vector store" } : { status: "ok" };
    } catch (error) {
      return { status: "error", details: mapErrorMessage(error) };
    }
  };

async function connectRemote(config: Config, url: string): Promise<VectorStoreSearchClient> {
  const client = new QdrantClient({
    url,
    apiKey: config.QDRANT_API_KEY,
    timeout: config.SEARCH_TIMEOUT_MS
  });

  await retryWithLinearBackoff(() => client.getCollections(), {
    attempts: CONNECT_ATTEMPTS,
    baseDelayMs: CONNECT_RETRY_DELAY_MS,
    onRetry: (attempt, error) =>
      logWarn("clients.qdrant.connect_retry", {}, { attempt, error_message: mapErrorMessage(error) })
  });
  return client;
}

async function initialize(): Promise<QdrantSingleton> {
  const config = getConfig();
  // prod mode always carries QDRANT_URL (env schema); only local mode can fall back to the file store
  const backend: VectorStoreBackend = config.QDRANT_URL ? "qdrant" : "local";
  const client = config.QDRANT_URL
    ? await connectRemote(config, config.QDRANT_URL)
    : createLocalVectorStoreClient({ filePath: config.LOCAL_VECTOR_STORE_FILE });

  logInfo("clients.qdrant.initialized", {}, { backend, collection: config.QDRANT_COLLECTION });

  return {
    backend,
    client,
    healthCheck: catalogHealthCheck(client, config.QDRANT_COLLECTION, backend)
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  initPromise ??= initialize();
  try {
    singleton = await initPromise;
  } catch (error) {
    initPromise = null;
    throw error;
  }
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }
  const { backend } = singleton;
  singleton = null;
  initPromise = null;
  logInfo("clients.qdrant.shutdown", {}, { backend });
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
