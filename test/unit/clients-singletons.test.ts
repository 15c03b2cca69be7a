import Fastify from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadManagedClients, type ManagedClient } from "../../src/clients/registry.js";

describe("clients/openai", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.doUnmock("../../src/config/index.js");
    vi.doUnmock("openai");
  });

  async function importOpenAIClientModule(retrieveMock: ReturnType<typeof vi.fn>) {
    vi.doMock("../../src/config/index.js", () => ({
      getConfig: () => ({
        OPENAI_API_KEY: "test-secret",
        OPENAI_EXTRACTION_MODEL: "gpt-test",
        OPENAI_EMBEDDING_MODEL: "embed-test",
        OPENAI_TIMEOUT_MS: 20000,
        OPENAI_MAX_RETRIES: 2
      })
    }));

    const OpenAIConstructor = vi.fn().mockImplementation(() => ({
      models: { retrieve: retrieveMock }
    }));
    vi.doMock("openai", () => ({ default: OpenAIConstructor }));

    const mod = await import("../../src/clients/openai.js");
    return { mod, OpenAIConstructor };
  }

  it("constructs the client once from config and checks both models", async () => {
    const retrieveMock = vi.fn().mockResolvedValue({ id: "model" });

    const { mod, OpenAIConstructor } = await importOpenAIClientModule(retrieveMock);
    const singleton = await mod.getOpenAIClient();

    expect(await mod.getOpenAIClient()).toBe(singleton);
    expect(OpenAIConstructor).toHaveBeenCalledTimes(1);
    expect(OpenAIConstructor).toHaveBeenCalledWith({ apiKey: "test-secret", maxRetries: 2, timeout: 20000 });

    await expect(singleton.healthCheck()).resolves.toEqual({ status: "ok" });
    expect(retrieveMock.mock.calls.map((call) => call[0])).toEqual(["gpt-test", "embed-test"]);
    expect(retrieveMock.mock.calls[0]?.[1]).toEqual({ signal: expect.any(AbortSignal) });

    await mod.shutdownOpenAIClient();
    await mod.getOpenAIClient();
    expect(OpenAIConstructor).toHaveBeenCalledTimes(2);
  });

  it("lists every model that failed its health check", async () => {
    vi.useFakeTimers();
    const retrieveMock = vi.fn((model: string) =>
      model === "gpt-test" ? new Promise(() => undefined) : Promise.reject(new Error("model not found"))
    );

    const { mod } = await importOpenAIClientModule(retrieveMock);
    const singleton = await mod.getOpenAIClient();

    const healthPromise = singleton.healthCheck();
    await vi.advanceTimersByTimeAsync(7000);

    await expect(healthPromise).resolves.toEqual({
      status: "error",
      details: "gpt-test: openai.models.retrieve timed out after 7000ms; embed-test: model not found"
    });
  });
});

describe("clients/qdrant", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.doUnmock("../../src/config/index.js");
    vi.doUnmock("../../src/clients/local-vector-store.js");
    vi.doUnmock("@qdrant/js-client-rest");
  });

  async function importQdrantClientModule(options: {
    appMode: "local" | "prod";
    qdrantUrl?: string;
    qdrantClientFactory?: ReturnType<typeof vi.fn>;
    localStoreFactory?: ReturnType<typeof vi.fn>;
  }) {
    vi.doMock("../../src/config/index.js", () => ({
      getConfig: () => ({
        APP_MODE: options.appMode,
        QDRANT_URL: options.qdrantUrl,
        QDRANT_API_KEY: "test-secret",
        QDRANT_COLLECTION: "catalog",
        LOCAL_VECTOR_STORE_FILE: "data/catalog.json",
        SEARCH_TIMEOUT_MS: 5000
      })
    }));

    const localStoreFactory = options.localStoreFactory ?? vi.fn();
    vi.doMock("../../src/clients/local-vector-store.js", () => ({
      createLocalVectorStoreClient: localStoreFactory
    }));

    const QdrantClientConstructor = options.qdrantClientFactory ?? vi.fn().mockImplementation(() => ({}));
    vi.doMock("@qdrant/js-client-rest", () => ({ QdrantClient: QdrantClientConstructor }));

    const mod = await import("../../src/clients/qdrant.js");
    return { mod, QdrantClientConstructor, localStoreFactory };
  }

  it("falls back to the local file vector store without a URL", async () => {
    const localClient = {
      collectionExists: vi.fn().mockResolvedValue({ exists: true })
    };
    const { mod, QdrantClientConstructor, localStoreFactory } = await importQdrantClientModule({
      appMode: "local",
      localStoreFactory: vi.fn(() => localClient)
    });

    const singleton = await mod.getQdrantClient();
    expect(singleton.backend).toBe("local");
    expect(localStoreFactory).toHaveBeenCalledWith({ filePath: "data/catalog.json" });
    expect(QdrantClientConstructor).not.toHaveBeenCalled();
    await expect(singleton.healthCheck()).resolves.toEqual({
      status: "ok",
      details: "local file vector store"
    });

    localClient.collectionExists.mockRejectedValueOnce(new Error("disk error"));
    await expect(singleton.healthCheck()).resolves.toEqual({
      status: "error",
      details: "disk error"
    });
  });

  it("retries the remote connection and health-checks the catalog collection", async () => {
    vi.useFakeTimers();
    const remoteClient = {
      getCollections: vi
        .fn()
        .mockRejectedValueOnce(new Error("qdrant not ready"))
        .mockRejectedValueOnce(new Error("qdrant still not ready"))
        .mockResolvedValue({ collections: [] }),
      collectionExists: vi.fn().mockResolvedValue({ exists: false })
    };

    const { mod, QdrantClientConstructor } = await importQdrantClientModule({
      appMode: "prod",
      qdrantUrl: "http://localhost:6333",
      qdrantClientFactory: vi.fn().mockImplementation(() => remoteClient)
    });

    const first = mod.getQdrantClient();
    const second = mod.getQdrantClient();
    await vi.advanceTimersByTimeAsync(750);
    const [singleton, again] = await Promise.all([first, second]);

    expect(again).toBe(singleton);
    expect(singleton.backend).toBe("qdrant");
    expect(QdrantClientConstructor).toHaveBeenCalledTimes(1);
    expect(QdrantClientConstructor).toHaveBeenCalledWith({
      url: "http://localhost:6333",
      apiKey: "test-secret",
      timeout: 5000
    });
    expect(remoteClient.getCollections).toHaveBeenCalledTimes(3);

    await expect(singleton.healthCheck()).resolves.toEqual({
      status: "error",
      details: "collection catalog not found"
    });
    expect(remoteClient.collectionExists).toHaveBeenCalledWith("catalog");
  });

  it("forgets a failed connection so the next call tries again", async () => {
    vi.useFakeTimers();
    const remoteClient = {
      getCollections: vi.fn().mockRejectedValue(new Error("connection refused")),
      collectionExists: vi.fn()
    };
    const { mod, QdrantClientConstructor } = await importQdrantClientModule({
      appMode: "prod",
      qdrantUrl: "http://localhost:6333",
      qdrantClientFactory: vi.fn().mockImplementation(() => remoteClient)
    });

    const pending = mod.getQdrantClient();
    const assertion = expect(pending).rejects.toThrow("connection refused");
    await vi.advanceTimersByTimeAsync(750);
    await assertion;

    const retry = mod.getQdrantClient();
    const retryAssertion = expect(retry).rejects.toThrow("connection refused");
    await vi.advanceTimersByTimeAsync(750);
    await retryAssertion;

    expect(QdrantClientConstructor).toHaveBeenCalledTimes(2);
    expect(remoteClient.getCollections).toHaveBeenCalledTimes(6);
  });
});

describe("clients/registry", () => {
  it("lists the openai and qdrant clients", async () => {
    const clients = await loadManagedClients();
    expect(clients.map((client) => client.name)).toEqual(["openai", "qdrant"]);
  });
});

describe("clients/lifecycle", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  const makeClients = (shutdownFailure?: Error) => {
    const openaiHealth = vi.fn(async () => ({ status: "ok" as const }));
    const qdrantHealth = vi.fn(async () => ({ status: "error" as const, details: "collection catalog not found" }));
    const clients: ManagedClient[] = [
      {
        name: "openai",
        connect: async () => ({ healthCheck: openaiHealth }),
        shutdown: vi.fn(async () => undefined)
      },
      {
        name: "qdrant",
        connect: async () => ({ healthCheck: qdrantHealth }),
        shutdown: shutdownFailure ? vi.fn().mockRejectedValue(shutdownFailure) : vi.fn(async () => undefined)
      }
    ];
    return { clients, openaiHealth, qdrantHealth, loadClients: vi.fn(async () => clients) };
  };

  it("registers no hooks when bootstrap is disabled", async () => {
    const lifecycle = await import("../../src/clients/lifecycle.js");
    lifecycle.resetClientLifecycleStateForTests();
    const { loadClients } = makeClients();
    const app = Fastify();
    const info = vi.spyOn(app.log, "info");

    lifecycle.registerClientLifecycle(app, { enableBootstrap: false, loadClients });
    await app.ready();
    await app.close();

    expect(info).toHaveBeenCalledWith("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    expect(loadClients).not.toHaveBeenCalled();
  });

  it("health-checks clients on ready and shuts them down on close", async () => {
    const lifecycle = await import("../../src/clients/lifecycle.js");
    lifecycle.resetClientLifecycleStateForTests();
    const { clients, openaiHealth, qdrantHealth, loadClients } = makeClients(new Error("already closed"));
    const app = Fastify();

    lifecycle.registerClientLifecycle(app, { enableBootstrap: true, loadClients, registerProcessSignals: false });

    await app.ready();
    expect(openaiHealth).toHaveBeenCalledTimes(1);
    expect(qdrantHealth).toHaveBeenCalledTimes(1);

    await app.close();
    expect(clients[0]?.shutdown).toHaveBeenCalledTimes(1);
    expect(clients[1]?.shutdown).toHaveBeenCalledTimes(1);
  });
});
