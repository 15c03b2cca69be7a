export type ClientHealth = { status: "ok" | "error"; details?: string };

export interface HealthCheckedClient {
  healthCheck(): Promise<ClientHealth>;
}

/** One external collaborator the service connects to lazily and releases on shutdown. */
export interface ManagedClient {
  name: string;
  connect(): Promise<HealthCheckedClient>;
  shutdown(): Promise<void>;
}

export interface ClientsHealthReport {
  status: "ok" | "degraded";
  clients: Record<string, ClientHealth>;
}

export async function loadManagedClients(): Promise<ManagedClient[]> {
  const [openai, qdrant] = await Promise.all([import("./openai.js"), import("./qdrant.js")]);
  return [
    { name: "openai", connect: openai.getOpenAIClient, shutdown: openai.shutdownOpenAIClient },
    { name: "qdrant", connect: qdrant.getQdrantClient, shutdown: qdrant.shutdownQdrantClient }
  ];
}

/** Connects every client and runs its health check. Connection failures propagate. */
export async function checkManagedClients(clients: readonly ManagedClient[]): Promise<ClientsHealthReport> {
  const results = await Promise.all(
    clients.map(async (client) => {
      const connected = await client.connect();
      return [client.name, await connected.healthCheck()] as const;
    })
  );

  return {
    status: results.every(([, health]) => health.status === "ok") ? "ok" : "degraded",
    clients: Object.fromEntries(results)
  };
}

export async function shutdownManagedClients(clients: readonly ManagedClient[]): Promise<PromiseSettledResult<void>[]> {
  return Promise.allSettled(clients.map((client) => client.shutdown()));
}
