import type { FastifyInstance } from "fastify";
import { checkManagedClients, loadManagedClients, type ManagedClient } from "../../clients/registry.js";
import { mapErrorMessage, serializeError } from "../../errors.js";
import { logError } from "../../observability/logger.js";

export interface InfrastructureHealthDependencies {
  loadClients?: () => Promise<ManagedClient[]>;
}

/** `GET /infra/health`: 200 with `ok` or `degraded`, 503 when a client cannot be created. */
export async function registerInfrastructureHealthRoute(
  app: FastifyInstance,
  dependencies: InfrastructureHealthDependencies = {}
): Promise<void> {
  const loadClients = dependencies.loadClients ?? loadManagedClients;

  app.get("/infra/health", async (request, reply) => {
    try {
      return await checkManagedClients(await loadClients());
    } catch (error) {
      logError("infra.health.failed", { requestId: request.id }, serializeError(error));
      reply.code(503);
      return { status: "error", detail: mapErrorMessage(error) };
    }
  });
}
