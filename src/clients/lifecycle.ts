import type { FastifyInstance } from "fastify";
import { serializeError } from "../errors.js";
import { logError, logInfo, logWarn } from "../observability/logger.js";
import { checkManagedClients, loadManagedClients, shutdownManagedClients, type ManagedClient } from "./registry.js";

let processHooksRegistered = false;

export interface ClientLifecycleOptions {
  /** Defaults to ENABLE_INFRA_BOOTSTRAP. */
  enableBootstrap?: boolean;
  loadClients?: () => Promise<ManagedClient[]>;
  registerProcessSignals?: boolean;
  exit?: (code: number) => never | void;
}

const isFlagEnabled = (value: string | undefined): boolean => {
  const normalized = value?.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
};

async function shutdownAll(trigger: string, loadClients: () => Promise<ManagedClient[]>): Promise<void> {
  const clients = await loadClients();
  logInfo("clients.lifecycle.shutdown", {}, { trigger, clients: clients.map((client) => client.name) });
  const results = await shutdownManagedClients(clients);
  results.forEach((result, index) => {
    if (result.status === "rejected") {
      logWarn("clients.lifecycle.shutdown_failed", {}, {
        client: clients[index]?.name ?? null,
        ...serializeError(result.reason)
      });
    }
  });
}

/**
 * Connects and health-checks the external clients when the server is ready
 * and releases them on close or on SIGINT/SIGTERM. Health failures are logged,
 * not fatal: queries degrade per stage instead.
 */
export function registerClientLifecycle(app: FastifyInstance, options?: ClientLifecycleOptions): void {
  const enableBootstrap = options?.enableBootstrap ?? isFlagEnabled(process.env.ENABLE_INFRA_BOOTSTRAP);
  if (!enableBootstrap) {
    app.log.info("Infrastructure bootstrap disabled (set ENABLE_INFRA_BOOTSTRAP=true to enable).");
    return;
  }
  const loadClients = options?.loadClients ?? loadManagedClients;
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  app.addHook("onReady", async () => {
    const report = await checkManagedClients(await loadClients());
    const log = report.status === "ok" ? logInfo : logWarn;
    log("clients.lifecycle.ready", {}, { status: report.status, clients: report.clients });
  });

  app.addHook("onClose", async () => {
    await shutdownAll("server_close", loadClients);
  });

  if ((options?.registerProcessSignals ?? true) && !processHooksRegistered) {
    processHooksRegistered = true;
    const onSignal = (signal: NodeJS.Signals) => {
      shutdownAll(signal, loadClients).then(
        () => exit(0),
        (error: unknown) => {
          logError("clients.lifecycle.signal_shutdown_failed", {}, { signal, ...serializeError(error) });
          exit(1);
        }
      );
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }
}

export function resetClientLifecycleStateForTests(): void {
  processHooksRegistered = false;
}
