import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerClientLifecycle, type ClientLifecycleOptions } from "./clients/lifecycle.js";
import { registerHealthRoute } from "./api/routes/health.js";
import { registerInfrastructureHealthRoute } from "./api/routes/infrastructure-health.js";
import { registerQueryRoutes, type QueryRoutesDependencies } from "./api/routes/query.js";
import { registerMetricsRoutes, registerRequestMetricsHooks } from "./observability/metrics.js";

export interface BuildAppOptions {
  queryDependencies?: QueryRoutesDependencies;
  registerInfrastructureHealth?: boolean;
  lifecycle?: ClientLifecycleOptions;
  logger?: boolean;
}

const DEFAULT_FRONTEND_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173"];

const LOOPBACK_ALIASES: Record<string, string> = { localhost: "127.0.0.1", "127.0.0.1": "localhost" };

/** The same origin with `localhost` and `127.0.0.1` swapped, or null when it has no loopback host. */
const loopbackAlias = (origin: string): string | null => {
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    return null;
  }
  const alias = LOOPBACK_ALIASES[url.hostname];
  if (!alias) {
    return null;
  }
  url.hostname = alias;
  return url.origin;
};

/** Comma-separated FRONTEND_ORIGIN entries plus their loopback aliases. */
export function buildAllowedFrontendOrigins(rawOrigin: string | undefined): string[] {
  const configured = (rawOrigin ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const origins = new Set(configured.length > 0 ? configured : DEFAULT_FRONTEND_ORIGINS);

  for (const origin of [...origins]) {
    const alias = loopbackAlias(origin);
    if (alias) {
      origins.add(alias);
    }
  }
  return [...origins];
}

export async function buildApp(options?: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options?.logger ?? true });

  await app.register(cors, {
    origin: buildAllowedFrontendOrigins(process.env.FRONTEND_ORIGIN),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"]
  });

  registerRequestMetricsHooks(app);
  registerClientLifecycle(app, options?.lifecycle);
  await registerHealthRoute(app);
  await registerMetricsRoutes(app);
  if (options?.registerInfrastructureHealth !== false) {
    await registerInfrastructureHealthRoute(app);
  }
  await registerQueryRoutes(app, options?.queryDependencies);

  return app;
}
