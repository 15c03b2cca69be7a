import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { getConfig } from "./config/index.js";
import { serializeError } from "./errors.js";
import { logError } from "./observability/logger.js";

export async function bootstrap(): Promise<void> {
  const config = getConfig();
  const app = await buildApp();
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error) => {
    logError("server.startup.failed", {}, serializeError(error));
    process.exitCode = 1;
  });
}
