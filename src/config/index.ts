import { loadModeEnvFile, parseEnv, type Env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, loadModeEnvFile, parseDotEnvLine, parseEnv } from "./env.js";

export type Config = Readonly<Env>;

let cached: Config | null = null;

/**
 * Parses the process environment once. Throws ConfigurationInvalidError on the
 * first call when required settings are missing or out of range.
 */
export function getConfig(): Config {
  if (!cached) {
    loadModeEnvFile();
    cached = Object.freeze({ ...parseEnv(process.env) });
  }
  return cached;
}

export function resetConfigForTests(): void {
  cached = null;
}
