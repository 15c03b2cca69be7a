import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationInvalidError } from "../errors.js";

const DOTENV_ENTRY = /^([^=#\s][^=]*?)\s*=\s*(.*)$/;

const unquote = (value: string): string => {
  const quote = value[0];
  return value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote) ? value.slice(1, -1) : value;
};

/** `KEY=value` with optional surrounding quotes; blank lines and `#` comments yield null. */
export function parseDotEnvLine(line: string): [string, string] | null {
  const match = DOTENV_ENTRY.exec(line.trim());
  const key = match?.[1];
  if (!match || !key) {
    return null;
  }
  return [key, unquote((match[2] ?? "").trim())];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: (filePath: string) => boolean;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

const modeFileCandidates = (appMode: string | undefined): string[] => {
  const mode = appMode?.trim().toLowerCase();
  return mode === "local" || mode === "prod" ? [`.env.${mode}`] : [".env.local", ".env.prod"];
};

/**
 * Copies `.env.local` or `.env.prod` (picked by APP_MODE, else the first one
 * found) into `processEnv`. Keys already set in the environment win.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const {
    cwd = process.cwd(),
    processEnv = process.env,
    existsSync = fs.existsSync,
    readFileSync = (filePath: string) => fs.readFileSync(filePath, "utf8")
  } = options;

  const envFilePath = modeFileCandidates(processEnv.APP_MODE)
    .map((fileName) => path.join(cwd, fileName))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const entries = readFileSync(envFilePath, "utf8")
    .split(/\r?\n/)
    .map(parseDotEnvLine)
    .filter((entry): entry is [string, string] => entry !== null);
  for (const [key, value] of entries) {
    processEnv[key] ??= value;
  }

  return envFilePath;
}

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });
const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));
const unitIntervalSchema = z.coerce.number().min(0).max(1);
const positiveIntSchema = z.coerce.number().int().positive();

export const envSchema = z
  .object({
    APP_MODE: runtimeModeSchema.default("prod"),
    PORT: positiveIntSchema.default(3000),
    FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
    ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    OPENAI_EXTRACTION_MODEL: z.string().min(1).default("gpt-4.1-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    EMBEDDING_CACHE_TTL_SECONDS: positiveIntSchema.default(3600),
    EMBEDDING_CACHE_MAX_ENTRIES: positiveIntSchema.default(1000),
    OPENAI_TIMEOUT_MS: positiveIntSchema.default(20000),
    OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    LLM_EXTRACTION_ENABLED: booleanFlagSchema.default(true),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    LLM_MAX_TOKENS: positiveIntSchema.default(1024),
    EXTRACTION_PROMPT_FILE: optionalTrimmedString,
    QDRANT_URL: optionalTrimmedString,
    QDRANT_API_KEY: optionalTrimmedString,
    QDRANT_COLLECTION: z.string().min(1, "QDRANT_COLLECTION is required"),
    LOCAL_VECTOR_STORE_FILE: optionalTrimmedString,
    SIMILARITY_THRESHOLD: unitIntervalSchema.default(0.65),
    AMBIGUITY_THRESHOLD: unitIntervalSchema.default(0.75),
    HIGH_CONFIDENCE_SCORE: unitIntervalSchema.default(0.8),
    MEDIUM_CONFIDENCE_SCORE: unitIntervalSchema.default(0.6),
    RULE_BASED_CONFIDENCE_WEIGHT: unitIntervalSchema.default(0.8),
    PROFILE_SEARCH_LIMIT: positiveIntSchema.default(5),
    EVENT_SEARCH_LIMIT: positiveIntSchema.default(5),
    EVENT_ATTR_SEARCH_LIMIT: positiveIntSchema.default(10),
    EXTRACTION_TIMEOUT_MS: positiveIntSchema.default(15000),
    SEARCH_TIMEOUT_MS: positiveIntSchema.default(5000),
    QUERY_DEADLINE_MS: positiveIntSchema.default(30000)
  })
  .superRefine((value, ctx) => {
    if (value.APP_MODE === "prod" && !value.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required in prod mode"
      });
    }
    if (value.MEDIUM_CONFIDENCE_SCORE > value.HIGH_CONFIDENCE_SCORE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MEDIUM_CONFIDENCE_SCORE"],
        message: "MEDIUM_CONFIDENCE_SCORE must not exceed HIGH_CONFIDENCE_SCORE"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`);
    const details = issues.map((issue) => `- ${issue}`).join("\n");
    throw new ConfigurationInvalidError(`Invalid environment configuration:\n${details}`, issues);
  }

  return parsed.data;
}
