import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? ((filePath: string, encoding: "utf8") => fs.readFileSync(filePath, encoding));
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
  return envFilePath;
}

loadModeEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });
const optionalPositiveInt = z
  .union([z.string(), z.number()])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || (typeof value === "string" && value.trim().length === 0)) {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a non-negative integer" });
      return z.NEVER;
    }
    return parsed;
  });

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  NCBI_EMAIL: z.string().email("NCBI_EMAIL must be a contact email address"),
  NCBI_API_KEY: optionalTrimmedString,
  NCBI_TOOL: z.string().min(1).default("literature-assistant"),
  NCBI_BASE_URL: z.string().url().default("https://eutils.ncbi.nlm.nih.gov/entrez/eutils"),
  RETRIEVAL_MIN_INTERVAL_MS: optionalPositiveInt,
  RETRIEVAL_PAGE_SIZE: z.coerce.number().int().min(1).max(50).default(20),
  RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RETRIEVAL_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRIEVAL_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(500),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  EMBEDDING_MAX_INPUT_CHARS: z.coerce.number().int().positive().default(8_000),
  EMBEDDING_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(500),
  SUMMARIZATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SUMMARIZATION_BACKOFF_MS: z.coerce.number().int().min(0).default(1_000),
  SUMMARY_CONTEXT_BUDGET_CHARS: z.coerce.number().int().min(1_000).default(12_000),
  CACHE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(100),
  CACHE_SNAPSHOT_FILE: optionalTrimmedString,
  SEARCH_DEFAULT_MAX_RESULTS: z.coerce.number().int().min(1).max(50).default(5),
  FOLLOWUP_TOP_K: z.coerce.number().int().min(1).default(3),
  MESSAGE_MAX_CHARS: z.coerce.number().int().min(200).default(4096),
  SEARCH_HISTORY_MAX_ENTRIES: z.coerce.number().int().positive().default(200)
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

/** NCBI allows 3 requests/s without an API key and 10/s with one. */
export function resolveRetrievalMinIntervalMs(value: Pick<Env, "RETRIEVAL_MIN_INTERVAL_MS" | "NCBI_API_KEY">): number {
  if (value.RETRIEVAL_MIN_INTERVAL_MS !== undefined) {
    return value.RETRIEVAL_MIN_INTERVAL_MS;
  }
  return value.NCBI_API_KEY ? 100 : 340;
}

export const env: Env = parseEnv(process.env);
