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

export interface LoadEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: typeof fs.readFileSync;
}

/**
 * Loads `.env.<APP_MODE>`, `.env.local` or `.env` (first match wins) into the process
 * environment. Variables already set in the environment are never overridden.
 */
export function loadEnvFile(options: LoadEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const fileCandidates = [
    ...(explicitMode ? [`.env.${explicitMode}`] : []),
    ".env.local",
    ".env"
  ].map((name) => path.join(cwd, name));

  const envFilePath = fileCandidates.find((candidate) => existsSync(candidate));
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

loadEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

const modelName = (fallback: string) => z.string().trim().min(1).default(fallback);

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  LOG_LEVEL: optionalTrimmed,
  OPENAI_API_KEY: optionalTrimmed,
  OPENAI_BASE_URL: optionalTrimmed,
  OPENAI_REWRITE_MODEL: modelName("gpt-4.1-mini"),
  OPENAI_CLASSIFIER_MODEL: modelName("gpt-4.1-mini"),
  OPENAI_EXTRACTION_MODEL: modelName("gpt-4o-mini"),
  OPENAI_INTENT_MODEL: modelName("gpt-4o-mini"),
  OPENAI_GENERAL_MODEL: modelName("gpt-4.1-mini"),
  OPENAI_RULES_MODEL: modelName("gpt-4.1-mini"),
  OPENAI_FOLLOW_UP_MODEL: modelName("gpt-4.1-mini"),
  OPENAI_ADVISOR_MODEL: modelName("gpt-4.1"),
  OPENAI_SUMMARY_MODEL: modelName("gpt-4.1-mini"),
  OPENAI_EMBEDDING_MODEL: modelName("text-embedding-3-small"),
  QDRANT_URL: optionalTrimmed,
  QDRANT_API_KEY: optionalTrimmed,
  QDRANT_COLLECTION_GENERAL_TRACK: optionalTrimmed,
  QDRANT_COLLECTION_SPECIALIZED_TRACK: optionalTrimmed,
  QDRANT_COLLECTION_SPECIALIZATION_TRACK: optionalTrimmed,
  PARENT_DOCUMENTS_FILE: optionalTrimmed,
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(14),
  SEARCH_K_HEADROOM: z.coerce.number().int().min(0).default(1),
  PRICE_LOWER_TOLERANCE: z.coerce.number().min(0).default(1000),
  PRICE_UPPER_TOLERANCE: z.coerce.number().min(0).default(2000)
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

export const env: Env = parseEnv(process.env);
