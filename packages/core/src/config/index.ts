/**
 * Runtime configuration from environment variables, validated once at
 * startup. Every invalid variable is reported together in one ConfigError.
 */

import { z } from "zod";
import { ConfigError } from "../types/errors";

const optionalString = z.string().trim().min(1).optional();

const booleanFlag = z
  .preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["true", "false", "1", "0", "yes", "no"])
  )
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();

export const EnvSchema = z
  .object({
    CLOUD_PROVIDER: z.enum(["aws", "local"]).default("local"),
    RUNBOOK_BUCKET: optionalString,
    RUNBOOK_PREFIX: z.string().default("runbooks/"),
    RUNBOOK_LOCAL_DIR: z.string().default("./runbooks"),
    INGEST_ON_STARTUP: booleanFlag.default("false"),
    CHUNK_MAX_SIZE: positiveInt.default(2000),

    EMBEDDING_PROVIDER: z.enum(["ollama", "bedrock"]).default("ollama"),
    EMBEDDING_MODEL: optionalString,
    EMBEDDING_DIMENSION: positiveInt.optional(),
    EMBEDDING_TIMEOUT_MS: positiveInt.default(15000),

    VECTOR_STORE: z.enum(["memory", "file", "pg"]).default("memory"),
    VECTOR_STORE_DIR: z.string().default(".rag"),
    DATABASE_URL: optionalString,
    RETRIEVAL_TOP_K: positiveInt.default(5),

    LLM_PROVIDER: z.enum(["ollama", "anthropic", "bedrock"]).default("ollama"),
    LLM_MODEL: optionalString,
    LLM_MAX_TOKENS: positiveInt.default(2048),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    GENERATION_TIMEOUT_MS: positiveInt.default(60000),

    ENRICHMENT_LOOKBACK_MINUTES: positiveInt.default(15),
    ENRICHMENT_TIMEOUT_MS: positiveInt.default(10000),
    LOG_GROUP_NAME: optionalString,
    LOG_QUERY: optionalString,

    OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
    ANTHROPIC_API_KEY: optionalString,
    AWS_REGION: z.string().default("us-east-1"),

    WEBHOOK_CONFIG_PATH: optionalString,
    CHECKLIST_OUTPUT_DIR: optionalString,
    RESEND_API_KEY: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.CLOUD_PROVIDER === "aws" && !env.RUNBOOK_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RUNBOOK_BUCKET"],
        message: "required when CLOUD_PROVIDER=aws",
      });
    }
    if (env.VECTOR_STORE === "pg" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "required when VECTOR_STORE=pg",
      });
    }
    if (env.LLM_PROVIDER === "anthropic" && !env.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ANTHROPIC_API_KEY"],
        message: "required when LLM_PROVIDER=anthropic",
      });
    }
  });

export type AppConfig = ReturnType<typeof toAppConfig>;

function toAppConfig(env: z.infer<typeof EnvSchema>) {
  return {
    cloudProvider: env.CLOUD_PROVIDER,
    runbookBucket: env.RUNBOOK_BUCKET,
    runbookPrefix: env.RUNBOOK_PREFIX,
    runbookLocalDir: env.RUNBOOK_LOCAL_DIR,
    ingestOnStartup: env.INGEST_ON_STARTUP,
    chunkMaxSize: env.CHUNK_MAX_SIZE,
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      model: env.EMBEDDING_MODEL,
      dimension: env.EMBEDDING_DIMENSION,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    },
    vectorStore: {
      type: env.VECTOR_STORE,
      dir: env.VECTOR_STORE_DIR,
      databaseUrl: env.DATABASE_URL,
    },
    retrievalTopK: env.RETRIEVAL_TOP_K,
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      maxTokens: env.LLM_MAX_TOKENS,
      temperature: env.LLM_TEMPERATURE,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
    },
    enrichment: {
      lookbackMinutes: env.ENRICHMENT_LOOKBACK_MINUTES,
      timeoutMs: env.ENRICHMENT_TIMEOUT_MS,
      logGroupName: env.LOG_GROUP_NAME,
      logQuery: env.LOG_QUERY,
    },
    ollamaBaseUrl: env.OLLAMA_BASE_URL,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
    awsRegion: env.AWS_REGION,
    webhookConfigPath: env.WEBHOOK_CONFIG_PATH,
    checklistOutputDir: env.CHECKLIST_OUTPUT_DIR,
    resendApiKey: env.RESEND_API_KEY,
  };
}

/**
 * Validate and load configuration. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value;
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return toAppConfig(result.data);
}

export * from "./services";
