/**
 * Centralized configuration for the Slack message store.
 *
 * Environment variables are loaded from `.env` and validated once at startup:
 * - PostgreSQL connection and pool parameters
 * - Store driver selection (pgvector or in-memory)
 * - OpenAI embedding settings (384-dimensional output)
 * - Similarity search defaults
 * - Logging level and optional log file
 */
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

export const EMBEDDING_DIMENSION = 384;

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type ConfiguredLogLevel = (typeof LOG_LEVELS)[number];

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(fallback)
  );

const EnvSchema = z.object({
  NODE_ENV: z.preprocess(
    blankToUndefined,
    z
      .enum(["development", "test", "staging", "production"])
      .default("development")
  ),
  PORT: positiveInt(3000),

  DB_HOST: z.preprocess(blankToUndefined, z.string().default("localhost")),
  DB_PORT: positiveInt(5433),
  DB_USER: z.preprocess(blankToUndefined, z.string().default("wingman")),
  DB_PASSWORD: optionalString,
  DB_NAME: z.preprocess(blankToUndefined, z.string().default("slack_memory")),
  DB_SCHEMA: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[a-z_][a-z0-9_]*$/, "must be a lowercase SQL identifier")
      .default("slack_memory")
  ),
  DB_POOL_MAX: positiveInt(10),
  DB_IDLE_TIMEOUT_MS: positiveInt(30000),
  DB_CONN_TIMEOUT_MS: positiveInt(10000),

  STORE_DRIVER: z.preprocess(
    blankToUndefined,
    z.enum(["postgres", "memory"]).default("postgres")
  ),

  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  OPENAI_EMBEDDING_MODEL: z.preprocess(
    blankToUndefined,
    z.string().default("text-embedding-3-small")
  ),
  OPENAI_TIMEOUT_MS: positiveInt(30000),

  EMBEDDING_DIMENSION: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int()
      .refine((value) => value === EMBEDDING_DIMENSION, {
        message: `must be ${EMBEDDING_DIMENSION}, the width of the embedding column`,
      })
      .default(EMBEDDING_DIMENSION)
  ),

  SEARCH_TOP_K: positiveInt(5),
  SEARCH_MIN_SIMILARITY: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(1).default(0.7)
  ),

  LOG_LEVEL: z.preprocess(
    (value) =>
      typeof value === "string" ? blankToUndefined(value.toLowerCase()) : value,
    z.enum(LOG_LEVELS).default("info")
  ),
  LOG_FILE: optionalString,
});

export interface AppConfig {
  env: "development" | "test" | "staging" | "production";
  port: number;
  db: {
    host: string;
    port: number;
    user: string;
    password: string | undefined;
    database: string;
    schema: string;
    max: number;
    idleTimeoutMs: number;
    connectionTimeoutMs: number;
  };
  store: {
    driver: "postgres" | "memory";
  };
  openai: {
    key: string | undefined;
    baseUrl: string | undefined;
    embeddingModel: string;
    timeoutMs: number;
  };
  embedding: {
    dimension: number;
  };
  search: {
    topK: number;
    minSimilarity: number;
  };
  observability: {
    logLevel: ConfiguredLogLevel;
    logFile: string | undefined;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      schema: e.DB_SCHEMA,
      max: e.DB_POOL_MAX,
      idleTimeoutMs: e.DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMs: e.DB_CONN_TIMEOUT_MS,
    },
    store: {
      driver: e.STORE_DRIVER,
    },
    openai: {
      key: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
    },
    embedding: {
      dimension: e.EMBEDDING_DIMENSION,
    },
    search: {
      topK: e.SEARCH_TOP_K,
      minSimilarity: e.SEARCH_MIN_SIMILARITY,
    },
    observability: {
      logLevel: e.LOG_LEVEL,
      logFile: e.LOG_FILE,
    },
  };
}

const REDACTED = "***REDACTED***";

/**
 * Flat view of the configuration for startup logging, with secrets masked.
 */
export function describeConfig(cfg: AppConfig): Record<string, unknown> {
  return {
    env: cfg.env,
    port: cfg.port,
    storeDriver: cfg.store.driver,
    db: {
      ...cfg.db,
      password: cfg.db.password ? REDACTED : undefined,
    },
    openai: {
      ...cfg.openai,
      key: cfg.openai.key ? REDACTED : undefined,
    },
    embeddingDimension: cfg.embedding.dimension,
    search: cfg.search,
    logLevel: cfg.observability.logLevel,
    logFile: cfg.observability.logFile,
  };
}

export const config: AppConfig = loadConfig(process.env);
