import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  JSON_BODY_LIMIT: z.string().default("8mb"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  EMBEDDING_PROVIDER: z.enum(["openai", "hashing"]).default("openai"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default("https://api.openai.com/v1"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_SEND_DIMENSIONS: booleanFlag,
  DEFAULT_EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),
  EMBEDDING_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  EMBEDDING_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  EMBEDDING_RETRY_DELAY_MS: z.coerce.number().int().positive().default(500),
  EMBEDDING_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(300),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SEARCH_STRATEGY: z.enum(["vector", "hybrid", "graph"]).default("hybrid"),
  SEARCH_VECTOR_WEIGHT: z.coerce.number().min(0).max(1).default(0.5),
  SEARCH_DEFAULT_TOP_K: z.coerce.number().int().positive().default(5),
  SEARCH_MAX_TOP_K: z.coerce.number().int().positive().default(100),
  SEARCH_CANDIDATE_LIMIT: z.coerce.number().int().positive().default(200),
  SEARCH_GRAPH_NEIGHBOR_DECAY: z.coerce.number().min(0).max(1).default(0.5),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  ANALYTICS_SAMPLE_SIZE: z.coerce.number().int().min(0).default(5),
  ANSWER_SYNTHESIS_ENABLED: booleanFlag,
  ANSWER_API_KEY: z.string().default(""),
  ANSWER_BASE_URL: z.string().default("https://api.openai.com/v1"),
  ANSWER_MODEL: z.string().default("gpt-4o-mini"),
  ANSWER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000)
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  return envSchema.parse(env);
}

export const appConfig: AppConfig = parseConfig(process.env);
