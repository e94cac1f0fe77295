import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const optionalPositiveInt = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.coerce.number().int().positive().optional()
);

export const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3001),
    CORS_ORIGIN: z.string().default("http://localhost:5173"),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    LLM_BASE_URL: z.string().default("http://localhost:11434/v1"),
    LLM_API_KEY: z.string().default("ollama"),
    EMBEDDING_BASE_URL: z.string().default(""),
    EMBEDDING_API_KEY: z.string().default(""),
    EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
    EMBEDDING_DIMENSIONS: optionalPositiveInt,
    GENERATION_MODEL: z.string().min(1).default("llama2"),
    GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
    PERSIST_DIR: z.string().default("data/index"),
    COLLECTION_NAME: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "COLLECTION_NAME may only contain letters, digits, _ and -")
      .default("company_docs"),
    DOCUMENTS_DIR: z.string().default("data/documents"),
    MAX_FILE_SIZE: z.coerce.number().int().positive().default(50 * 1024 * 1024),
    CHUNK_SIZE: z.coerce.number().int().positive().default(500),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(50),
    CHUNK_STRATEGY: z.enum(["fixed", "recursive"]).default("fixed"),
    DEFAULT_TOP_K: z.coerce.number().int().positive().default(3),
    SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0),
    MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(6000),
    MAX_CONVERSATION_TURNS: z.coerce.number().int().positive().default(20),
    QUERY_REWRITE_POLICY: z.enum(["none", "concatenate", "generate"]).default("concatenate"),
    REWRITE_HISTORY_TURNS: z.coerce.number().int().min(0).default(2),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),
    EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(4),
    INDEX_CONCURRENCY: z.coerce.number().int().positive().default(2),
    LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
    LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
    LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(600),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000)
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be less than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"]
  });

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);

export function getIndexPath(config: Pick<AppConfig, "PERSIST_DIR" | "COLLECTION_NAME"> = appConfig): string {
  return resolve(config.PERSIST_DIR, `${config.COLLECTION_NAME}.sqlite`);
}
