import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

// Engine tunables only turn numeric strings into numbers here; anything else
// passes through to engineConfigSchema and surfaces as a ConfigurationError.
function engineTunable(fallback: number) {
  return z.preprocess((value) => {
    if (value === undefined || value === "") {
      return fallback;
    }
    if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) {
      return Number(value);
    }
    return value;
  }, z.unknown());
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  CONVERSATION_DB_PATH: z.string().default("data/conversations.db"),
  CORPUS_SOURCE: z.enum(["file", "neo4j"]).default("file"),
  CORPUS_DIR: z.string().default("data/corpus"),
  CORPUS_GRAPH_FILE: z.string().default("graph.json"),
  CORPUS_CHUNKS_FILE: z.string().default("chunks.json"),
  LLM_PROVIDER: z.enum(["groq", "openai"]).default("groq"),
  GROQ_API_KEY: z.string().default(""),
  GROQ_BASE_URL: z.string().default("https://api.groq.com/openai/v1"),
  GROQ_CHAT_MODEL: z.string().default("openai/gpt-oss-120b"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default("https://api.openai.com/v1"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(30),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  RETRIEVAL_TOP_K: engineTunable(5),
  SIMILARITY_THRESHOLD: engineTunable(0.25),
  MAX_TRAVERSAL_DEPTH: engineTunable(2),
  MIN_EDGE_CONFIDENCE: engineTunable(0.5),
  MAX_PATHS: engineTunable(12),
  MAX_ANCHORS: engineTunable(5),
  CONTEXT_BUDGET_CHARS: engineTunable(6000),
  HISTORY_TURNS: engineTunable(3)
});

export type AppConfig = z.infer<typeof envSchema>;
export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  return envSchema.parse(env);
}

export const appConfig: AppConfig = loadAppConfig(process.env);
