import { z } from "zod";

export const DEFAULT_LOCAL_KEYWORDS = [
  "sereleia",
  "sereleian",
  "xylos",
  "elara vance",
  "dr. elara",
  "vance protocol",
  "aether core",
  "lys harbor",
];

export const DEFAULT_REALTIME_KEYWORDS = [
  "today",
  "latest",
  "price",
  "prices",
  "weather",
  "traffic",
  "now",
  "breaking",
  "trend",
  "news",
  "stock",
  "2024",
  "2025",
];

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const weight = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().min(64).default(800),
  LLM_VISION_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  OLLAMA_VISION_MODEL: z.string().default("llava:7b"),
  TAVILY_API_KEY: z.string().optional(),
  TAVILY_BASE_URL: z.string().url().default("https://api.tavily.com"),
  LOCAL_KEYWORDS: z.string().optional(),
  REALTIME_KEYWORDS: z.string().optional(),
  LOCAL_TOP_K: z.coerce.number().int().positive().default(6),
  CACHE_TTL_SECONDS: z.coerce.number().positive().default(900),
  CALL_TIMEOUT_SECONDS: z.coerce.number().positive().default(20),
  ENABLE_RERANK: booleanFlag.default("true"),
  RERANK_VECTOR_WEIGHT: weight.default(0.6),
  RERANK_BM25_WEIGHT: weight.default(0.4),
  RERANK_RECENCY_WEIGHT: weight.default(0.3),
  RERANK_AUTHORITY_WEIGHT: weight.default(0.3),
  RERANK_RELEVANCE_WEIGHT: weight.default(0.4),
  DATA_DIR: z.string().default("storage/data"),
  INDEX_PATH: z.string().default("storage/indexes/knowledge-index.json"),
  MAX_INDEX_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  TRANSPORT: z.enum(["http", "stdio"]).default("http"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  LOG_PRETTY: booleanFlag.default("false"),
});

export type EmbeddingProvider = "none" | "openai" | "ollama";

export type LlmProvider = "openai" | "ollama";

export interface RerankWeights {
  vector: number;
  bm25: number;
  recency: number;
  authority: number;
  relevance: number;
}

export interface AppConfig {
  llmProvider: LlmProvider;
  llmApiKey: string | null;
  llmBaseUrl: string;
  llmModel: string;
  llmTemperature: number;
  llmMaxTokens: number;
  /** Chat model used for image questions with the active LLM provider. */
  visionModel: string;
  embeddingProvider: EmbeddingProvider;
  embeddingModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  tavilyApiKey: string | null;
  tavilyBaseUrl: string;
  localKeywords: string[];
  realtimeKeywords: string[];
  defaultTopK: number;
  cacheTtlSeconds: number;
  callTimeoutMs: number;
  enableRerank: boolean;
  rerankWeights: RerankWeights;
  dataDir: string;
  indexPath: string;
  maxIndexBytes: number;
  maxImageBytes: number;
  transport: "http" | "stdio";
  host: string;
  port: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  logPretty: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const llmApiKey = blankToNull(parsed.LLM_API_KEY);

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (llmApiKey && parsed.LLM_PROVIDER === "openai" ? "openai" : "none");

  if (embeddingProvider === "openai" && !llmApiKey) {
    throw new Error("EMBEDDING_PROVIDER=openai requires LLM_API_KEY.");
  }

  const localKeywords = parseKeywordList(parsed.LOCAL_KEYWORDS, DEFAULT_LOCAL_KEYWORDS);
  const realtimeKeywords = parseKeywordList(parsed.REALTIME_KEYWORDS, DEFAULT_REALTIME_KEYWORDS);

  return {
    llmProvider: parsed.LLM_PROVIDER,
    llmApiKey,
    llmBaseUrl: parsed.LLM_BASE_URL.replace(/\/+$/, ""),
    llmModel: parsed.LLM_MODEL,
    llmTemperature: parsed.LLM_TEMPERATURE,
    llmMaxTokens: parsed.LLM_MAX_TOKENS,
    visionModel:
      parsed.LLM_PROVIDER === "ollama" ? parsed.OLLAMA_VISION_MODEL : parsed.LLM_VISION_MODEL,
    embeddingProvider,
    embeddingModel: parsed.EMBEDDING_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    tavilyApiKey: blankToNull(parsed.TAVILY_API_KEY),
    tavilyBaseUrl: parsed.TAVILY_BASE_URL.replace(/\/+$/, ""),
    localKeywords,
    realtimeKeywords,
    defaultTopK: parsed.LOCAL_TOP_K,
    cacheTtlSeconds: parsed.CACHE_TTL_SECONDS,
    callTimeoutMs: Math.round(parsed.CALL_TIMEOUT_SECONDS * 1000),
    enableRerank: parsed.ENABLE_RERANK,
    rerankWeights: {
      vector: parsed.RERANK_VECTOR_WEIGHT,
      bm25: parsed.RERANK_BM25_WEIGHT,
      recency: parsed.RERANK_RECENCY_WEIGHT,
      authority: parsed.RERANK_AUTHORITY_WEIGHT,
      relevance: parsed.RERANK_RELEVANCE_WEIGHT,
    },
    dataDir: parsed.DATA_DIR,
    indexPath: parsed.INDEX_PATH,
    maxIndexBytes: parsed.MAX_INDEX_BYTES,
    maxImageBytes: parsed.MAX_IMAGE_BYTES,
    transport: parsed.TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
  };
}

/**
 * Splits a comma-separated keyword list. An unset variable keeps the defaults;
 * an explicitly empty one disables that rule set.
 */
export function parseKeywordList(raw: string | undefined, fallback: string[]): string[] {
  if (raw === undefined) {
    return [...fallback];
  }
  const keywords = raw
    .split(",")
    .map((keyword) => keyword.trim().toLowerCase())
    .filter(Boolean);
  return [...new Set(keywords)];
}

function blankToNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
