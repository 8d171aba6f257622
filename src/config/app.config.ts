import { ConfigError } from "../modules/shared/errors";

export type ProviderName = "ollama" | "openai";

export interface OllamaSettings {
  baseUrl: string;
  model: string;
  embeddingModel: string;
}

export interface OpenAiSettings {
  baseUrl: string;
  apiKey?: string;
  model: string;
  embeddingModel: string;
}

export interface AppConfig {
  chunkSize: number;
  chunkOverlap: number;
  batchSize: number;
  topK: number;
  retryDelayMs: number;
  maxRetries: number;
  sensitiveTopics: readonly string[];
  fabricationIndicators: readonly string[];
  cacheDirectory: string;
  authoritativeSourcePath: string;
  supplementalSourcePath: string;
  productName: string;
  provider: ProviderName;
  temperature: number;
  ollama: OllamaSettings;
  openai: OpenAiSettings;
  port: number;
}

export const DEFAULT_SENSITIVE_TOPICS = [
  "price",
  "pricing",
  "cost",
  "warranty",
  "guarantee",
  "availability",
  "stock",
  "delivery",
  "shipping",
  "technical specifications",
  "performance numbers",
];

export const DEFAULT_FABRICATION_INDICATORS = [
  "approximately",
  "around",
  "roughly",
  "about $",
  "₹",
  "starting from",
  "priced at",
  "costs",
  "estimated",
  "likely",
  "probably",
  "might be",
  "could be",
];

type Env = Record<string, string | undefined>;

function safeNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim().length === 0) return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function readString(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
}

function readList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined || value.trim().length === 0) return [...fallback];
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function resolveProvider(env: Env): ProviderName {
  const explicit = env.LLM_PROVIDER?.trim().toLowerCase();
  if (explicit === "ollama" || explicit === "openai") return explicit;
  if (explicit) {
    throw new ConfigError({
      option: "LLM_PROVIDER",
      message: `Unsupported LLM provider: ${explicit}`,
    });
  }
  return env.OPENAI_API_KEY?.trim() ? "openai" : "ollama";
}

function assertPositive(option: string, value: number): void {
  if (!(value > 0)) {
    throw new ConfigError({ option, message: `${option} must be greater than 0 (got ${value})` });
  }
}

export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const config: AppConfig = {
    chunkSize: Math.floor(safeNumber(env.CHUNK_SIZE, 800)),
    chunkOverlap: Math.floor(safeNumber(env.CHUNK_OVERLAP, 100)),
    batchSize: Math.floor(safeNumber(env.BATCH_SIZE, 20)),
    topK: Math.floor(safeNumber(env.TOP_K, 3)),
    retryDelayMs: Math.max(0, safeNumber(env.RETRY_DELAY_MS, 2000)),
    maxRetries: Math.max(0, Math.floor(safeNumber(env.MAX_RETRIES, 3))),
    sensitiveTopics: Object.freeze(readList(env.SENSITIVE_TOPICS, DEFAULT_SENSITIVE_TOPICS)),
    fabricationIndicators: Object.freeze(
      readList(env.FABRICATION_INDICATORS, DEFAULT_FABRICATION_INDICATORS)
    ),
    cacheDirectory: readString(env.CACHE_DIR, "cache"),
    authoritativeSourcePath: readString(env.FACTS_FILE, "data/product_facts.md"),
    supplementalSourcePath: readString(env.EXTERNAL_FILE, "data/product_external.json"),
    productName: readString(env.PRODUCT_NAME, "the product"),
    provider: resolveProvider(env),
    temperature: safeNumber(env.LLM_TEMPERATURE, 0),
    ollama: Object.freeze({
      baseUrl: readString(env.OLLAMA_BASE_URL, "http://localhost:11434"),
      model: readString(env.OLLAMA_MODEL, "llama3.2"),
      embeddingModel: readString(env.EMBEDDING_MODEL, "nomic-embed-text"),
    }),
    openai: Object.freeze({
      baseUrl: readString(env.OPENAI_API_BASE_URL, "https://api.openai.com/v1"),
      apiKey: env.OPENAI_API_KEY?.trim() || undefined,
      model: readString(env.OPENAI_MODEL, "gpt-4.1-mini"),
      embeddingModel: readString(env.OPENAI_EMBEDDING_MODEL, "text-embedding-3-small"),
    }),
    port: Math.floor(safeNumber(env.PORT, 4000)),
  };

  assertPositive("CHUNK_SIZE", config.chunkSize);
  assertPositive("BATCH_SIZE", config.batchSize);
  assertPositive("TOP_K", config.topK);

  if (config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
    throw new ConfigError({
      option: "CHUNK_OVERLAP",
      message: `CHUNK_OVERLAP must be between 0 and CHUNK_SIZE - 1 (got ${config.chunkOverlap})`,
    });
  }

  return Object.freeze(config);
}
