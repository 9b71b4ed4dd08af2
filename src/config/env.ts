import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: z.enum(["true", "false"]).optional(),
  EMBEDDING_SERVICE_URL: z.string().url().default("http://127.0.0.1:8080"),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TEXT_MODEL_NAME: z.string().default("sentence-transformers/all-MiniLM-L6-v2"),
  TEXT_EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(384),
  IMAGE_MODEL_NAME: z.string().default("openai/clip-vit-base-patch32"),
  IMAGE_EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(512),
  AUDIO_MODEL_NAME: z.string().default("laion/clap-htsat-unfused"),
  AUDIO_EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(512),
  AUDIO_SAMPLE_RATE: z.coerce.number().int().positive().default(48_000),
  AUDIO_CHUNK_SECONDS: z.coerce.number().int().positive().default(20),
  CRAWL_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  ASSET_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_ASSET_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  INGEST_CONCURRENCY: z.coerce.number().int().positive().default(4),
  INGEST_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  INGEST_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(60_000),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("http"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export interface ModelConfig {
  name: string;
  dimension: number;
}

export interface AudioModelConfig extends ModelConfig {
  sampleRate: number;
  chunkSeconds: number;
}

export interface AppConfig {
  enablePgvector: boolean;
  databaseUrl: string | null;
  embeddingServiceUrl: string;
  embeddingTimeoutMs: number;
  models: {
    text: ModelConfig;
    image: ModelConfig;
    audio: AudioModelConfig;
  };
  crawlFetchTimeoutMs: number;
  assetFetchTimeoutMs: number;
  maxAssetBytes: number;
  maxUploadBytes: number;
  ingest: {
    concurrency: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }

  return {
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    embeddingServiceUrl: parsed.EMBEDDING_SERVICE_URL.replace(/\/+$/, ""),
    embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    models: {
      text: {
        name: parsed.TEXT_MODEL_NAME,
        dimension: parsed.TEXT_EMBEDDING_DIMENSION,
      },
      image: {
        name: parsed.IMAGE_MODEL_NAME,
        dimension: parsed.IMAGE_EMBEDDING_DIMENSION,
      },
      audio: {
        name: parsed.AUDIO_MODEL_NAME,
        dimension: parsed.AUDIO_EMBEDDING_DIMENSION,
        sampleRate: parsed.AUDIO_SAMPLE_RATE,
        chunkSeconds: parsed.AUDIO_CHUNK_SECONDS,
      },
    },
    crawlFetchTimeoutMs: parsed.CRAWL_FETCH_TIMEOUT_MS,
    assetFetchTimeoutMs: parsed.ASSET_FETCH_TIMEOUT_MS,
    maxAssetBytes: parsed.MAX_ASSET_BYTES,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    ingest: {
      concurrency: parsed.INGEST_CONCURRENCY,
      maxAttempts: parsed.INGEST_MAX_ATTEMPTS,
      retryDelayMs: parsed.INGEST_RETRY_DELAY_MS,
    },
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
