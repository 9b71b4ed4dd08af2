import { AppConfig } from "../../config/env.js";
import { EmbeddingDimensions, FeatureStore } from "../../domain/featureStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryFeatureStore } from "./inMemoryFeatureStore.js";
import { PgVectorFeatureStore } from "./pgVectorFeatureStore.js";

export interface FeatureStoreBootstrapResult {
  featureStore: FeatureStore;
  backend: "memory" | "pgvector";
  close: () => Promise<void>;
}

export function embeddingDimensionsOf(config: AppConfig): EmbeddingDimensions {
  return {
    text: config.models.text.dimension,
    image: config.models.image.dimension,
    audio: config.models.audio.dimension,
  };
}

export async function createFeatureStore(
  config: AppConfig,
): Promise<FeatureStoreBootstrapResult> {
  const dimensions = embeddingDimensionsOf(config);

  if (!config.enablePgvector) {
    return {
      featureStore: new InMemoryFeatureStore(dimensions),
      backend: "memory",
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const featureStore = new PgVectorFeatureStore(pool, dimensions);
  await featureStore.initialize();

  return {
    featureStore,
    backend: "pgvector",
    close: async () => {
      await pool.end();
    },
  };
}
