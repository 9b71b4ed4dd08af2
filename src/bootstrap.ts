import { AppConfig } from "./config/env.js";
import { FeatureStore } from "./domain/featureStore.js";
import { createFeatureExtractors } from "./infra/ai/httpFeatureClient.js";
import { FeatureExtractors } from "./infra/ai/types.js";
import { FetchLike, HttpFetcher } from "./infra/http/fetcher.js";
import { TaskQueue } from "./infra/queue/taskQueue.js";
import { createFeatureStore, embeddingDimensionsOf } from "./infra/store/createFeatureStore.js";
import { FrontierCrawler } from "./services/frontierCrawler.js";
import {
  IngestionTasks,
  QueueIngestionDispatcher,
  registerIngestionTasks,
} from "./services/ingestionDispatcher.js";
import { IngestionService } from "./services/ingestionService.js";
import { RetrievalService } from "./services/retrievalService.js";
import { Sleep } from "./utils/time.js";

export type StoreBackend = "memory" | "pgvector" | "injected";

export interface AppContext {
  config: AppConfig;
  featureStore: FeatureStore;
  storeBackend: StoreBackend;
  ingestion: IngestionService;
  retrieval: RetrievalService;
  queue: TaskQueue<IngestionTasks>;
  crawler: FrontierCrawler;
  /** Releases the store; does not wait for queued ingestion work. */
  close: () => Promise<void>;
}

/** Seams used by tests to run the whole graph in process. */
export interface AppContextOverrides {
  featureStore?: FeatureStore;
  extractors?: FeatureExtractors;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

export async function createAppContext(
  config: AppConfig,
  overrides: AppContextOverrides = {},
): Promise<AppContext> {
  const store = overrides.featureStore
    ? { featureStore: overrides.featureStore, backend: "injected" as const, close: async () => {} }
    : await createFeatureStore(config);

  const extractors = overrides.extractors ?? createFeatureExtractors(config);
  const fetcher = new HttpFetcher({
    pageTimeoutMs: config.crawlFetchTimeoutMs,
    assetTimeoutMs: config.assetFetchTimeoutMs,
    maxAssetBytes: config.maxAssetBytes,
    fetchImpl: overrides.fetchImpl,
  });

  const ingestion = new IngestionService(store.featureStore, extractors, fetcher, {
    audio: {
      sampleRate: config.models.audio.sampleRate,
      chunkSeconds: config.models.audio.chunkSeconds,
    },
  });

  const queue = new TaskQueue<IngestionTasks>({
    concurrency: config.ingest.concurrency,
    retry: {
      maxAttempts: config.ingest.maxAttempts,
      backoffMs: config.ingest.retryDelayMs,
    },
    sleep: overrides.sleep,
  });
  registerIngestionTasks(queue, ingestion);

  const crawler = new FrontierCrawler({
    fetcher,
    dispatcher: new QueueIngestionDispatcher(queue),
    sleep: overrides.sleep,
  });

  const retrieval = new RetrievalService(store.featureStore, extractors, {
    dimensions: embeddingDimensionsOf(config),
    audioSampleRate: config.models.audio.sampleRate,
    maxUploadBytes: config.maxUploadBytes,
  });

  return {
    config,
    featureStore: store.featureStore,
    storeBackend: store.backend,
    ingestion,
    retrieval,
    queue,
    crawler,
    close: store.close,
  };
}
