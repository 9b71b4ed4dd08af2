import {
  EmbeddingBackendError,
  fail,
  OperationResult,
  succeed,
  toOperationError,
  ValidationError,
} from "../domain/errors.js";
import { AudioChunkFeatureInput, FeatureStore } from "../domain/featureStore.js";
import {
  AudioAssetDescriptor,
  ImageAssetDescriptor,
  MediaAssetDescriptor,
  MediaModality,
  TextRecord,
} from "../domain/types.js";
import { FeatureExtractors } from "../infra/ai/types.js";
import { AssetDownloader } from "../infra/http/fetcher.js";
import { decodeAudio } from "../infra/media/audioDecoder.js";
import { decodeImage } from "../infra/media/imageDecoder.js";
import { chunkWaveform } from "../pipelines/audioChunking.js";
import { AppLogger, createLogger } from "../utils/logger.js";

export interface IngestionServiceOptions {
  audio: {
    sampleRate: number;
    chunkSeconds: number;
  };
}

export interface MediaIngestionSummary {
  modality: MediaModality;
  assetUrl: string;
  recordCount: number;
}

/**
 * Turns fragments into stored feature records. Every operation embeds first
 * and writes last, so a failed attempt leaves nothing behind and a retry
 * either inserts (text) or overwrites (image, audio) cleanly.
 */
export class IngestionService {
  private readonly logger: AppLogger;

  constructor(
    private readonly featureStore: FeatureStore,
    private readonly extractors: FeatureExtractors,
    private readonly downloader: AssetDownloader,
    private readonly options: IngestionServiceOptions,
    logger?: AppLogger,
  ) {
    this.logger = logger ?? createLogger("ingestion");
  }

  async ingestText(content: string, sourceUrl: string): Promise<OperationResult<TextRecord>> {
    const text = content.trim();
    if (!text) {
      return fail("validation", "Text content is empty.");
    }

    return this.guard(`ingest text from ${sourceUrl}`, async () => {
      assertHttpUrl(sourceUrl, "source URL");
      const [embedding] = requireVectors(await this.extractors.text.embedTexts([text]), 1);
      const record = await this.featureStore.insertText({
        sourcePageUrl: sourceUrl,
        content: text,
        embedding,
      });
      this.logger.debug(`Saved text record ${record.id} from ${sourceUrl}`);
      return record;
    });
  }

  async ingestMedia(
    asset: MediaAssetDescriptor,
    sourceUrl: string,
    modality: MediaModality,
  ): Promise<OperationResult<MediaIngestionSummary>> {
    return this.guard(`ingest ${modality} ${asset.url}`, async () => {
      assertHttpUrl(asset.url, "asset URL");
      assertHttpUrl(sourceUrl, "source URL");

      const downloaded = await this.downloader.download(asset.url);
      this.logger.debug(`Downloaded ${downloaded.data.length} bytes from ${asset.url}`);

      if (modality === "image") {
        return this.indexImage(downloaded.data, toImageDescriptor(asset), sourceUrl);
      }
      return this.indexAudio(downloaded.data, { url: asset.url }, sourceUrl);
    });
  }

  /** Same as the image branch of `ingestMedia`, for bytes already on hand. */
  async ingestImageBytes(
    data: Buffer,
    asset: ImageAssetDescriptor,
    sourceUrl: string,
  ): Promise<OperationResult<MediaIngestionSummary>> {
    return this.guard(`ingest image ${asset.url}`, async () => {
      assertHttpUrl(asset.url, "asset URL");
      assertHttpUrl(sourceUrl, "source URL");
      return this.indexImage(data, asset, sourceUrl);
    });
  }

  async ingestAudioBytes(
    data: Buffer,
    asset: AudioAssetDescriptor,
    sourceUrl: string,
  ): Promise<OperationResult<MediaIngestionSummary>> {
    return this.guard(`ingest audio ${asset.url}`, async () => {
      assertHttpUrl(asset.url, "asset URL");
      assertHttpUrl(sourceUrl, "source URL");
      return this.indexAudio(data, asset, sourceUrl);
    });
  }

  private async indexImage(
    data: Buffer,
    asset: ImageAssetDescriptor,
    sourceUrl: string,
  ): Promise<MediaIngestionSummary> {
    const image = await decodeImage(data);
    const [embedding] = requireVectors(await this.extractors.image.embedImages([image]), 1);

    await this.featureStore.upsertImage({
      assetUrl: asset.url,
      sourcePageUrl: sourceUrl,
      altText: asset.altText,
      embedding,
    });
    this.logger.info(`Saved/updated image features for ${asset.url}`);

    return { modality: "image", assetUrl: asset.url, recordCount: 1 };
  }

  private async indexAudio(
    data: Buffer,
    asset: AudioAssetDescriptor,
    sourceUrl: string,
  ): Promise<MediaIngestionSummary> {
    const { sampleRate, chunkSeconds } = this.options.audio;
    const waveform = await decodeAudio(data, sampleRate, asset.url);
    const chunks = chunkWaveform(waveform, { sampleRate, chunkSeconds });

    const inputs: AudioChunkFeatureInput[] = [];
    for (const chunk of chunks) {
      this.logger.debug(
        `Embedding chunk ${chunk.startSeconds}s-${chunk.endSeconds}s of ${asset.url}`,
      );
      const [embedding] = requireVectors(
        await this.extractors.audio.embedAudio([chunk.samples]),
        1,
      );
      inputs.push({
        assetUrl: asset.url,
        sourcePageUrl: sourceUrl,
        beginStampSeconds: chunk.startSeconds,
        endStampSeconds: chunk.endSeconds,
        embedding,
      });
    }

    const records = await this.featureStore.upsertAudioChunks(inputs);
    this.logger.info(`Saved/updated ${records.length} audio chunk(s) for ${asset.url}`);

    return { modality: "audio", assetUrl: asset.url, recordCount: records.length };
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<OperationResult<T>> {
    try {
      return succeed(await run());
    } catch (error) {
      const operationError = toOperationError(error);
      this.logger.warn(`Failed to ${operation} (${operationError.kind}): ${operationError.message}`);
      return { ok: false, error: operationError };
    }
  }
}

function toImageDescriptor(asset: MediaAssetDescriptor): ImageAssetDescriptor {
  return { url: asset.url, altText: "altText" in asset ? asset.altText : "" };
}

function assertHttpUrl(value: string, label: string): void {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (error) {
    throw new ValidationError(`Invalid ${label}: ${value}`, { cause: error });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(`Invalid ${label}: ${value} is not an http(s) URL.`);
  }
}

function requireVectors(vectors: number[][], expected: number): number[][] {
  if (vectors.length !== expected) {
    throw new EmbeddingBackendError(
      `Feature extractor returned ${vectors.length} vector(s), expected ${expected}.`,
    );
  }
  return vectors;
}
