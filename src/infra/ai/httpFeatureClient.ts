import { z } from "zod";
import { AppConfig } from "../../config/env.js";
import { EmbeddingBackendError } from "../../domain/errors.js";
import { FetchLike } from "../http/fetcher.js";
import { DecodedImage } from "../media/imageDecoder.js";
import { AudioEmbedder, FeatureExtractors, ImageEmbedder, TextEmbedder } from "./types.js";

interface HttpFeatureClientOptions {
  baseUrl: string;
  timeoutMs: number;
  textModel: string;
  imageModel: string;
  audioModel: string;
  audioSampleRate: number;
  fetchImpl?: FetchLike;
}

const embeddingsResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/**
 * Client of the model-serving process. One instance covers all three
 * modalities; each method posts a batch and expects one vector per input.
 */
export class HttpFeatureClient implements TextEmbedder, ImageEmbedder, AudioEmbedder {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpFeatureClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return this.post("/embed/text", texts.length, {
      model: this.options.textModel,
      inputs: texts,
    });
  }

  async embedImages(images: DecodedImage[]): Promise<number[][]> {
    return this.post("/embed/image", images.length, {
      model: this.options.imageModel,
      images: images.map((image) => image.png.toString("base64")),
    });
  }

  async embedTextsAsImageSpace(texts: string[]): Promise<number[][]> {
    return this.post("/embed/image-text", texts.length, {
      model: this.options.imageModel,
      inputs: texts,
    });
  }

  async embedAudio(waveforms: Float32Array[]): Promise<number[][]> {
    return this.post("/embed/audio", waveforms.length, {
      model: this.options.audioModel,
      sampling_rate: this.options.audioSampleRate,
      waveforms: waveforms.map((waveform) => Array.from(waveform)),
    });
  }

  async embedTextsAsAudioSpace(texts: string[]): Promise<number[][]> {
    return this.post("/embed/audio-text", texts.length, {
      model: this.options.audioModel,
      inputs: texts,
    });
  }

  private async post(
    endpoint: string,
    expectedCount: number,
    payload: Record<string, unknown>,
  ): Promise<number[][]> {
    if (expectedCount === 0) {
      return [];
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, this.options.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}${endpoint}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      throw new EmbeddingBackendError(
        controller.signal.aborted
          ? `Embedding request ${endpoint} timed out after ${this.options.timeoutMs} ms.`
          : `Embedding request ${endpoint} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new EmbeddingBackendError(
        `Embedding request ${endpoint} failed (${response.status}): ${await response.text()}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new EmbeddingBackendError(
        `Embedding service returned malformed JSON for ${endpoint}.`,
        { cause: error },
      );
    }

    const parsed = embeddingsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingBackendError(
        `Embedding service returned an invalid payload for ${endpoint}.`,
        { cause: parsed.error },
      );
    }

    if (parsed.data.embeddings.length !== expectedCount) {
      throw new EmbeddingBackendError(
        `Embedding count mismatch for ${endpoint}: expected ${expectedCount}, got ${parsed.data.embeddings.length}.`,
      );
    }
    return parsed.data.embeddings;
  }
}

export function createFeatureExtractors(config: AppConfig): FeatureExtractors {
  const client = new HttpFeatureClient({
    baseUrl: config.embeddingServiceUrl,
    timeoutMs: config.embeddingTimeoutMs,
    textModel: config.models.text.name,
    imageModel: config.models.image.name,
    audioModel: config.models.audio.name,
    audioSampleRate: config.models.audio.sampleRate,
  });

  return { text: client, image: client, audio: client };
}
