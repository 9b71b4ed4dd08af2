import {
  EmbeddingBackendError,
  fail,
  OperationResult,
  succeed,
  toOperationError,
} from "../domain/errors.js";
import { EmbeddingDimensions, FeatureStore } from "../domain/featureStore.js";
import {
  AudioRecord,
  AudioResultRow,
  ImageRecord,
  ImageResultRow,
  MediaModality,
  Modality,
  RecordCounts,
  SearchResults,
  TextRecord,
  TextResultRow,
} from "../domain/types.js";
import { FeatureExtractors } from "../infra/ai/types.js";
import { decodeAudio, hasAudioExtension } from "../infra/media/audioDecoder.js";
import { decodeImage, hasImageExtension } from "../infra/media/imageDecoder.js";
import { AppLogger, createLogger } from "../utils/logger.js";

export const DEFAULT_RESULT_LIMIT = 10;
export const MAX_RESULT_LIMIT = 50;
export const MAX_QUERY_LENGTH = 200;

export type KeywordModality = Exclude<Modality, "audio">;

export interface TextQueryInput {
  query: string;
  modality: Modality;
  limit?: number;
}

export interface FileQueryInput {
  data: Buffer;
  filename: string;
  modality: MediaModality;
  limit?: number;
}

export interface KeywordQueryInput {
  query: string;
  modality: KeywordModality;
  limit?: number;
}

export interface RetrievalServiceOptions {
  dimensions: EmbeddingDimensions;
  audioSampleRate: number;
  maxUploadBytes: number;
}

type Validated<T> = { ok: true; value: T } | { ok: false; result: OperationResult<never> };

/** Read-only nearest-neighbor search over the feature store. */
export class RetrievalService {
  private readonly logger: AppLogger;

  constructor(
    private readonly featureStore: FeatureStore,
    private readonly extractors: FeatureExtractors,
    private readonly options: RetrievalServiceOptions,
    logger?: AppLogger,
  ) {
    this.logger = logger ?? createLogger("retrieval");
  }

  async searchByText(input: TextQueryInput): Promise<OperationResult<SearchResults>> {
    const query = validateQuery(input.query);
    if (!query.ok) return query.result;
    const limit = validateLimit(input.limit);
    if (!limit.ok) return limit.result;

    return this.guard(`text search (${input.modality})`, async () => {
      const vector = await this.embedQueryText(query.value, input.modality);
      return this.nearest(input.modality, vector, limit.value);
    });
  }

  async searchByFile(input: FileQueryInput): Promise<OperationResult<SearchResults>> {
    const limit = validateLimit(input.limit);
    if (!limit.ok) return limit.result;
    if (input.data.length === 0) {
      return fail("validation", "Uploaded file is empty.");
    }
    if (input.data.length > this.options.maxUploadBytes) {
      return fail(
        "validation",
        `Uploaded file exceeds the ${this.options.maxUploadBytes} byte limit.`,
      );
    }

    const extensionMatches =
      input.modality === "image"
        ? hasImageExtension(input.filename)
        : hasAudioExtension(input.filename);
    if (!extensionMatches) {
      return fail("validation", `Unsupported file type for ${input.modality} search: ${input.filename}`);
    }

    return this.guard(`file search (${input.modality})`, async () => {
      let vectors: number[][];
      if (input.modality === "image") {
        const image = await decodeImage(input.data);
        vectors = await this.extractors.image.embedImages([image]);
      } else {
        const waveform = await decodeAudio(
          input.data,
          this.options.audioSampleRate,
          input.filename,
        );
        vectors = await this.extractors.audio.embedAudio([waveform]);
      }
      const vector = this.requireQueryVector(vectors, input.modality);
      return this.nearest(input.modality, vector, limit.value);
    });
  }

  /** Lexical lookup: every query word must appear in the content or alt text. */
  async searchByKeyword(input: KeywordQueryInput): Promise<OperationResult<SearchResults>> {
    const query = validateQuery(input.query);
    if (!query.ok) return query.result;
    const limit = validateLimit(input.limit);
    if (!limit.ok) return limit.result;

    return this.guard(`keyword search (${input.modality})`, async (): Promise<SearchResults> => {
      if (input.modality === "text") {
        const records = await this.featureStore.searchTextContent(query.value, limit.value);
        return { modality: "text", results: records.map(toTextRow) };
      }
      const records = await this.featureStore.searchImageAltText(query.value, limit.value);
      return { modality: "image", results: records.map(toImageRow) };
    });
  }

  async countRecords(): Promise<OperationResult<RecordCounts>> {
    return this.guard("count records", () => this.featureStore.countRecords());
  }

  private async embedQueryText(query: string, modality: Modality): Promise<number[]> {
    switch (modality) {
      case "text":
        return this.requireQueryVector(await this.extractors.text.embedTexts([query]), modality);
      case "image":
        return this.requireQueryVector(
          await this.extractors.image.embedTextsAsImageSpace([query]),
          modality,
        );
      case "audio":
        return this.requireQueryVector(
          await this.extractors.audio.embedTextsAsAudioSpace([query]),
          modality,
        );
    }
  }

  /**
   * A query vector of the wrong size means the model and the store disagree;
   * that is a backend fault, not something the caller can fix.
   */
  private requireQueryVector(vectors: number[][], modality: Modality): number[] {
    const [vector] = vectors;
    const expected = this.options.dimensions[modality];
    if (vectors.length !== 1 || !vector) {
      throw new EmbeddingBackendError(
        `Feature extractor returned ${vectors.length} query vector(s), expected 1.`,
      );
    }
    if (vector.length !== expected) {
      throw new EmbeddingBackendError(
        `Query embedding for ${modality} has ${vector.length} dimensions, expected ${expected}.`,
      );
    }
    return vector;
  }

  private async nearest(modality: Modality, vector: number[], limit: number): Promise<SearchResults> {
    switch (modality) {
      case "text": {
        const neighbors = await this.featureStore.nearestTexts(vector, limit);
        return { modality, results: neighbors.map((neighbor) => toTextRow(neighbor.record)) };
      }
      case "image": {
        const neighbors = await this.featureStore.nearestImages(vector, limit);
        return { modality, results: neighbors.map((neighbor) => toImageRow(neighbor.record)) };
      }
      case "audio": {
        const neighbors = await this.featureStore.nearestAudio(vector, limit);
        return { modality, results: neighbors.map((neighbor) => toAudioRow(neighbor.record)) };
      }
    }
  }

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<OperationResult<T>> {
    try {
      return succeed(await run());
    } catch (error) {
      const operationError = toOperationError(error);
      this.logger.warn(`${operation} failed (${operationError.kind}): ${operationError.message}`);
      return { ok: false, error: operationError };
    }
  }
}

function validateQuery(raw: string): Validated<string> {
  const query = raw.trim();
  if (!query) {
    return { ok: false, result: fail("validation", "Query must not be empty.") };
  }
  if (query.length > MAX_QUERY_LENGTH) {
    return {
      ok: false,
      result: fail("validation", `Query must be at most ${MAX_QUERY_LENGTH} characters.`),
    };
  }
  return { ok: true, value: query };
}

function validateLimit(raw: number | undefined): Validated<number> {
  const limit = raw ?? DEFAULT_RESULT_LIMIT;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_RESULT_LIMIT) {
    return {
      ok: false,
      result: fail("validation", `Limit must be an integer between 1 and ${MAX_RESULT_LIMIT}.`),
    };
  }
  return { ok: true, value: limit };
}

function toTextRow(record: TextRecord): TextResultRow {
  return { source_page_url: record.sourcePageUrl, content: record.content };
}

function toImageRow(record: ImageRecord): ImageResultRow {
  return {
    source_page_url: record.sourcePageUrl,
    asset_url: record.assetUrl,
    alt_text: record.altText,
  };
}

function toAudioRow(record: AudioRecord): AudioResultRow {
  return {
    source_page_url: record.sourcePageUrl,
    asset_url: record.assetUrl,
    begin_stamp_seconds: record.beginStampSeconds,
    end_stamp_seconds: record.endStampSeconds,
  };
}
