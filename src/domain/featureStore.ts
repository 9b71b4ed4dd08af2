import {
  AudioRecord,
  ImageRecord,
  Neighbor,
  RecordCounts,
  TextRecord,
} from "./types.js";

export interface TextFeatureInput {
  sourcePageUrl: string;
  content: string;
  embedding: number[];
}

export interface ImageFeatureInput {
  assetUrl: string;
  sourcePageUrl: string;
  altText: string;
  embedding: number[];
}

export interface AudioChunkFeatureInput {
  assetUrl: string;
  sourcePageUrl: string;
  beginStampSeconds: number;
  endStampSeconds: number;
  embedding: number[];
}

export interface EmbeddingDimensions {
  text: number;
  image: number;
  audio: number;
}

/**
 * Durable per-modality storage of feature records.
 *
 * Image rows are unique on `assetUrl` and audio rows on
 * `(assetUrl, beginStampSeconds)`; both upserts must be atomic so that
 * concurrent ingestion of the same asset converges on one row. Every write
 * rejects embeddings whose length differs from the configured dimension.
 */
export interface FeatureStore {
  insertText(input: TextFeatureInput): Promise<TextRecord>;
  upsertImage(input: ImageFeatureInput): Promise<ImageRecord>;
  /** Writes every chunk of one asset, or none of them. */
  upsertAudioChunks(inputs: AudioChunkFeatureInput[]): Promise<AudioRecord[]>;
  nearestTexts(query: number[], k: number): Promise<Array<Neighbor<TextRecord>>>;
  nearestImages(query: number[], k: number): Promise<Array<Neighbor<ImageRecord>>>;
  nearestAudio(query: number[], k: number): Promise<Array<Neighbor<AudioRecord>>>;
  searchTextContent(query: string, limit: number): Promise<TextRecord[]>;
  searchImageAltText(query: string, limit: number): Promise<ImageRecord[]>;
  countRecords(): Promise<RecordCounts>;
}
