import {
  AudioChunkFeatureInput,
  EmbeddingDimensions,
  FeatureStore,
  ImageFeatureInput,
  TextFeatureInput,
} from "../../domain/featureStore.js";
import {
  AudioRecord,
  ImageRecord,
  Neighbor,
  RecordCounts,
  TextRecord,
} from "../../domain/types.js";
import { matchesAllTokens } from "../../utils/text.js";
import { assertEmbeddingDimension, l2Distance } from "../../utils/vector.js";

/**
 * Process-local store. Map updates happen synchronously inside each call,
 * which makes every upsert atomic with respect to other callers on the same
 * event loop.
 */
export class InMemoryFeatureStore implements FeatureStore {
  private readonly texts: TextRecord[] = [];

  private readonly imagesByAssetUrl = new Map<string, ImageRecord>();

  private readonly audioByChunkKey = new Map<string, AudioRecord>();

  private nextId = 1;

  constructor(
    private readonly dimensions: EmbeddingDimensions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async insertText(input: TextFeatureInput): Promise<TextRecord> {
    assertEmbeddingDimension("text", input.embedding, this.dimensions.text);

    const timestamp = this.now().toISOString();
    const record: TextRecord = {
      id: this.allocateId(),
      assetUrl: null,
      sourcePageUrl: input.sourcePageUrl,
      content: input.content,
      embedding: [...input.embedding],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.texts.push(record);
    return { ...record };
  }

  async upsertImage(input: ImageFeatureInput): Promise<ImageRecord> {
    assertEmbeddingDimension("image", input.embedding, this.dimensions.image);

    const timestamp = this.now().toISOString();
    const existing = this.imagesByAssetUrl.get(input.assetUrl);
    const record: ImageRecord = {
      id: existing?.id ?? this.allocateId(),
      assetUrl: input.assetUrl,
      sourcePageUrl: input.sourcePageUrl,
      altText: input.altText,
      embedding: [...input.embedding],
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    this.imagesByAssetUrl.set(input.assetUrl, record);
    return { ...record };
  }

  async upsertAudioChunks(inputs: AudioChunkFeatureInput[]): Promise<AudioRecord[]> {
    for (const input of inputs) {
      assertEmbeddingDimension("audio", input.embedding, this.dimensions.audio);
    }

    const timestamp = this.now().toISOString();
    return inputs.map((input) => {
      const key = audioChunkKey(input.assetUrl, input.beginStampSeconds);
      const existing = this.audioByChunkKey.get(key);
      const record: AudioRecord = {
        id: existing?.id ?? this.allocateId(),
        assetUrl: input.assetUrl,
        sourcePageUrl: input.sourcePageUrl,
        beginStampSeconds: input.beginStampSeconds,
        endStampSeconds: input.endStampSeconds,
        embedding: [...input.embedding],
        createdAt: existing?.createdAt ?? timestamp,
        updatedAt: timestamp,
      };
      this.audioByChunkKey.set(key, record);
      return { ...record };
    });
  }

  async nearestTexts(query: number[], k: number): Promise<Array<Neighbor<TextRecord>>> {
    assertEmbeddingDimension("text", query, this.dimensions.text);
    return rankByDistance(this.texts, query, k);
  }

  async nearestImages(query: number[], k: number): Promise<Array<Neighbor<ImageRecord>>> {
    assertEmbeddingDimension("image", query, this.dimensions.image);
    return rankByDistance([...this.imagesByAssetUrl.values()], query, k);
  }

  async nearestAudio(query: number[], k: number): Promise<Array<Neighbor<AudioRecord>>> {
    assertEmbeddingDimension("audio", query, this.dimensions.audio);
    return rankByDistance([...this.audioByChunkKey.values()], query, k);
  }

  async searchTextContent(query: string, limit: number): Promise<TextRecord[]> {
    return this.texts
      .filter((record) => matchesAllTokens(query, record.content))
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  async searchImageAltText(query: string, limit: number): Promise<ImageRecord[]> {
    return [...this.imagesByAssetUrl.values()]
      .filter((record) => matchesAllTokens(query, record.altText))
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  async countRecords(): Promise<RecordCounts> {
    return {
      text: this.texts.length,
      image: this.imagesByAssetUrl.size,
      audio: this.audioByChunkKey.size,
    };
  }

  private allocateId(): string {
    const id = String(this.nextId);
    this.nextId += 1;
    return id;
  }
}

function audioChunkKey(assetUrl: string, beginStampSeconds: number): string {
  return `${assetUrl}#${beginStampSeconds}`;
}

/** Stable sort keeps insertion order among equal distances. */
function rankByDistance<TRecord extends { embedding: number[] }>(
  records: TRecord[],
  query: number[],
  k: number,
): Array<Neighbor<TRecord>> {
  if (k <= 0) {
    return [];
  }
  return records
    .map((record) => ({ record: { ...record }, distance: l2Distance(record.embedding, query) }))
    .sort((a, b) => a.distance - b.distance)
    .slice(0, k);
}
