import { Pool } from "pg";
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
import { assertEmbeddingDimension, toVectorLiteral } from "../../utils/vector.js";

interface PgBaseRow {
  id: string;
  source_page_url: string;
  created_at: Date;
  updated_at: Date;
  embedding: string;
}

interface PgTextRow extends PgBaseRow {
  content: string;
}

interface PgImageRow extends PgBaseRow {
  asset_url: string;
  alt_text: string;
}

interface PgAudioRow extends PgBaseRow {
  asset_url: string;
  begin_stamp_seconds: number;
  end_stamp_seconds: number;
}

type WithDistance<TRow> = TRow & { distance: number };

const FEATURE_TABLES = ["text_features", "image_features", "audio_features"] as const;

const TEXT_COLUMNS = "id, source_page_url, content, embedding::text AS embedding, created_at, updated_at";
const IMAGE_COLUMNS =
  "id, asset_url, source_page_url, alt_text, embedding::text AS embedding, created_at, updated_at";
const AUDIO_COLUMNS =
  "id, asset_url, source_page_url, begin_stamp_seconds, end_stamp_seconds, embedding::text AS embedding, created_at, updated_at";

/**
 * DDL run by `initialize()`. Embedding columns carry no approximate index:
 * `ORDER BY embedding <-> $1` must rank every stored row.
 */
export function featureSchemaStatements(dimensions: EmbeddingDimensions): string[] {
  return [
    `CREATE EXTENSION IF NOT EXISTS vector`,
    `
      CREATE TABLE IF NOT EXISTS text_features (
        id BIGSERIAL PRIMARY KEY,
        asset_url TEXT NULL,
        source_page_url TEXT NOT NULL,
        content TEXT NOT NULL,
        embedding VECTOR(${dimensions.text}) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `,
    `
      CREATE TABLE IF NOT EXISTS image_features (
        id BIGSERIAL PRIMARY KEY,
        asset_url TEXT NOT NULL,
        source_page_url TEXT NOT NULL,
        alt_text TEXT NOT NULL DEFAULT '',
        embedding VECTOR(${dimensions.image}) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT unique_image_asset_url UNIQUE (asset_url)
      )
    `,
    `
      CREATE TABLE IF NOT EXISTS audio_features (
        id BIGSERIAL PRIMARY KEY,
        asset_url TEXT NOT NULL,
        source_page_url TEXT NOT NULL,
        begin_stamp_seconds INTEGER NOT NULL CHECK (begin_stamp_seconds >= 0),
        end_stamp_seconds INTEGER NOT NULL CHECK (end_stamp_seconds >= 0),
        embedding VECTOR(${dimensions.audio}) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT unique_audio_chunk UNIQUE (asset_url, begin_stamp_seconds)
      )
    `,
    `CREATE INDEX IF NOT EXISTS idx_text_features_source ON text_features(source_page_url)`,
    // Older schemas created ivfflat indexes here.
    ...FEATURE_TABLES.map((table) => `DROP INDEX IF EXISTS idx_${table}_embedding`),
  ];
}

export class PgVectorFeatureStore implements FeatureStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly dimensions: EmbeddingDimensions,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    for (const statement of featureSchemaStatements(this.dimensions)) {
      await this.pool.query(statement);
    }

    this.initialized = true;
  }

  async insertText(input: TextFeatureInput): Promise<TextRecord> {
    assertEmbeddingDimension("text", input.embedding, this.dimensions.text);
    await this.initialize();

    const result = await this.pool.query<PgTextRow>(
      `
        INSERT INTO text_features (source_page_url, content, embedding)
        VALUES ($1, $2, $3::vector)
        RETURNING ${TEXT_COLUMNS}
      `,
      [input.sourcePageUrl, input.content, toVectorLiteral(input.embedding)],
    );
    return toTextRecord(result.rows[0]);
  }

  async upsertImage(input: ImageFeatureInput): Promise<ImageRecord> {
    assertEmbeddingDimension("image", input.embedding, this.dimensions.image);
    await this.initialize();

    const result = await this.pool.query<PgImageRow>(
      `
        INSERT INTO image_features (asset_url, source_page_url, alt_text, embedding)
        VALUES ($1, $2, $3, $4::vector)
        ON CONFLICT (asset_url)
        DO UPDATE SET
          source_page_url = EXCLUDED.source_page_url,
          alt_text = EXCLUDED.alt_text,
          embedding = EXCLUDED.embedding,
          updated_at = NOW()
        RETURNING ${IMAGE_COLUMNS}
      `,
      [input.assetUrl, input.sourcePageUrl, input.altText, toVectorLiteral(input.embedding)],
    );
    return toImageRecord(result.rows[0]);
  }

  async upsertAudioChunks(inputs: AudioChunkFeatureInput[]): Promise<AudioRecord[]> {
    for (const input of inputs) {
      assertEmbeddingDimension("audio", input.embedding, this.dimensions.audio);
    }
    if (inputs.length === 0) {
      return [];
    }
    await this.initialize();

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const records: AudioRecord[] = [];
      for (const input of inputs) {
        const result = await client.query<PgAudioRow>(
          `
            INSERT INTO audio_features
              (asset_url, source_page_url, begin_stamp_seconds, end_stamp_seconds, embedding)
            VALUES ($1, $2, $3, $4, $5::vector)
            ON CONFLICT (asset_url, begin_stamp_seconds)
            DO UPDATE SET
              source_page_url = EXCLUDED.source_page_url,
              end_stamp_seconds = EXCLUDED.end_stamp_seconds,
              embedding = EXCLUDED.embedding,
              updated_at = NOW()
            RETURNING ${AUDIO_COLUMNS}
          `,
          [
            input.assetUrl,
            input.sourcePageUrl,
            input.beginStampSeconds,
            input.endStampSeconds,
            toVectorLiteral(input.embedding),
          ],
        );
        records.push(toAudioRecord(result.rows[0]));
      }

      await client.query("COMMIT");
      return records;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async nearestTexts(query: number[], k: number): Promise<Array<Neighbor<TextRecord>>> {
    assertEmbeddingDimension("text", query, this.dimensions.text);
    const rows = await this.nearest<PgTextRow>("text_features", TEXT_COLUMNS, query, k);
    return rows.map((row) => ({ record: toTextRecord(row), distance: Number(row.distance) }));
  }

  async nearestImages(query: number[], k: number): Promise<Array<Neighbor<ImageRecord>>> {
    assertEmbeddingDimension("image", query, this.dimensions.image);
    const rows = await this.nearest<PgImageRow>("image_features", IMAGE_COLUMNS, query, k);
    return rows.map((row) => ({ record: toImageRecord(row), distance: Number(row.distance) }));
  }

  async nearestAudio(query: number[], k: number): Promise<Array<Neighbor<AudioRecord>>> {
    assertEmbeddingDimension("audio", query, this.dimensions.audio);
    const rows = await this.nearest<PgAudioRow>("audio_features", AUDIO_COLUMNS, query, k);
    return rows.map((row) => ({ record: toAudioRecord(row), distance: Number(row.distance) }));
  }

  async searchTextContent(query: string, limit: number): Promise<TextRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgTextRow>(
      `
        SELECT ${TEXT_COLUMNS}
        FROM text_features
        WHERE to_tsvector('simple', content) @@ plainto_tsquery('simple', $1)
        ORDER BY ts_rank(to_tsvector('simple', content), plainto_tsquery('simple', $1)) DESC, id ASC
        LIMIT $2
      `,
      [query, limit],
    );
    return result.rows.map(toTextRecord);
  }

  async searchImageAltText(query: string, limit: number): Promise<ImageRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgImageRow>(
      `
        SELECT ${IMAGE_COLUMNS}
        FROM image_features
        WHERE to_tsvector('simple', alt_text) @@ plainto_tsquery('simple', $1)
        ORDER BY ts_rank(to_tsvector('simple', alt_text), plainto_tsquery('simple', $1)) DESC, id ASC
        LIMIT $2
      `,
      [query, limit],
    );
    return result.rows.map(toImageRecord);
  }

  async countRecords(): Promise<RecordCounts> {
    await this.initialize();
    const result = await this.pool.query<{ text: string; image: string; audio: string }>(`
      SELECT
        (SELECT COUNT(*) FROM text_features)::text AS text,
        (SELECT COUNT(*) FROM image_features)::text AS image,
        (SELECT COUNT(*) FROM audio_features)::text AS audio
    `);
    const row = result.rows[0];
    return {
      text: Number(row?.text ?? 0),
      image: Number(row?.image ?? 0),
      audio: Number(row?.audio ?? 0),
    };
  }

  private async nearest<TRow extends PgBaseRow>(
    table: string,
    columns: string,
    query: number[],
    k: number,
  ): Promise<Array<WithDistance<TRow>>> {
    if (k <= 0) {
      return [];
    }
    await this.initialize();
    const result = await this.pool.query<WithDistance<TRow>>(
      `
        SELECT ${columns}, (embedding <-> $1::vector) AS distance
        FROM ${table}
        ORDER BY embedding <-> $1::vector
        LIMIT $2
      `,
      [toVectorLiteral(query), k],
    );
    return result.rows;
  }
}

function parseVector(literal: string): number[] {
  const inner = literal.trim().replace(/^\[/, "").replace(/\]$/, "");
  return inner ? inner.split(",").map(Number) : [];
}

function baseFields(row: PgBaseRow) {
  return {
    id: String(row.id),
    sourcePageUrl: row.source_page_url,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    embedding: parseVector(row.embedding),
  };
}

function toTextRecord(row: PgTextRow): TextRecord {
  return { ...baseFields(row), assetUrl: null, content: row.content };
}

function toImageRecord(row: PgImageRow): ImageRecord {
  return { ...baseFields(row), assetUrl: row.asset_url, altText: row.alt_text };
}

function toAudioRecord(row: PgAudioRow): AudioRecord {
  return {
    ...baseFields(row),
    assetUrl: row.asset_url,
    beginStampSeconds: row.begin_stamp_seconds,
    endStampSeconds: row.end_stamp_seconds,
  };
}
