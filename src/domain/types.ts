export type Modality = "text" | "image" | "audio";

export type MediaModality = Exclude<Modality, "text">;

export const MODALITIES: readonly Modality[] = ["text", "image", "audio"];

interface BaseFeatureRecord {
  id: string;
  assetUrl: string | null;
  sourcePageUrl: string;
  createdAt: string;
  updatedAt: string;
  embedding: number[];
}

export interface TextRecord extends BaseFeatureRecord {
  assetUrl: null;
  content: string;
}

export interface ImageRecord extends BaseFeatureRecord {
  assetUrl: string;
  altText: string;
}

export interface AudioRecord extends BaseFeatureRecord {
  assetUrl: string;
  beginStampSeconds: number;
  endStampSeconds: number;
}

export interface ImageAssetDescriptor {
  url: string;
  altText: string;
}

export interface AudioAssetDescriptor {
  url: string;
}

export type MediaAssetDescriptor = ImageAssetDescriptor | AudioAssetDescriptor;

export interface Neighbor<TRecord> {
  record: TRecord;
  distance: number;
}

export interface RecordCounts {
  text: number;
  image: number;
  audio: number;
}

export interface TextResultRow {
  source_page_url: string;
  content: string;
}

export interface ImageResultRow {
  source_page_url: string;
  asset_url: string;
  alt_text: string;
}

export interface AudioResultRow {
  source_page_url: string;
  asset_url: string;
  begin_stamp_seconds: number;
  end_stamp_seconds: number;
}

export type SearchResults =
  | { modality: "text"; results: TextResultRow[] }
  | { modality: "image"; results: ImageResultRow[] }
  | { modality: "audio"; results: AudioResultRow[] };
