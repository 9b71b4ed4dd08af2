import { DecodedImage } from "../media/imageDecoder.js";

export interface TextEmbedder {
  embedTexts(texts: string[]): Promise<number[][]>;
}

export interface ImageEmbedder {
  embedImages(images: DecodedImage[]): Promise<number[][]>;
  /** Encodes text into the joint image space for text-to-image queries. */
  embedTextsAsImageSpace(texts: string[]): Promise<number[][]>;
}

export interface AudioEmbedder {
  /** Waveforms must already be mono at the audio model's sample rate. */
  embedAudio(waveforms: Float32Array[]): Promise<number[][]>;
  /** Encodes text into the joint audio space for text-to-audio queries. */
  embedTextsAsAudioSpace(texts: string[]): Promise<number[][]>;
}

/** Built once at process start and passed to every consumer. */
export interface FeatureExtractors {
  text: TextEmbedder;
  image: ImageEmbedder;
  audio: AudioEmbedder;
}
