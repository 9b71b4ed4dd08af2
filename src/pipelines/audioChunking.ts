import { ValidationError } from "../domain/errors.js";

export interface AudioChunk {
  samples: Float32Array;
  startSeconds: number;
  endSeconds: number;
}

export interface AudioChunkingOptions {
  sampleRate: number;
  chunkSeconds: number;
}

export interface AudioChunkSequence extends Iterable<AudioChunk> {
  readonly chunkCount: number;
  readonly samplesPerChunk: number;
}

/**
 * Splits a waveform into contiguous windows of exactly
 * `chunkSeconds * sampleRate` samples, zero-padding the last one.
 *
 * The sequence is lazy and can be iterated any number of times; each pass
 * slices the waveform afresh.
 */
export function chunkWaveform(
  waveform: Float32Array,
  options: AudioChunkingOptions,
): AudioChunkSequence {
  const { sampleRate, chunkSeconds } = options;
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new ValidationError(`sampleRate must be a positive integer, got ${sampleRate}.`);
  }
  if (!Number.isInteger(chunkSeconds) || chunkSeconds <= 0) {
    throw new ValidationError(`chunkSeconds must be a positive integer, got ${chunkSeconds}.`);
  }

  const samplesPerChunk = chunkSeconds * sampleRate;

  return {
    chunkCount: Math.ceil(waveform.length / samplesPerChunk),
    samplesPerChunk,
    *[Symbol.iterator]() {
      for (let offset = 0; offset < waveform.length; offset += samplesPerChunk) {
        const samples = new Float32Array(samplesPerChunk);
        samples.set(waveform.subarray(offset, offset + samplesPerChunk));

        const startSeconds = Math.floor(offset / sampleRate);
        yield { samples, startSeconds, endSeconds: startSeconds + chunkSeconds };
      }
    },
  };
}
