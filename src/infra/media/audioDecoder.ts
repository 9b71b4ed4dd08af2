import path from "node:path";
import { MPEGDecoder } from "mpg123-decoder";
import { WaveFile } from "wavefile";
import { MalformedContentError } from "../../domain/errors.js";

export const AUDIO_EXTENSIONS: readonly string[] = [".wav", ".mp3"];

type AudioContainer = "wav" | "mp3";

export function hasAudioExtension(fileNameOrPath: string): boolean {
  return AUDIO_EXTENSIONS.includes(path.extname(fileNameOrPath).toLowerCase());
}

/**
 * Decodes a WAV or MP3 payload into a mono waveform resampled to
 * `targetSampleRate`, with samples in [-1, 1].
 */
export async function decodeAudio(
  data: Buffer,
  targetSampleRate: number,
  fileNameHint?: string,
): Promise<Float32Array> {
  const container = detectContainer(data, fileNameHint);
  if (!container) {
    throw new MalformedContentError("Could not load audio file: unrecognized format.");
  }

  let waveform: Float32Array;
  try {
    waveform =
      container === "wav"
        ? decodeWav(data, targetSampleRate)
        : await decodeMp3(data, targetSampleRate);
  } catch (error) {
    throw new MalformedContentError(
      `Could not load audio file: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  if (waveform.length === 0) {
    throw new MalformedContentError("Could not load audio file: no samples decoded.");
  }
  return waveform;
}

function detectContainer(data: Buffer, fileNameHint?: string): AudioContainer | null {
  if (
    data.length >= 12 &&
    data.toString("ascii", 0, 4) === "RIFF" &&
    data.toString("ascii", 8, 12) === "WAVE"
  ) {
    return "wav";
  }
  if (data.length >= 3 && data.toString("ascii", 0, 3) === "ID3") {
    return "mp3";
  }
  if (data.length >= 2 && data[0] === 0xff && (data[1] & 0xe0) === 0xe0) {
    return "mp3";
  }
  if (fileNameHint && path.extname(fileNameHint).toLowerCase() === ".mp3" && data.length > 0) {
    return "mp3";
  }
  return null;
}

function decodeWav(data: Buffer, targetSampleRate: number): Float32Array {
  const wav = new WaveFile(new Uint8Array(data));
  wav.toBitDepth("32f");
  if (!("sampleRate" in wav.fmt) || wav.fmt.sampleRate !== targetSampleRate) {
    wav.toSampleRate(targetSampleRate);
  }
  return downmix(toChannels(wav.getSamples(false, Float64Array)));
}

async function decodeMp3(data: Buffer, targetSampleRate: number): Promise<Float32Array> {
  const decoder = new MPEGDecoder();
  await decoder.ready;

  try {
    const decoded = decoder.decode(new Uint8Array(data));
    if (decoded.samplesDecoded === 0) {
      return new Float32Array(0);
    }
    const mono = downmix(decoded.channelData);
    return resample(mono, decoded.sampleRate, targetSampleRate);
  } finally {
    decoder.free();
  }
}

function resample(
  samples: Float32Array,
  sourceRate: number,
  targetRate: number,
): Float32Array {
  if (sourceRate === targetRate) {
    return samples;
  }
  const wav = new WaveFile();
  wav.fromScratch(1, sourceRate, "32f", samples);
  wav.toSampleRate(targetRate);
  return downmix(toChannels(wav.getSamples(false, Float64Array)));
}

function toChannels(samples: Float64Array | Float64Array[]): Float32Array[] {
  if (Array.isArray(samples)) {
    return samples.map((channel) => Float32Array.from(channel));
  }
  return [Float32Array.from(samples)];
}

function downmix(channels: Float32Array[]): Float32Array {
  if (channels.length === 0) {
    return new Float32Array(0);
  }
  if (channels.length === 1) {
    return channels[0];
  }

  const length = Math.min(...channels.map((channel) => channel.length));
  const mono = new Float32Array(length);
  for (let index = 0; index < length; index += 1) {
    let sum = 0;
    for (const channel of channels) {
      sum += channel[index];
    }
    mono[index] = sum / channels.length;
  }
  return mono;
}
