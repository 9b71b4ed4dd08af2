import { describe, expect, it } from "vitest";
import { EmbeddingDimensions } from "../src/domain/featureStore.js";
import { InMemoryFeatureStore } from "../src/infra/store/inMemoryFeatureStore.js";
import { RetrievalService } from "../src/services/retrievalService.js";
import { FakeFeatureExtractors, TEST_DIMENSIONS } from "./helpers/fakes.js";
import { pngBytes, wavBytes } from "./helpers/media.js";

const QUERY_VECTORS: Record<string, number[]> = {
  origin: [0, 0, 0],
  cat: [4, 2, 1],
};

async function setup(
  options: { maxUploadBytes?: number; extractorDimensions?: EmbeddingDimensions } = {},
) {
  const store = new InMemoryFeatureStore(TEST_DIMENSIONS);
  const extractors = new FakeFeatureExtractors(QUERY_VECTORS, options.extractorDimensions);
  const retrieval = new RetrievalService(store, extractors.asExtractors(), {
    dimensions: TEST_DIMENSIONS,
    audioSampleRate: 8000,
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
  });

  for (const [content, x] of [
    ["far away", 10],
    ["right here", 1],
    ["halfway there", 5],
  ] as const) {
    await store.insertText({ sourcePageUrl: "https://site.test/t", content, embedding: [x, 0, 0] });
  }
  await store.upsertImage({
    assetUrl: "https://site.test/cat.png",
    sourcePageUrl: "https://site.test/pets",
    altText: "A sleepy cat",
    embedding: [4, 2, 1],
  });
  await store.upsertImage({
    assetUrl: "https://site.test/boat.png",
    sourcePageUrl: "https://site.test/sea",
    altText: "A boat",
    embedding: [40, 20, 1],
  });
  await store.upsertAudioChunks([
    {
      assetUrl: "https://site.test/song.mp3",
      sourcePageUrl: "https://site.test/music",
      beginStampSeconds: 20,
      endStampSeconds: 40,
      embedding: [3, 0, 0],
    },
  ]);

  return { store, extractors, retrieval };
}

describe("RetrievalService", () => {
  it("returns the nearest text snippets in ascending distance", async () => {
    const { retrieval } = await setup();

    const result = await retrieval.searchByText({ query: "origin", modality: "text", limit: 2 });

    expect(result).toEqual({
      ok: true,
      value: {
        modality: "text",
        results: [
          { source_page_url: "https://site.test/t", content: "right here" },
          { source_page_url: "https://site.test/t", content: "halfway there" },
        ],
      },
    });
  });

  it("searches images through the image text space", async () => {
    const { retrieval } = await setup();

    const result = await retrieval.searchByText({ query: "cat", modality: "image", limit: 1 });

    expect(result.ok && result.value).toEqual({
      modality: "image",
      results: [
        {
          source_page_url: "https://site.test/pets",
          asset_url: "https://site.test/cat.png",
          alt_text: "A sleepy cat",
        },
      ],
    });
  });

  it("projects audio hits with their time window", async () => {
    const { retrieval } = await setup();

    const result = await retrieval.searchByText({ query: "origin", modality: "audio" });

    expect(result.ok && result.value).toEqual({
      modality: "audio",
      results: [
        {
          source_page_url: "https://site.test/music",
          asset_url: "https://site.test/song.mp3",
          begin_stamp_seconds: 20,
          end_stamp_seconds: 40,
        },
      ],
    });
  });

  it("validates query text and limit", async () => {
    const { retrieval } = await setup();

    const results = await Promise.all([
      retrieval.searchByText({ query: "   ", modality: "text" }),
      retrieval.searchByText({ query: "x".repeat(201), modality: "text" }),
      retrieval.searchByText({ query: "origin", modality: "text", limit: 0 }),
      retrieval.searchByText({ query: "origin", modality: "text", limit: 51 }),
      retrieval.searchByText({ query: "origin", modality: "text", limit: 2.5 }),
    ]);

    expect(results.map((result) => result.ok || result.error.kind)).toEqual(
      new Array<string>(5).fill("validation"),
    );

    const longest = await retrieval.searchByText({ query: "y".repeat(200), modality: "text" });
    expect(longest.ok).toBe(true);
  });

  it("defaults to ten results", async () => {
    const { store, retrieval } = await setup();
    for (let index = 0; index < 12; index += 1) {
      await store.insertText({
        sourcePageUrl: "https://site.test/bulk",
        content: `bulk ${index}`,
        embedding: [index, 1, 1],
      });
    }

    const result = await retrieval.searchByText({ query: "origin", modality: "text" });

    expect(result.ok && result.value.results).toHaveLength(10);
  });

  it("searches by an uploaded image", async () => {
    const { retrieval } = await setup();

    const result = await retrieval.searchByFile({
      data: await pngBytes(4, 2),
      filename: "query.PNG",
      modality: "image",
      limit: 2,
    });

    expect(
      result.ok && result.value.modality === "image" && result.value.results.map((row) => row.asset_url),
    ).toEqual(["https://site.test/cat.png", "https://site.test/boat.png"]);
  });

  it("embeds an uploaded audio file as one waveform", async () => {
    const { retrieval, extractors } = await setup();
    const samples = Array.from({ length: 4000 }, (_, index) => (index % 4) * 1000);

    const result = await retrieval.searchByFile({
      data: wavBytes([samples], 8000),
      filename: "hum.wav",
      modality: "audio",
    });

    expect(result.ok).toBe(true);
    expect(extractors.embeddedWaveforms.map((waveform) => waveform.length)).toEqual([4000]);
  });

  it("rejects uploads with the wrong extension, too many bytes or broken content", async () => {
    const { retrieval } = await setup({ maxUploadBytes: 64 });

    const wrongType = await retrieval.searchByFile({
      data: Buffer.from("hello"),
      filename: "notes.txt",
      modality: "image",
    });
    const tooLarge = await retrieval.searchByFile({
      data: Buffer.alloc(65),
      filename: "big.png",
      modality: "image",
    });
    const broken = await retrieval.searchByFile({
      data: Buffer.from("not really a png"),
      filename: "broken.png",
      modality: "image",
    });

    expect(wrongType.ok || wrongType.error).toMatchObject({
      kind: "validation",
      message: "Unsupported file type for image search: notes.txt",
    });
    expect(tooLarge.ok || tooLarge.error).toMatchObject({
      kind: "validation",
      message: "Uploaded file exceeds the 64 byte limit.",
    });
    expect(broken.ok || broken.error.kind).toBe("malformed_content");
  });

  it("treats a query vector of the wrong size as a backend fault", async () => {
    const { retrieval } = await setup({ extractorDimensions: { text: 4, image: 3, audio: 3 } });

    const result = await retrieval.searchByText({ query: "origin", modality: "text" });

    expect(result.ok || result.error).toMatchObject({
      kind: "backend",
      message: "Query embedding for text has 4 dimensions, expected 3.",
    });
  });

  it("matches keywords in text content and image alt text", async () => {
    const { retrieval } = await setup();

    const texts = await retrieval.searchByKeyword({ query: "here", modality: "text" });
    const images = await retrieval.searchByKeyword({ query: "cats", modality: "image" });

    expect(texts.ok && texts.value.results).toEqual([
      { source_page_url: "https://site.test/t", content: "right here" },
    ]);
    expect(images.ok && images.value.results).toEqual([
      {
        source_page_url: "https://site.test/pets",
        asset_url: "https://site.test/cat.png",
        alt_text: "A sleepy cat",
      },
    ]);
  });

  it("counts records per modality", async () => {
    const { retrieval } = await setup();

    expect(await retrieval.countRecords()).toEqual({
      ok: true,
      value: { text: 3, image: 2, audio: 1 },
    });
  });
});
