import { describe, expect, it } from "vitest";
import { MediaAssetDescriptor, MediaModality } from "../src/domain/types.js";
import { HttpFetcher } from "../src/infra/http/fetcher.js";
import { FrontierCrawler } from "../src/services/frontierCrawler.js";
import { IngestionDispatcher } from "../src/services/ingestionDispatcher.js";
import { FakeResource, fakeSite, html } from "./helpers/fakes.js";

class RecordingDispatcher implements IngestionDispatcher {
  readonly texts: Array<{ content: string; sourceUrl: string }> = [];

  readonly media: Array<{ asset: MediaAssetDescriptor; sourceUrl: string; modality: MediaModality }> =
    [];

  dispatchText(content: string, sourceUrl: string): void {
    this.texts.push({ content, sourceUrl });
  }

  dispatchMedia(asset: MediaAssetDescriptor, sourceUrl: string, modality: MediaModality): void {
    this.media.push({ asset, sourceUrl, modality });
  }
}

function setup(resources: Record<string, FakeResource>) {
  const site = fakeSite(resources);
  const dispatcher = new RecordingDispatcher();
  const delays: number[] = [];
  const crawler = new FrontierCrawler({
    fetcher: new HttpFetcher({
      pageTimeoutMs: 1_000,
      assetTimeoutMs: 1_000,
      maxAssetBytes: 1024 * 1024,
      fetchImpl: site.fetchImpl,
    }),
    dispatcher,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { crawler, dispatcher, delays, requested: site.requested };
}

const SITE: Record<string, FakeResource> = {
  "https://site.test/": html(
    '<p>Home</p><a href="/a">A</a><a href="/b">B</a><a href="https://elsewhere.test/">Away</a>',
  ),
  "https://site.test/a": html('<a href="/c">C</a><a href="/">Home</a>'),
  "https://site.test/b": html('<a href="/c#top">C again</a>'),
  "https://site.test/c": html("<p>Deep</p>"),
};

describe("FrontierCrawler", () => {
  it("visits same-origin pages breadth-first, each once", async () => {
    const { crawler, requested } = setup(SITE);

    const result = await crawler.crawl({ seedUrl: "https://site.test/", limit: 10, delayMs: 0 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.visited).toEqual([
      "https://site.test/",
      "https://site.test/a",
      "https://site.test/b",
      "https://site.test/c",
    ]);
    expect(requested).toEqual(result.value.visited);
    expect(result.value.failed).toEqual([]);
  });

  it("stops once the page budget is spent", async () => {
    const { crawler, requested } = setup(SITE);

    const result = await crawler.crawl({ seedUrl: "https://site.test/", limit: 2, delayMs: 0 });

    expect(result.ok && result.value.visited).toEqual(["https://site.test/", "https://site.test/a"]);
    expect(requested).toHaveLength(2);
  });

  it("dispatches every fragment with the page it came from", async () => {
    const { crawler, dispatcher } = setup({
      "https://site.test/": html(
        '<p>Hello</p><img src="/cat.jpg" alt="Cat"><audio src="/purr.wav"></audio>',
      ),
    });

    const result = await crawler.crawl({ seedUrl: "https://site.test/", limit: 5, delayMs: 0 });

    expect(result.ok && result.value.dispatched).toEqual({ text: 1, image: 1, audio: 1 });
    expect(dispatcher.texts).toEqual([{ content: "Hello", sourceUrl: "https://site.test/" }]);
    expect(dispatcher.media).toEqual([
      {
        asset: { url: "https://site.test/cat.jpg", altText: "Cat" },
        sourceUrl: "https://site.test/",
        modality: "image",
      },
      { asset: { url: "https://site.test/purr.wav" }, sourceUrl: "https://site.test/", modality: "audio" },
    ]);
  });

  it("records failed and non-HTML pages and keeps going", async () => {
    const { crawler, dispatcher } = setup({
      "https://site.test/": html('<a href="/missing">gone</a><a href="/doc.pdf">pdf</a><a href="/ok">ok</a>'),
      "https://site.test/doc.pdf": { body: "%PDF-1.4", contentType: "application/pdf" },
      "https://site.test/ok": html("<p>Still here</p>"),
    });

    const result = await crawler.crawl({ seedUrl: "https://site.test/", limit: 10, delayMs: 0 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.visited).toHaveLength(4);
    expect(result.value.failed).toEqual([
      {
        url: "https://site.test/missing",
        reason: "GET https://site.test/missing failed with HTTP 404.",
      },
      {
        url: "https://site.test/doc.pdf",
        reason: "GET https://site.test/doc.pdf returned application/pdf, expected HTML.",
      },
    ]);
    expect(dispatcher.texts.map((text) => text.content)).toContain("Still here");
  });

  it("pauses between successful pages only while more remain", async () => {
    const { crawler, delays } = setup({
      "https://site.test/": html('<a href="/a">a</a>'),
      "https://site.test/a": html('<a href="/missing">m</a>'),
    });

    await crawler.crawl({ seedUrl: "https://site.test/", limit: 10, delayMs: 250 });

    expect(delays).toEqual([250, 250]);
  });

  it("rejects an unusable seed or limit without fetching", async () => {
    const { crawler, requested } = setup(SITE);

    const badSeed = await crawler.crawl({ seedUrl: "ftp://site.test/", limit: 5, delayMs: 0 });
    const badLimit = await crawler.crawl({ seedUrl: "https://site.test/", limit: 0, delayMs: 0 });

    expect(badSeed.ok || badSeed.error.kind).toBe("validation");
    expect(badLimit.ok || badLimit.error.kind).toBe("validation");
    expect(requested).toEqual([]);
  });
});
