import { describe, expect, it } from "vitest";
import { createAppContext } from "../src/bootstrap.js";
import { FetchLike } from "../src/infra/http/fetcher.js";
import { InMemoryFeatureStore } from "../src/infra/store/inMemoryFeatureStore.js";
import { QueueIngestionDispatcher } from "../src/services/ingestionDispatcher.js";
import {
  FakeFeatureExtractors,
  FakeResource,
  fakeSite,
  html,
  TEST_DIMENSIONS,
  testConfig,
} from "./helpers/fakes.js";
import { pngBytes } from "./helpers/media.js";

const PAGE1 = "https://site.test/page1.html";
const PAGE2 = "https://site.test/page2.html";
const CAT = "https://site.test/cat.png";

const TEXT_VECTORS: Record<string, number[]> = {
  "Welcome to the test site": [1, 0, 0],
  "Second paragraph here": [0, 5, 0],
  "Another page entirely": [2, 0, 0],
  welcome: [1, 0, 0],
};

async function twoPageSite(): Promise<Record<string, FakeResource>> {
  return {
    [PAGE1]: html(
      '<p>Welcome to the test site</p><p>Second paragraph here</p><img src="/cat.png" alt="A cat"><a href="/page2.html"></a>',
    ),
    [PAGE2]: html("<p>Another page entirely</p>"),
    [CAT]: { body: await pngBytes(4, 2), contentType: "image/png" },
  };
}

async function setup(fetchImpl: FetchLike) {
  const featureStore = new InMemoryFeatureStore(TEST_DIMENSIONS);
  const context = await createAppContext(testConfig(), {
    featureStore,
    extractors: new FakeFeatureExtractors(TEXT_VECTORS).asExtractors(),
    fetchImpl,
    sleep: async () => {},
  });
  return { context, featureStore };
}

describe("crawl, ingest and search", () => {
  it("indexes a two-page site and ranks the matching snippet first", async () => {
    const site = fakeSite(await twoPageSite());
    const { context, featureStore } = await setup(site.fetchImpl);

    const crawl = await context.crawler.crawl({ seedUrl: PAGE1, limit: 5, delayMs: 0 });
    await context.queue.onIdle();

    expect(crawl.ok && crawl.value.visited).toEqual([PAGE1, PAGE2]);
    expect(crawl.ok && crawl.value.dispatched).toEqual({ text: 3, image: 1, audio: 0 });
    expect(await featureStore.countRecords()).toEqual({ text: 3, image: 1, audio: 0 });
    expect(context.queue.getStats()).toEqual({ pending: 0, succeeded: 4, failed: 0 });

    const search = await context.retrieval.searchByText({ query: "welcome", modality: "text" });
    expect(search.ok && search.value.results).toEqual([
      { source_page_url: PAGE1, content: "Welcome to the test site" },
      { source_page_url: PAGE2, content: "Another page entirely" },
      { source_page_url: PAGE1, content: "Second paragraph here" },
    ]);

    const images = await context.retrieval.searchByKeyword({ query: "cat", modality: "image" });
    expect(images.ok && images.value.results).toEqual([
      { source_page_url: PAGE1, asset_url: CAT, alt_text: "A cat" },
    ]);
  });

  it("retries an asset download that fails once", async () => {
    const site = fakeSite(await twoPageSite());
    let catRequests = 0;
    const flaky: FetchLike = async (url, init) => {
      if (url === CAT) {
        catRequests += 1;
        if (catRequests === 1) {
          return new Response("busy", { status: 503 });
        }
      }
      return site.fetchImpl(url, init);
    };
    const { context, featureStore } = await setup(flaky);

    await context.crawler.crawl({ seedUrl: PAGE1, limit: 5, delayMs: 0 });
    await context.queue.onIdle();

    expect(catRequests).toBe(2);
    expect((await featureStore.countRecords()).image).toBe(1);
    expect(context.queue.getFailures()).toEqual([]);
  });

  it("gives up on a corrupt image after the configured attempts", async () => {
    const resources = await twoPageSite();
    const site = fakeSite({
      ...resources,
      [CAT]: { body: "GIF89a but not really", contentType: "image/png" },
    });
    const { context, featureStore } = await setup(site.fetchImpl);

    await context.crawler.crawl({ seedUrl: PAGE1, limit: 5, delayMs: 0 });
    await context.queue.onIdle();

    const failures = context.queue.getFailures();
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({
      status: "failed",
      name: "ingest_media",
      attempts: 3,
      error: { kind: "malformed_content" },
    });
    expect(site.requested.filter((url) => url === CAT)).toHaveLength(3);
    expect(await featureStore.countRecords()).toEqual({ text: 3, image: 0, audio: 0 });
  });

  it("applies a second upsert of the same asset from another page", async () => {
    const site = fakeSite(await twoPageSite());
    const { context, featureStore } = await setup(site.fetchImpl);
    const dispatcher = new QueueIngestionDispatcher(context.queue);

    dispatcher.dispatchMedia({ url: CAT, altText: "old alt" }, "https://site.test/a", "image");
    dispatcher.dispatchMedia({ url: CAT, altText: "new alt" }, "https://site.test/b", "image");
    await context.queue.onIdle();

    const [hit] = await featureStore.nearestImages([4, 2, 1], 1);
    expect(hit.record).toMatchObject({ sourcePageUrl: "https://site.test/b", altText: "new alt" });
    expect(await featureStore.countRecords()).toEqual({ text: 0, image: 1, audio: 0 });
    expect(site.requested.filter((url) => url === CAT)).toHaveLength(2);
    expect(context.queue.getStats()).toEqual({ pending: 0, succeeded: 2, failed: 0 });
  });
});
