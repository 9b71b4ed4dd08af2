import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";
import { AppContext, createAppContext } from "../src/bootstrap.js";
import { EmbeddingBackendError } from "../src/domain/errors.js";
import { TextEmbedder } from "../src/infra/ai/types.js";
import { InMemoryFeatureStore } from "../src/infra/store/inMemoryFeatureStore.js";
import { RunningHttpServer, runHttpServer } from "../src/httpServer.js";
import { createMcpServer } from "../src/mcpServer.js";
import { FakeFeatureExtractors, TEST_DIMENSIONS, testConfig } from "./helpers/fakes.js";
import { pngBytes } from "./helpers/media.js";

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
});

async function startServer(context: AppContext) {
  const running = await runHttpServer("127.0.0.1", 0, context, () => createMcpServer(context));
  return { running, baseUrl: `http://127.0.0.1:${running.port}` };
}

describe("HTTP API", () => {
  let context: AppContext;
  let running: RunningHttpServer;
  let baseUrl: string;

  beforeAll(async () => {
    const featureStore = new InMemoryFeatureStore(TEST_DIMENSIONS);
    context = await createAppContext(testConfig({ MAX_UPLOAD_BYTES: "4096" }), {
      featureStore,
      extractors: new FakeFeatureExtractors({ origin: [0, 0, 0] }).asExtractors(),
    });
    await featureStore.insertText({
      sourcePageUrl: "https://site.test/",
      content: "Welcome Page",
      embedding: [1, 0, 0],
    });
    await featureStore.upsertImage({
      assetUrl: "https://site.test/cat.png",
      sourcePageUrl: "https://site.test/",
      altText: "A cat",
      embedding: [4, 2, 1],
    });
    ({ running, baseUrl } = await startServer(context));
  });

  afterAll(async () => {
    await running.stop();
    await context.close();
  });

  it("reports health", async () => {
    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, store: "injected" });
  });

  it("answers text queries", async () => {
    const response = await fetch(`${baseUrl}/search?q=origin&type=text&limit=1`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      modality: "text",
      results: [{ source_page_url: "https://site.test/", content: "Welcome Page" }],
    });
  });

  it("maps validation failures to 400", async () => {
    const emptyQuery = await fetch(`${baseUrl}/search?q=%20&type=text`);
    const badType = await fetch(`${baseUrl}/search?q=origin&type=video`);
    const missingType = await fetch(`${baseUrl}/search?q=origin`);

    expect(emptyQuery.status).toBe(400);
    expect(await emptyQuery.json()).toEqual({
      error: { kind: "validation", message: "Query must not be empty." },
    });
    expect(badType.status).toBe(400);
    expect(await badType.json()).toMatchObject({ error: { kind: "validation" } });
    expect(missingType.status).toBe(400);
    expect(await missingType.json()).toEqual({
      error: { kind: "validation", message: "type: Required" },
    });
  });

  it("answers file queries sent as base64 JSON", async () => {
    const png = await pngBytes(4, 2);

    const response = await fetch(`${baseUrl}/search`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        type: "image",
        limit: 1,
        filename: "query.png",
        content_base64: png.toString("base64"),
      }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      modality: "image",
      results: [
        {
          source_page_url: "https://site.test/",
          asset_url: "https://site.test/cat.png",
          alt_text: "A cat",
        },
      ],
    });
  });

  it("rejects corrupt uploads and malformed JSON with 400", async () => {
    const corrupt = await fetch(`${baseUrl}/search`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        type: "image",
        filename: "broken.jpg",
        content_base64: Buffer.from("no pixels here").toString("base64"),
      }),
    });
    const malformed = await fetch(`${baseUrl}/search`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(corrupt.status).toBe(400);
    expect(await corrupt.json()).toMatchObject({ error: { kind: "malformed_content" } });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({
      error: { kind: "validation", message: "Invalid JSON body" },
    });
  });

  it("serves keyword search and record counts", async () => {
    const keyword = await fetch(`${baseUrl}/search/keyword?q=welcome`);
    const stats = await fetch(`${baseUrl}/stats`);

    expect(await keyword.json()).toEqual({
      modality: "text",
      results: [{ source_page_url: "https://site.test/", content: "Welcome Page" }],
    });
    expect(await stats.json()).toEqual({ text: 1, image: 1, audio: 0 });
  });

  it("answers 404 and 405 for unknown routes and methods", async () => {
    const missing = await fetch(`${baseUrl}/nope`);
    const wrongMethod = await fetch(`${baseUrl}/stats`, { method: "DELETE" });

    expect(missing.status).toBe(404);
    expect(wrongMethod.status).toBe(405);
  });

  it("requires an initialize request before other MCP calls", async () => {
    const response = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: "2.0",
      error: {
        code: -32000,
        message: "Initialize request is required when session is not established",
      },
      id: null,
    });
  });

  it("rejects unknown sessions and session requests without an id", async () => {
    const unknown = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "Mcp-Session-Id": "no-such-session" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/list" }),
    });
    const anonymous = await fetch(`${baseUrl}/mcp`);
    const malformed = await fetch(`${baseUrl}/mcp`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32001, message: "Session not found" },
      id: null,
    });
    expect(anonymous.status).toBe(400);
    expect(await anonymous.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Mcp-Session-Id header is required" },
      id: null,
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({
      error: { kind: "validation", message: "Invalid JSON body" },
    });
  });

  it("exposes the search tools over MCP", async () => {
    const client = new Client({ name: "api-test", version: "0.0.0" });
    await client.connect(new StreamableHTTPClientTransport(new URL(`${baseUrl}/mcp`)));

    try {
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name).sort()).toEqual([
        "crawl_site",
        "health_check",
        "index_fragment",
        "search_by_file",
        "search_by_text",
      ]);

      const result = toolResultSchema.parse(
        await client.callTool({ name: "search_by_text", arguments: { query: "origin", limit: 1 } }),
      );
      expect(JSON.parse(result.content[0].text)).toEqual({
        modality: "text",
        results: [{ source_page_url: "https://site.test/", content: "Welcome Page" }],
      });
    } finally {
      await client.close();
    }
  });
});

class OfflineTextEmbedder implements TextEmbedder {
  async embedTexts(): Promise<number[][]> {
    throw new EmbeddingBackendError("Embedding request /embed/text failed (503): offline");
  }
}

class BrokenTextEmbedder implements TextEmbedder {
  async embedTexts(): Promise<number[][]> {
    throw new TypeError("vectors is not iterable");
  }
}

async function contextWithTextEmbedder(text: TextEmbedder): Promise<AppContext> {
  const fakes = new FakeFeatureExtractors();
  return createAppContext(testConfig(), {
    featureStore: new InMemoryFeatureStore(TEST_DIMENSIONS),
    extractors: { ...fakes.asExtractors(), text },
  });
}

describe("HTTP API with a failing embedder", () => {
  it("maps backend failures to 502", async () => {
    const context = await contextWithTextEmbedder(new OfflineTextEmbedder());
    const { running, baseUrl } = await startServer(context);

    try {
      const response = await fetch(`${baseUrl}/search?q=anything&type=text`);

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({
        error: {
          kind: "backend",
          message: "Embedding request /embed/text failed (503): offline",
        },
      });
    } finally {
      await running.stop();
      await context.close();
    }
  });

  it("maps unexpected errors to 500", async () => {
    const context = await contextWithTextEmbedder(new BrokenTextEmbedder());
    const { running, baseUrl } = await startServer(context);

    try {
      const response = await fetch(`${baseUrl}/search?q=anything&type=text`);

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        error: { kind: "internal", message: "vectors is not iterable" },
      });
    } finally {
      await running.stop();
      await context.close();
    }
  });
});
