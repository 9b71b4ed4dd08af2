import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { TaskQueue } from "../infra/queue/taskQueue.js";
import { FrontierCrawler } from "../services/frontierCrawler.js";
import { IngestionTasks } from "../services/ingestionDispatcher.js";
import { jsonToolResult, operationToolResult } from "./toolResult.js";

export function registerCrawlSiteTool(
  server: McpServer,
  crawler: FrontierCrawler,
  queue: TaskQueue<IngestionTasks>,
) {
  server.registerTool(
    "crawl_site",
    {
      title: "Crawl Site",
      description:
        "Crawls a site breadth-first from a seed URL and queues every fragment for indexing.",
      inputSchema: {
        seed_url: z.string().url().describe("Absolute http(s) URL to start from"),
        limit: z.number().int().min(1).max(1000).optional().describe("Max pages (default 10)"),
        delay_seconds: z
          .number()
          .min(0)
          .max(60)
          .optional()
          .describe("Pause between pages (default 1)"),
      },
    },
    async ({ seed_url, limit, delay_seconds }) => {
      const result = await crawler.crawl({
        seedUrl: seed_url,
        limit: limit ?? 10,
        delayMs: Math.round((delay_seconds ?? 1) * 1000),
      });
      if (!result.ok) {
        return operationToolResult(result);
      }

      // Ingestion keeps running in the background; report where it stands.
      return jsonToolResult({ ...result.value, ingestion: queue.getStats() });
    },
  );
}
