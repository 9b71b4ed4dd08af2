import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppContext } from "./bootstrap.js";
import { registerCrawlSiteTool } from "./tools/crawlSite.js";
import { registerIndexFragmentTool } from "./tools/indexFragment.js";
import { registerSearchByFileTool } from "./tools/searchByFile.js";
import { registerSearchByTextTool } from "./tools/searchByText.js";
import { jsonToolResult } from "./tools/toolResult.js";

export const SERVER_NAME = "multimodal-crawl-search";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(context: AppContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status and ingestion queue counters.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return jsonToolResult({
        status: `${SERVER_NAME} is running. hello ${who}`,
        store: context.storeBackend,
        ingestion: context.queue.getStats(),
      });
    },
  );

  registerSearchByTextTool(server, context.retrieval);
  registerSearchByFileTool(server, context.retrieval);
  registerCrawlSiteTool(server, context.crawler, context.queue);
  registerIndexFragmentTool(server, context.ingestion);

  return server;
}
