import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { MAX_RESULT_LIMIT, RetrievalService } from "../services/retrievalService.js";
import { operationToolResult } from "./toolResult.js";

export function registerSearchByFileTool(server: McpServer, retrieval: RetrievalService) {
  server.registerTool(
    "search_by_file",
    {
      title: "Search By File",
      description: "Finds indexed images or audio chunks similar to an uploaded file.",
      inputSchema: {
        type: z.enum(["image", "audio"]).describe("Modality of the uploaded file"),
        filename: z.string().min(1).describe("Original file name, used for its extension"),
        content_base64: z.string().min(1).describe("File content encoded as base64"),
        limit: z.number().int().min(1).max(MAX_RESULT_LIMIT).optional().describe("Max results"),
      },
    },
    async ({ type, filename, content_base64, limit }) =>
      operationToolResult(
        await retrieval.searchByFile({
          data: Buffer.from(content_base64, "base64"),
          filename,
          modality: type,
          limit,
        }),
      ),
  );
}
