import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { fail } from "../domain/errors.js";
import { MAX_QUERY_LENGTH, MAX_RESULT_LIMIT, RetrievalService } from "../services/retrievalService.js";
import { operationToolResult } from "./toolResult.js";

export function registerSearchByTextTool(server: McpServer, retrieval: RetrievalService) {
  server.registerTool(
    "search_by_text",
    {
      title: "Search By Text",
      description:
        "Finds indexed text snippets, images or audio chunks closest to a text query.",
      inputSchema: {
        query: z.string().min(1).max(MAX_QUERY_LENGTH).describe("Search query"),
        type: z.enum(["text", "image", "audio"]).optional().describe("Result modality"),
        limit: z.number().int().min(1).max(MAX_RESULT_LIMIT).optional().describe("Max results"),
        match: z
          .enum(["semantic", "keyword"])
          .optional()
          .describe("keyword matches words in text content or image alt text"),
      },
    },
    async ({ query, type, limit, match }) => {
      const modality = type ?? "text";
      if (match === "keyword") {
        if (modality === "audio") {
          return operationToolResult(
            fail("validation", "Keyword search supports text and image only."),
          );
        }
        return operationToolResult(await retrieval.searchByKeyword({ query, modality, limit }));
      }
      return operationToolResult(await retrieval.searchByText({ query, modality, limit }));
    },
  );
}
