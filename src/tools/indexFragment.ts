import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { fail, succeed } from "../domain/errors.js";
import { IngestionService } from "../services/ingestionService.js";
import { operationToolResult } from "./toolResult.js";

export function registerIndexFragmentTool(server: McpServer, ingestion: IngestionService) {
  server.registerTool(
    "index_fragment",
    {
      title: "Index Fragment",
      description:
        "Indexes one text snippet, or downloads and indexes one image or audio asset.",
      inputSchema: {
        type: z.enum(["text", "image", "audio"]).describe("Fragment modality"),
        source_url: z.string().url().describe("Page the fragment belongs to"),
        content: z.string().optional().describe("Text content (type=text)"),
        asset_url: z.string().url().optional().describe("Asset URL (type=image|audio)"),
        alt_text: z.string().optional().describe("Alt text (type=image)"),
      },
    },
    async ({ type, source_url, content, asset_url, alt_text }) => {
      if (type === "text") {
        const result = await ingestion.ingestText(content ?? "", source_url);
        return operationToolResult(
          result.ok
            ? succeed({
                id: result.value.id,
                source_page_url: result.value.sourcePageUrl,
                content: result.value.content,
              })
            : result,
        );
      }
      if (!asset_url) {
        return operationToolResult(fail("validation", `asset_url is required for ${type} fragments.`));
      }
      const asset = type === "image" ? { url: asset_url, altText: alt_text ?? "" } : { url: asset_url };
      return operationToolResult(await ingestion.ingestMedia(asset, source_url, type));
    },
  );
}
