import { createServer, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { McpSessionRegistry } from "./api/mcpSessions.js";
import {
  handleSearchRoute,
  isSearchRoute,
  readJsonBody,
  statusForErrorKind,
} from "./api/searchRoutes.js";
import { AppContext } from "./bootstrap.js";
import { toOperationError } from "./domain/errors.js";
import { createLogger } from "./utils/logger.js";

export interface RunningHttpServer {
  port: number;
  stop: () => Promise<void>;
}

export const MCP_PATH = "/mcp";

const MCP_MAX_BODY_BYTES = 32 * 1024 * 1024;

const log = createLogger("http");

export async function runHttpServer(
  host: string,
  port: number,
  context: AppContext,
  serverFactory: () => McpServer,
): Promise<RunningHttpServer> {
  const sessions = new McpSessionRegistry(serverFactory);

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        writeJson(res, 200, { ok: true, store: context.storeBackend });
        return;
      }

      if (isSearchRoute(url.pathname)) {
        const reply = await handleSearchRoute(req, url, {
          retrieval: context.retrieval,
          maxUploadBytes: context.config.maxUploadBytes,
        });
        writeJson(res, reply.status, reply.body);
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        await sessions.handle(req, res, await readJsonBody(req, MCP_MAX_BODY_BYTES));
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await sessions.handle(req, res);
        return;
      }

      writeJson(res, 405, { error: { kind: "validation", message: "Method not allowed" } });
    } catch (error) {
      const { kind, message } = toOperationError(error);
      if (kind === "internal") {
        log.error(`Unhandled error for ${req.method} ${req.url}:`, error);
      }
      if (!res.headersSent) {
        writeJson(res, statusForErrorKind(kind), { error: { kind, message } });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => resolve());
  });

  const address = httpServer.address();
  const boundPort = address && typeof address === "object" ? address.port : port;

  const stop = async () => {
    await sessions.closeAll();

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };

  return { port: boundPort, stop };
}

function writeJson(res: ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}
