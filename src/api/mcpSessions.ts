import { randomUUID } from "node:crypto";
import { IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { AppLogger, createLogger } from "../utils/logger.js";

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

const SESSION_HEADER = "mcp-session-id";

/**
 * Streamable HTTP sessions keyed by the `Mcp-Session-Id` header. A session
 * is created by an initialize POST and lives until its transport closes.
 */
export class McpSessionRegistry {
  private readonly sessions = new Map<string, McpSession>();

  private readonly logger: AppLogger;

  constructor(
    private readonly createServer: () => McpServer,
    logger?: AppLogger,
  ) {
    this.logger = logger ?? createLogger("mcp-sessions");
  }

  get size(): number {
    return this.sessions.size;
  }

  /** `body` is the parsed JSON of a POST; GET and DELETE pass nothing. */
  async handle(req: IncomingMessage, res: ServerResponse, body?: unknown): Promise<void> {
    const sessionId = readSessionId(req);

    if (sessionId) {
      const session = this.sessions.get(sessionId);
      if (!session) {
        sendRpcError(res, 404, -32001, "Session not found");
        return;
      }
      await session.transport.handleRequest(req, res, body);
      return;
    }

    if (req.method !== "POST") {
      sendRpcError(res, 400, -32000, "Mcp-Session-Id header is required");
      return;
    }
    if (!isInitializeRequest(body)) {
      sendRpcError(
        res,
        400,
        -32000,
        "Initialize request is required when session is not established",
      );
      return;
    }

    await this.open(req, res, body);
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    for (const { transport, server } of open) {
      await transport.close();
      await server.close();
    }
  }

  private async open(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const server = this.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        this.sessions.set(id, { server, transport });
        this.logger.debug(`Opened MCP session ${id}`);
      },
    });
    transport.onclose = () => {
      this.forget(transport.sessionId);
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private forget(sessionId: string | undefined): void {
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!sessionId || !session) {
      return;
    }
    this.sessions.delete(sessionId);
    this.logger.debug(`Closed MCP session ${sessionId}`);
    session.server.close().catch((error: unknown) => {
      this.logger.warn(`Failed to close MCP server for session ${sessionId}:`, error);
    });
  }
}

function readSessionId(req: IncomingMessage): string | undefined {
  const value = req.headers[SESSION_HEADER];
  return typeof value === "string" ? value : value?.[0];
}

function sendRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}
