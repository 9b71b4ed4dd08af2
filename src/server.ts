import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAppContext } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { MCP_PATH, runHttpServer } from "./httpServer.js";
import { createMcpServer } from "./mcpServer.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("server");

async function main() {
  const config = loadConfig();
  const context = await createAppContext(config);
  log.info(`Feature store backend: ${context.storeBackend}`);

  const shutdownTasks: Array<() => Promise<void>> = [context.close];

  if (config.transport === "http") {
    const running = await runHttpServer(config.host, config.port, context, () =>
      createMcpServer(context),
    );
    shutdownTasks.unshift(running.stop);
    log.info(`HTTP server listening on http://${config.host}:${running.port} (MCP at ${MCP_PATH})`);
  } else {
    await runStdioServer(createMcpServer(context));
  }

  const shutdown = async () => {
    const { pending } = context.queue.getStats();
    if (pending > 0) {
      log.warn(`Shutting down with ${pending} ingestion task(s) still pending.`);
    }
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      log.error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error: unknown) => {
  log.fatal("Failed to start server:", error);
  process.exit(1);
});
