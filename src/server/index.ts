import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { getErrorMessage, logError, logInfo } from "../core/logging.js";
import { getToolDefinitions } from "./analysis-tools.js";
import { createServerContext, type ServerContext } from "./context.js";
import { ToolRegistry, formatToolResponse } from "./tool-registry.js";

// Server configuration
const SERVER_NAME = "contract-analysis-mcp";
const SERVER_VERSION = "0.1.0";

function createServer(registry: ToolRegistry, ctx: ServerContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await registry.callTool(name, args, ctx);
    } catch (err) {
      logError(`Tool ${name} failed:`, getErrorMessage(err));
      return formatToolResponse({ success: false, error: getErrorMessage(err) });
    }
  });

  return server;
}

async function main(): Promise<void> {
  const ctx = createServerContext();
  const registry = new ToolRegistry();
  registry.register(getToolDefinitions());

  const server = createServer(registry, ctx);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logInfo(`Received ${signal}, shutting down...`);
    server
      .close()
      .catch((err: unknown) => logError("Error closing server:", getErrorMessage(err)))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logError("Fatal error:", getErrorMessage(err));
  process.exit(1);
});
