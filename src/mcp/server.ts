import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from "./config/server";
import type { SheethostRuntime } from "./runtime";
import { registerDocumentTools } from "./tools/documents";
import { registerHostTools } from "./tools/host";
import { registerRangeTools } from "./tools/ranges";

// Build and configure MCP server instance.
export function createSheethostMcpServer(runtime: SheethostRuntime): McpServer {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });

  // Tool registration is split into dedicated modules per concern.
  registerHostTools(server, runtime);
  registerDocumentTools(server, runtime);
  registerRangeTools(server, runtime);

  return server;
}
