import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createRuntime } from "./runtime";
import { createSheethostMcpServer } from "./server";

// Start MCP server on stdio transport.
export async function runMcpServer(): Promise<void> {
  const runtime = createRuntime({ exitHooks: true });
  const server = createSheethostMcpServer(runtime);
  const transport = new StdioServerTransport();

  // Stdin closing means the client is gone; release the host before exiting.
  process.stdin.once("end", () => {
    runtime.session.stop().then(
      (failures) => {
        runtime.logger.info({ failureCount: failures.length }, "mcp transport closed");
      },
      (error: unknown) => {
        runtime.logger.error({ err: error }, "stop after transport close failed");
      }
    );
  });

  await server.connect(transport);
  runtime.logger.info("sheethost mcp server listening on stdio");
}
