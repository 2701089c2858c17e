#!/usr/bin/env node
import { runMcpServer } from "./mcp/main";

runMcpServer().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
