// MCP server identity used by clients to display this integration.
export const MCP_SERVER_NAME = "sheethost";
export const MCP_SERVER_VERSION = "0.1.0";

// Label of the session the server drives.
export const MCP_SESSION_LABEL = "mcp";
