import type { Logger } from "pino";
import { HostError, describeError } from "../../host/errors";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

// Every tool answers with one JSON document: { success, summary, data | error }.
export function ok(summary: string, data?: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ success: true, summary, data: data ?? null }, null, 2) }],
  };
}

export function fail(error: unknown): ToolResult {
  const payload =
    error instanceof HostError
      ? error.toJSON()
      : { error: describeError(error), error_type: error instanceof RangeError ? "invalid_input" : "internal_error" };

  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ success: false, summary: payload.error, error: payload }, null, 2),
      },
    ],
    isError: true,
  };
}

// Typed failures become error payloads; the agent decides what to tell the user.
export async function respond(logger: Logger, tool: string, work: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await work();
  } catch (error) {
    logger.warn({ tool, err: error }, "tool call failed");
    return fail(error);
  }
}
