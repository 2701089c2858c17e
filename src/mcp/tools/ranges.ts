import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { readRange, writeRange } from "../../host/operations";
import { RANGE_READ_TOOL_DESCRIPTION, RANGE_WRITE_TOOL_DESCRIPTION } from "../config/messages";
import type { SheethostRuntime } from "../runtime";
import { ok, respond } from "./respond";

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// Register stateless range tools. Each call is one scoped document lease.
export function registerRangeTools(server: McpServer, runtime: SheethostRuntime): void {
  const { session, logger } = runtime;

  server.tool(
    "range_read",
    RANGE_READ_TOOL_DESCRIPTION,
    {
      path: z.string().min(1).describe("Workbook path"),
      sheet: z.string().min(1).describe("Sheet name"),
      range: z.string().min(1).describe("Range address, e.g. 'A1:C10'"),
    },
    async ({ path, sheet, range }) =>
      respond(logger, "range_read", async () => {
        const values = await session.withDocument(path, { readOnly: true }, (entry, binding) =>
          readRange(binding, entry, sheet, range, logger)
        );
        return ok(`Read ${values.length} row(s) from ${sheet}!${range}`, { values });
      })
  );

  server.tool(
    "range_write",
    RANGE_WRITE_TOOL_DESCRIPTION,
    {
      path: z.string().min(1).describe("Workbook path"),
      sheet: z.string().min(1).describe("Sheet name"),
      range: z.string().min(1).describe("Top-left cell or full range address"),
      values: z.array(z.array(cellSchema)).min(1).describe("Rows of cell values"),
      save: z
        .boolean()
        .default(false)
        .describe("Save the workbook afterwards. Without it, changes to a workbook not held open by document_open are discarded"),
    },
    async ({ path, sheet, range, values, save }) =>
      respond(logger, "range_write", async () => {
        await session.withDocument(path, { mutate: true, save }, (entry, binding) =>
          writeRange(binding, entry, sheet, range, values, logger)
        );
        return ok(`Wrote ${values.length} row(s) to ${sheet}!${range}`, { rows: values.length, saved: save });
      })
  );
}
