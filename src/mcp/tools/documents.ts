import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { listSheets } from "../../host/operations";
import {
  DOCUMENT_CLOSE_TOOL_DESCRIPTION,
  DOCUMENT_LIST_UNSAVED_TOOL_DESCRIPTION,
  DOCUMENT_OPEN_TOOL_DESCRIPTION,
  DOCUMENT_SAVE_ALL_TOOL_DESCRIPTION,
  DOCUMENT_SAVE_TOOL_DESCRIPTION,
} from "../config/messages";
import type { SheethostRuntime } from "../runtime";
import { ok, respond } from "./respond";

// Register tools that hold documents open across calls.
export function registerDocumentTools(server: McpServer, runtime: SheethostRuntime): void {
  const { session, binding, logger } = runtime;

  server.tool(
    "document_open",
    DOCUMENT_OPEN_TOOL_DESCRIPTION,
    {
      path: z.string().min(1).describe("Workbook path, absolute or relative to the server's working directory"),
      create_if_missing: z.boolean().default(false).describe("Create a new workbook when the path does not exist"),
      sheet_names: z.array(z.string().min(1)).optional().describe("Sheet names for a newly created workbook"),
      read_only: z.boolean().default(false).describe("Open read-only"),
    },
    async ({ path, create_if_missing, sheet_names, read_only }) =>
      respond(logger, "document_open", () =>
        session.lock.run(async () => {
          const entry = await session.leaseDocument(path, {
            create: create_if_missing,
            sheetNames: sheet_names,
            readOnly: read_only,
          });
          const sheets = await listSheets(binding, entry);
          return ok(`Opened ${entry.path}${entry.owned ? "" : " (already open, not owned)"}`, {
            path: entry.path,
            owned: entry.owned,
            read_only: entry.readOnly,
            sheets,
          });
        })
      )
  );

  server.tool(
    "document_save",
    DOCUMENT_SAVE_TOOL_DESCRIPTION,
    {
      path: z.string().min(1).describe("Path of an open workbook"),
      save_as: z.string().min(1).optional().describe("Save a copy under this path instead"),
    },
    async ({ path, save_as }) =>
      respond(logger, "document_save", async () => {
        await session.saveDocument(path, save_as);
        return ok(save_as ? `Saved ${path} as ${save_as}` : `Saved ${path}`, { path, save_as: save_as ?? null });
      })
  );

  server.tool(
    "document_close",
    DOCUMENT_CLOSE_TOOL_DESCRIPTION,
    {
      path: z.string().min(1).describe("Path of an open workbook"),
      save: z.boolean().default(false).describe("Save changes before closing"),
      force: z.boolean().default(false).describe("Also close a workbook the user had open"),
    },
    async ({ path, save, force }) =>
      respond(logger, "document_close", async () => {
        await session.closeDocument(path, { save, force });
        return ok(`Closed ${path}`, { path, saved: save });
      })
  );

  server.tool("document_list_unsaved", DOCUMENT_LIST_UNSAVED_TOOL_DESCRIPTION, {}, async () =>
    respond(logger, "document_list_unsaved", async () => {
      const documents = await session.unsavedDocuments();
      return ok(`${documents.length} workbook(s) with unsaved changes`, { documents });
    })
  );

  server.tool("document_save_all", DOCUMENT_SAVE_ALL_TOOL_DESCRIPTION, {}, async () =>
    respond(logger, "document_save_all", async () => {
      const report = await session.saveAllDocuments();
      const summary =
        report.errors.length > 0
          ? `Saved ${report.saved} workbook(s), ${report.errors.length} could not be saved`
          : `Saved ${report.saved} workbook(s)`;
      return ok(summary, { saved: report.saved, errors: report.errors });
    })
  );
}
