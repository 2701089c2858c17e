import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import type { HostConfig } from "../../src/host/config";
import { createSilentLogger } from "../../src/logging";
import { createRuntime, type SheethostRuntime } from "../../src/mcp/runtime";
import { createSheethostMcpServer } from "../../src/mcp/server";
import { ProcessGuardian } from "../../src/process/guardian";
import { FAKE_EXECUTABLE, FakeHostBinding } from "../helpers/fake-binding";
import { FakeProcessTable } from "../helpers/fake-processes";

const config: HostConfig = {
  visible: false,
  displayAlerts: false,
  attachToExisting: true,
  executableName: FAKE_EXECUTABLE,
  powershellPath: "pwsh",
  callTimeoutMs: 1_000,
  logLevel: "silent",
};

const contentSchema = z.array(z.object({ type: z.literal("text"), text: z.string() }));
const payloadSchema = z.object({
  success: z.boolean(),
  summary: z.string(),
  data: z.unknown().optional(),
  error: z.record(z.unknown()).optional(),
});

let runtime: SheethostRuntime | null = null;

async function connect() {
  const binding = new FakeHostBinding();
  const table = new FakeProcessTable();
  const guardian = new ProcessGuardian({
    executableName: FAKE_EXECUTABLE,
    lister: table,
    terminators: [table.terminator()],
    currentPid: 100,
  });
  binding.onCreate = () => {
    table.spawn(FAKE_EXECUTABLE, 100);
  };
  runtime = createRuntime({
    config,
    logger: createSilentLogger(),
    binding,
    guardian,
    pathExists: () => false,
  });

  const server = createSheethostMcpServer(runtime);
  const client = new Client({ name: "test-client", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = await client.callTool({ name, arguments: args });
    const [content] = contentSchema.parse(result.content);
    return payloadSchema.parse(JSON.parse(content.text));
  }

  return { binding, call, client, runtime, table };
}

afterEach(() => {
  runtime?.dispose();
  runtime = null;
});

describe("MCP tools", () => {
  it("registers one tool per lifecycle and document operation", async () => {
    const { client } = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "document_close",
      "document_list_unsaved",
      "document_open",
      "document_save",
      "document_save_all",
      "host_cleanup",
      "host_start",
      "host_status",
      "host_stop",
      "range_read",
      "range_write",
    ]);
  });

  it("reports a stopped host", async () => {
    const { call } = await connect();

    expect(await call("host_status")).toEqual({
      success: true,
      summary: "Host not running",
      data: { running: false, attach_mode: false, document_count: 0, open_paths: [], tracked_pids: [] },
    });
  });

  it("starts a fresh host and tracks its process", async () => {
    const { call } = await connect();

    const payload = await call("host_start");

    expect(payload.summary).toBe("Launched host instance");
    expect(payload.data).toMatchObject({ running: true, attach_mode: false, tracked_pids: [5000] });
  });

  it("refuses document work before the host is started", async () => {
    const { call } = await connect();

    const payload = await call("range_read", { path: "/work/a.xlsx", sheet: "Sheet1", range: "A1" });

    expect(payload.success).toBe(false);
    expect(payload.error).toEqual({
      error: "Host application is not available: session has not been started",
      error_type: "host_unavailable",
      reason: "session has not been started",
    });
  });

  it("opens, writes, reads and closes a document", async () => {
    const { binding, call } = await connect();
    await call("host_start");

    const opened = await call("document_open", {
      path: "/work/new.xlsx",
      create_if_missing: true,
      sheet_names: ["Data"],
    });
    expect(opened.data).toEqual({ path: "/work/new.xlsx", owned: true, read_only: false, sheets: ["Data"] });

    const written = await call("range_write", {
      path: "/work/new.xlsx",
      sheet: "Data",
      range: "A1:B1",
      values: [["North", 12]],
    });
    expect(written.summary).toBe("Wrote 1 row(s) to Data!A1:B1");

    const read = await call("range_read", { path: "/work/new.xlsx", sheet: "Data", range: "A1:B1" });
    expect(read.data).toEqual({ values: [["North", 12]] });

    const closed = await call("document_close", { path: "/work/new.xlsx", save: true });
    expect(closed.success).toBe(true);
    expect(binding.calls).toContain("close:/work/new.xlsx:true");
  });

  it("refuses to close a document the user opened", async () => {
    const { binding, call } = await connect();
    binding.seedDocument("/work/shared.xlsx");
    await call("host_start");

    const payload = await call("document_close", { path: "/work/shared.xlsx" });

    expect(payload.success).toBe(false);
    expect(payload.error).toMatchObject({ error_type: "not_owned", path: "/work/shared.xlsx" });
  });

  it("reports a missing document", async () => {
    const { call } = await connect();
    await call("host_start");

    const payload = await call("document_open", { path: "/work/missing.xlsx" });

    expect(payload.error).toEqual({
      error: "Document not found: /work/missing.xlsx",
      error_type: "document_not_found",
      path: "/work/missing.xlsx",
    });
  });

  it("rejects ragged rows before touching the host", async () => {
    const { binding, call } = await connect();
    await call("host_start");
    await call("document_open", { path: "/work/new.xlsx", create_if_missing: true });

    const payload = await call("range_write", {
      path: "/work/new.xlsx",
      sheet: "Sheet1",
      range: "A1:B2",
      values: [["a", "b"], ["c"]],
    });

    expect(payload.error).toEqual({
      error: "every row of values must have the same number of cells",
      error_type: "invalid_input",
    });
    expect(binding.countCalls("write:")).toBe(0);
  });

  it("lists and saves workbooks with unsaved changes", async () => {
    const { binding, call } = await connect();
    binding.seedDocument("/work/clean.xlsx");
    const dirty = binding.seedDocument("/work/dirty.xlsx");
    dirty.saved = false;
    const draft = binding.seedDocument("");
    draft.name = "Book1";
    draft.saved = false;
    await call("host_start");

    expect(await call("document_list_unsaved")).toEqual({
      success: true,
      summary: "2 workbook(s) with unsaved changes",
      data: {
        documents: [
          { name: "dirty.xlsx", path: "/work/dirty.xlsx" },
          { name: "Book1", path: null },
        ],
      },
    });

    expect(await call("document_save_all")).toEqual({
      success: true,
      summary: "Saved 1 workbook(s), 1 could not be saved",
      data: { saved: 1, errors: ["'Book1' has never been saved (no path)"] },
    });
    expect(binding.calls).toContain("save:/work/dirty.xlsx");
  });

  it("stops the session and reports soft failures", async () => {
    const { binding, call } = await connect();
    await call("host_start");
    binding.failures.set("quit", new Error("host is busy"));

    const payload = await call("host_stop");

    expect(payload).toEqual({
      success: true,
      summary: "Session stopped with 1 failed step(s)",
      data: { soft_failures: ["quit host: host is busy"] },
    });
  });

  it("requires force for cleanup", async () => {
    const { call, table } = await connect();
    await call("host_start");

    const refused = await call("host_cleanup");
    expect(refused.error).toMatchObject({ error_type: "invalid_input" });
    expect(table.rows).toHaveLength(1);

    const cleaned = await call("host_cleanup", { force: true });
    expect(cleaned.data).toEqual({
      stopped_sessions: 1,
      terminated_pids: [5000],
      swept_pids: [],
      soft_failures: [],
    });
    expect(table.rows).toEqual([]);
  });
});
