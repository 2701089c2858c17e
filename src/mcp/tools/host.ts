import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { formatSoftFailures } from "../../host/soft-failures";
import {
  HOST_CLEANUP_TOOL_DESCRIPTION,
  HOST_START_TOOL_DESCRIPTION,
  HOST_STATUS_TOOL_DESCRIPTION,
  HOST_STOP_TOOL_DESCRIPTION,
} from "../config/messages";
import type { SheethostRuntime } from "../runtime";
import { fail, ok, respond } from "./respond";

async function statusData(runtime: SheethostRuntime) {
  const status = await runtime.session.status();
  return {
    running: status.running,
    attach_mode: status.attachMode,
    document_count: status.documentCount,
    open_paths: status.openPaths,
    tracked_pids: runtime.guardian.trackedPids(),
  };
}

// Register session lifecycle tools: status, start, stop, cleanup.
export function registerHostTools(server: McpServer, runtime: SheethostRuntime): void {
  const { session, guardian, logger } = runtime;

  server.tool("host_status", HOST_STATUS_TOOL_DESCRIPTION, {}, async () =>
    respond(logger, "host_status", async () => {
      const data = await statusData(runtime);
      const summary = data.running
        ? `Host running (${data.attach_mode ? "attached" : "launched"}), ${data.document_count} document(s) tracked`
        : "Host not running";
      return ok(summary, data);
    })
  );

  server.tool("host_start", HOST_START_TOOL_DESCRIPTION, {}, async () =>
    respond(logger, "host_start", async () => {
      await session.start();
      const data = await statusData(runtime);
      return ok(data.attach_mode ? "Attached to running host" : "Launched host instance", data);
    })
  );

  server.tool(
    "host_stop",
    HOST_STOP_TOOL_DESCRIPTION,
    {
      force_quit: z.boolean().default(false).describe("Quit the host even when it was already running before"),
    },
    async ({ force_quit }) =>
      respond(logger, "host_stop", async () => {
        const failures = await session.stop(force_quit);
        const summary =
          failures.length === 0 ? "Session stopped" : `Session stopped with ${failures.length} failed step(s)`;
        return ok(summary, { soft_failures: formatSoftFailures(failures) });
      })
  );

  server.tool(
    "host_cleanup",
    HOST_CLEANUP_TOOL_DESCRIPTION,
    {
      force: z.boolean().default(false).describe("Must be true to run the cleanup"),
    },
    async ({ force }) =>
      respond(logger, "host_cleanup", async () => {
        if (!force) {
          return fail(new RangeError("host_cleanup terminates processes; call again with force=true"));
        }

        const report = await guardian.forceCleanupAll();
        const killed = report.terminatedPids.length + report.sweptPids.length;
        return ok(`Cleanup finished, ${killed} process(es) terminated`, {
          stopped_sessions: report.stoppedSessions,
          terminated_pids: report.terminatedPids,
          swept_pids: report.sweptPids,
          soft_failures: formatSoftFailures(report.failures),
        });
      })
  );
}
