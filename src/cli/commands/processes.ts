import { createProcessLister } from "../../process/list";
import type { ProcessLister, ProcessRow } from "../../process/types";
import type { ProcessCommandOptions } from "../types";

export interface ProcessReport {
  executable: string;
  strategy: string;
  processes: ProcessRow[];
}

export function collectProcessReport(
  executable: string,
  lister: ProcessLister = createProcessLister()
): ProcessReport {
  const processes = [...lister.list(executable)].sort((a, b) => a.pid - b.pid);
  return { executable, strategy: lister.name, processes };
}

export function formatProcessTable(report: ProcessReport): string {
  if (report.processes.length === 0) {
    return `No ${report.executable} processes found (via ${report.strategy})`;
  }

  const lines = [`${"PID".padEnd(8)}${"PARENT".padEnd(8)}NAME`];
  for (const row of report.processes) {
    const parent = row.parentPid === null ? "-" : String(row.parentPid);
    lines.push(`${String(row.pid).padEnd(8)}${parent.padEnd(8)}${row.name}`);
  }
  return lines.join("\n");
}

export function runProcessesCommand(executable: string, options: ProcessCommandOptions): void {
  const report = collectProcessReport(executable);
  console.log(options.json ? JSON.stringify(report, null, 2) : formatProcessTable(report));
}
