import { createProcessLister } from "../../process/list";
import type { ProcessLister } from "../../process/types";
import type { ProcessCommandOptions } from "../types";

export interface HostProcessStatus {
  executable: string;
  running: boolean;
  pids: number[];
}

export function collectHostStatus(executable: string, lister: ProcessLister = createProcessLister()): HostProcessStatus {
  const pids = lister
    .list(executable)
    .map((row) => row.pid)
    .sort((a, b) => a - b);
  return { executable, running: pids.length > 0, pids };
}

export function formatHostStatus(status: HostProcessStatus): string {
  if (!status.running) {
    return `${status.executable} is not running`;
  }
  const noun = status.pids.length === 1 ? "process" : "processes";
  return `${status.executable} is running (${status.pids.length} ${noun}: ${status.pids.join(", ")})`;
}

export function runStatusCommand(executable: string, options: ProcessCommandOptions): void {
  const status = collectHostStatus(executable);
  console.log(options.json ? JSON.stringify(status, null, 2) : formatHostStatus(status));
}
