import { spawnSync } from "child_process";
import { PROCESS_LIST_MAX_BUFFER_BYTES } from "./config";
import type { CommandResult, CommandRunner } from "./types";

// Default runner for OS utilities. Synchronous so it also works from `exit` handlers.
export const runCommandSync: CommandRunner = (command, args, timeoutMs): CommandResult => {
  const result = spawnSync(command, args, {
    encoding: "utf-8",
    timeout: timeoutMs,
    windowsHide: true,
    maxBuffer: PROCESS_LIST_MAX_BUFFER_BYTES,
    stdio: ["ignore", "pipe", "ignore"],
  });

  return {
    status: result.status,
    stdout: result.stdout ?? "",
    error: result.error,
  };
};

export function assertCommandSucceeded(command: string, result: CommandResult): void {
  if (result.error) {
    throw new Error(`${command} failed: ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new Error(`${command} exited with code ${result.status ?? "null"}`);
  }
}
