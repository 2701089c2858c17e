import { TASKKILL_TIMEOUT_MS } from "./config";
import { runCommandSync } from "./run";
import type { CommandRunner, KillFn, ProcessTerminator } from "./types";

const defaultKill: KillFn = (pid, signal) => process.kill(pid, signal);

export function buildTaskkillArgs(pid: number): string[] {
  return ["/PID", String(pid), "/T", "/F"];
}

// Windows: `/T` takes the helper processes the host spawned down with it.
export class TaskkillTerminator implements ProcessTerminator {
  readonly name = "taskkill";

  constructor(
    private readonly run: CommandRunner = runCommandSync,
    private readonly timeoutMs: number = TASKKILL_TIMEOUT_MS
  ) {}

  terminate(pid: number): boolean {
    const result = this.run("taskkill", buildTaskkillArgs(pid), this.timeoutMs);
    return !result.error && result.status === 0;
  }
}

// POSIX: signal the whole process group led by `pid`.
export class ProcessGroupTerminator implements ProcessTerminator {
  readonly name = "process-group";

  constructor(private readonly kill: KillFn = defaultKill) {}

  terminate(pid: number): boolean {
    try {
      this.kill(-pid, "SIGKILL");
      return true;
    } catch {
      return false;
    }
  }
}

// Last resort on every platform: the root pid only.
export class SingleProcessTerminator implements ProcessTerminator {
  readonly name = "single-process";

  constructor(private readonly kill: KillFn = defaultKill) {}

  terminate(pid: number): boolean {
    try {
      this.kill(pid, "SIGKILL");
      return true;
    } catch {
      return false;
    }
  }
}

export interface TerminatorDeps {
  run?: CommandRunner;
  kill?: KillFn;
}

export function createProcessTerminators(
  platform: NodeJS.Platform = process.platform,
  deps: TerminatorDeps = {}
): ProcessTerminator[] {
  if (platform === "win32") {
    return [new TaskkillTerminator(deps.run), new SingleProcessTerminator(deps.kill)];
  }

  return [new ProcessGroupTerminator(deps.kill), new SingleProcessTerminator(deps.kill)];
}

// Returns the name of the strategy that succeeded, or null when none did.
export function terminateProcessTree(pid: number, terminators: ProcessTerminator[]): string | null {
  if (!Number.isInteger(pid) || pid <= 0) {
    return null;
  }

  for (const terminator of terminators) {
    if (terminator.terminate(pid)) {
      return terminator.name;
    }
  }

  return null;
}
