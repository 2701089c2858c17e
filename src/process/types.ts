import type { SoftFailure } from "../host/types";

// One row of an OS process listing, filtered to the host executable.
export interface ProcessRow {
  pid: number;
  // Null when the listing strategy cannot report parents.
  parentPid: number | null;
  name: string;
}

export interface ProcessLister {
  readonly name: string;
  // Throws when the underlying facility is unavailable, so callers can fall back.
  list(executableName: string): ProcessRow[];
}

export interface ProcessTerminator {
  readonly name: string;
  // True when the strategy believes the process (and its tree) is gone.
  terminate(pid: number): boolean;
}

// Result of running an external utility synchronously.
export interface CommandResult {
  status: number | null;
  stdout: string;
  error?: Error;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => CommandResult;

export type KillFn = (pid: number, signal?: string | number) => boolean;

// Anything the guardian can stop gracefully during cleanup.
export interface StoppableSession {
  readonly label: string;
  stop(forceQuit?: boolean): Promise<SoftFailure[]>;
}

export interface CleanupReport {
  stoppedSessions: number;
  terminatedPids: number[];
  sweptPids: number[];
  failures: SoftFailure[];
}
