import { describe, expect, it, vi } from "vitest";
import {
  ProcessGroupTerminator,
  SingleProcessTerminator,
  TaskkillTerminator,
  buildTaskkillArgs,
  createProcessTerminators,
  terminateProcessTree,
} from "../../src/process/terminate";
import type { CommandRunner, KillFn, ProcessTerminator } from "../../src/process/types";

function terminator(name: string, succeeds: boolean): ProcessTerminator {
  return { name, terminate: vi.fn(() => succeeds) };
}

describe("process terminators", () => {
  it("kills the whole tree with taskkill", () => {
    const run = vi.fn<CommandRunner>(() => ({ status: 0, stdout: "" }));

    expect(new TaskkillTerminator(run, 500).terminate(4410)).toBe(true);
    expect(run).toHaveBeenCalledWith("taskkill", ["/PID", "4410", "/T", "/F"], 500);
    expect(buildTaskkillArgs(12)).toEqual(["/PID", "12", "/T", "/F"]);
  });

  it("reports taskkill failure through the exit status", () => {
    const run = vi.fn<CommandRunner>(() => ({ status: 128, stdout: "" }));

    expect(new TaskkillTerminator(run).terminate(4410)).toBe(false);
  });

  it("signals the process group, then a single pid", () => {
    const kill = vi.fn<KillFn>(() => true);

    expect(new ProcessGroupTerminator(kill).terminate(710)).toBe(true);
    expect(new SingleProcessTerminator(kill).terminate(710)).toBe(true);
    expect(kill.mock.calls).toEqual([
      [-710, "SIGKILL"],
      [710, "SIGKILL"],
    ]);
  });

  it("returns false when the signal cannot be delivered", () => {
    const kill = vi.fn<KillFn>(() => {
      throw new Error("ESRCH");
    });

    expect(new ProcessGroupTerminator(kill).terminate(710)).toBe(false);
    expect(new SingleProcessTerminator(kill).terminate(710)).toBe(false);
  });

  it("ranks strategies per platform", () => {
    expect(createProcessTerminators("win32").map((strategy) => strategy.name)).toEqual([
      "taskkill",
      "single-process",
    ]);
    expect(createProcessTerminators("darwin").map((strategy) => strategy.name)).toEqual([
      "process-group",
      "single-process",
    ]);
  });
});

describe("terminateProcessTree", () => {
  it("stops at the first strategy that succeeds", () => {
    const first = terminator("first", false);
    const second = terminator("second", true);
    const third = terminator("third", true);

    expect(terminateProcessTree(42, [first, second, third])).toBe("second");
    expect(third.terminate).not.toHaveBeenCalled();
  });

  it("returns null when every strategy fails", () => {
    expect(terminateProcessTree(42, [terminator("only", false)])).toBeNull();
  });

  it("refuses pids that would signal a group or this process table", () => {
    const strategy = terminator("any", true);

    expect(terminateProcessTree(0, [strategy])).toBeNull();
    expect(terminateProcessTree(-5, [strategy])).toBeNull();
    expect(terminateProcessTree(1.5, [strategy])).toBeNull();
    expect(strategy.terminate).not.toHaveBeenCalled();
  });
});
