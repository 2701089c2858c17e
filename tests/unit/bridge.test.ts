import { describe, expect, it, vi } from "vitest";
import { ScriptBridge, type SpawnBridgeProcess } from "../../src/bindings/powershell/bridge";
import { FakeBridgeProcess, type BridgeResponder } from "../helpers/fake-bridge-process";

function setup(responder?: BridgeResponder, options: { callTimeoutMs?: number; shutdownTimeoutMs?: number } = {}) {
  const processes: FakeBridgeProcess[] = [];
  const spawnProcess = vi.fn<SpawnBridgeProcess>(() => {
    const child = new FakeBridgeProcess(responder);
    processes.push(child);
    return child;
  });
  const bridge = new ScriptBridge({
    command: "powershell.exe",
    args: ["-File", "bridge.ps1"],
    callTimeoutMs: options.callTimeoutMs ?? 1_000,
    shutdownTimeoutMs: options.shutdownTimeoutMs,
    spawnProcess,
  });
  return { bridge, processes, spawnProcess };
}

describe("ScriptBridge", () => {
  it("spawns the script once", () => {
    const { bridge, spawnProcess } = setup();

    expect(bridge.start()).toBe(true);
    expect(bridge.start()).toBe(false);
    expect(spawnProcess).toHaveBeenCalledTimes(1);
    expect(spawnProcess).toHaveBeenCalledWith("powershell.exe", ["-File", "bridge.ps1"]);
    expect(bridge.pid).toBe(4242);
  });

  it("sends one JSON request per line", async () => {
    const { bridge, processes } = setup(() => ({ ok: true, result: "h1" }));
    bridge.start();

    await expect(bridge.call("openDocument", { path: "/work/a.xlsx", readOnly: false })).resolves.toBe("h1");

    expect(processes[0].requests).toEqual([
      { id: 1, op: "openDocument", args: { path: "/work/a.xlsx", readOnly: false } },
    ]);
  });

  it("matches responses to calls by id", async () => {
    const { bridge, processes } = setup();
    bridge.start();

    const first = bridge.call("documentCount");
    const second = bridge.call("listSheets");
    processes[0].reply({ id: 2, ok: true, result: ["Sheet1"] });
    processes[0].reply({ id: 1, ok: true, result: 3 });

    await expect(first).resolves.toBe(3);
    await expect(second).resolves.toEqual(["Sheet1"]);
    expect(bridge.pendingCalls).toBe(0);
  });

  it("rejects with the script's error message", async () => {
    const { bridge } = setup(() => ({ ok: false, error: "unknown handle h9" }));
    bridge.start();

    await expect(bridge.call("activate", { ref: "h9" })).rejects.toThrow("unknown handle h9");
  });

  it("skips lines that are not responses", async () => {
    const { bridge, processes } = setup();
    bridge.start();

    const pending = bridge.call("attach");
    processes[0].stdout.write("WARNING: module auto-loading is disabled\n");
    processes[0].reply({ id: 99, ok: true, result: "stray" });
    processes[0].reply({ hello: "world" });
    processes[0].reply({ id: 1, ok: true, result: "h1" });

    await expect(pending).resolves.toBe("h1");
  });

  it("times out a call the script never answers", async () => {
    const { bridge } = setup(undefined, { callTimeoutMs: 20 });
    bridge.start();

    await expect(bridge.call("quit")).rejects.toThrow("bridge call quit timed out after 20ms");
    expect(bridge.pendingCalls).toBe(0);
  });

  it("rejects every pending call when the script exits", async () => {
    const { bridge, processes } = setup();
    bridge.start();

    const first = bridge.call("attach");
    const second = bridge.call("create");
    processes[0].exit(1);

    await Promise.all([
      expect(first).rejects.toThrow("bridge exited with code 1 (op attach)"),
      expect(second).rejects.toThrow("bridge exited with code 1 (op create)"),
    ]);
    expect(bridge.running).toBe(false);
  });

  it("reports a spawn failure on pending calls", async () => {
    const { bridge, processes } = setup();
    bridge.start();

    const pending = bridge.call("attach");
    processes[0].exit(null, new Error("spawn powershell.exe ENOENT"));

    await expect(pending).rejects.toThrow("bridge failed: spawn powershell.exe ENOENT (op attach)");
  });

  it("refuses calls while not running", async () => {
    const { bridge } = setup();

    await expect(bridge.call("attach")).rejects.toThrow("bridge is not running (op attach)");
  });

  it("stops by closing stdin", async () => {
    const { bridge, processes } = setup();
    bridge.start();

    await bridge.stop();

    expect(bridge.running).toBe(false);
    expect(processes[0].killed).toBe(false);
  });

  it("kills a script that ignores the end of its input", async () => {
    const { bridge, processes } = setup(undefined, { shutdownTimeoutMs: 10 });
    bridge.start();
    processes[0].exitOnStdinEnd = false;

    await bridge.stop();

    expect(processes[0].killed).toBe(true);
    expect(bridge.running).toBe(false);
  });

  it("can be started again after it exited", () => {
    const { bridge, processes, spawnProcess } = setup();
    bridge.start();
    processes[0].exit(0);

    expect(bridge.start()).toBe(true);
    expect(spawnProcess).toHaveBeenCalledTimes(2);
  });
});
