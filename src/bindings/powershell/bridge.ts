import { spawn } from "child_process";
import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import type { Logger } from "pino";
import { z } from "zod";
import { BRIDGE_SHUTDOWN_TIMEOUT_MS } from "./config";

// The slice of a child process the bridge talks to.
export interface BridgeProcess {
  readonly pid: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  kill(): void;
  // Called once, on exit or on a spawn failure.
  onExit(listener: (code: number | null, error?: Error) => void): void;
}

export type SpawnBridgeProcess = (command: string, args: string[]) => BridgeProcess;

export interface ScriptBridgeOptions {
  command: string;
  args: string[];
  callTimeoutMs: number;
  spawnProcess?: SpawnBridgeProcess;
  shutdownTimeoutMs?: number;
  logger?: Logger;
}

const responseSchema = z.discriminatedUnion("ok", [
  z.object({ id: z.number().int(), ok: z.literal(true), result: z.unknown() }),
  z.object({ id: z.number().int(), ok: z.literal(false), error: z.string() }),
]);

interface PendingCall {
  op: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export function spawnChildProcess(command: string, args: string[]): BridgeProcess {
  const child = spawn(command, args, { windowsHide: true });

  return {
    pid: child.pid,
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    kill: () => {
      child.kill();
    },
    onExit: (listener) => {
      let reported = false;
      child.once("error", (error) => {
        if (!reported) {
          reported = true;
          listener(null, error);
        }
      });
      child.once("exit", (code) => {
        if (!reported) {
          reported = true;
          listener(code);
        }
      });
    },
  };
}

// Request/response channel to a long-lived script process. One JSON object
// per line in each direction; responses are matched to calls by id.
export class ScriptBridge {
  private child: BridgeProcess | null = null;
  private exited: Promise<void> = Promise.resolve();
  private readonly pending = new Map<number, PendingCall>();
  private nextId = 1;

  private readonly spawnProcess: SpawnBridgeProcess;
  private readonly shutdownTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(private readonly options: ScriptBridgeOptions) {
    this.spawnProcess = options.spawnProcess ?? spawnChildProcess;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? BRIDGE_SHUTDOWN_TIMEOUT_MS;
    this.logger = options.logger?.child({ component: "bridge" });
  }

  get running(): boolean {
    return this.child !== null;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get pendingCalls(): number {
    return this.pending.size;
  }

  // Returns false when the process was already running.
  start(): boolean {
    if (this.child) {
      return false;
    }

    const child = this.spawnProcess(this.options.command, this.options.args);
    this.child = child;

    const lines = createInterface({ input: child.stdout });
    lines.on("line", (line) => this.handleLine(line));

    if (child.stderr) {
      const errors = createInterface({ input: child.stderr });
      errors.on("line", (line) => this.logger?.debug({ stderr: line }, "bridge stderr"));
    }

    this.exited = new Promise<void>((resolve) => {
      child.onExit((code, error) => {
        lines.close();
        this.handleExit(child, code, error);
        resolve();
      });
    });

    this.logger?.info({ pid: child.pid }, "bridge started");
    return true;
  }

  call(op: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const child = this.child;
    if (!child) {
      return Promise.reject(new Error(`bridge is not running (op ${op})`));
    }

    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`bridge call ${op} timed out after ${this.options.callTimeoutMs}ms`));
      }, this.options.callTimeoutMs);
      timer.unref();

      this.pending.set(id, { op, resolve, reject, timer });
      child.stdin.write(`${JSON.stringify({ id, op, args })}\n`);
    });
  }

  // Closes stdin so the script's read loop ends, then kills it if it lingers.
  async stop(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }

    if (this.pendingCalls > 0) {
      this.logger?.warn({ pending: this.pendingCalls }, "stopping bridge with calls in flight");
    }
    child.stdin.end();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.shutdownTimeoutMs);
      timer.unref();
    });
    const lingered = await Promise.race([this.exited.then(() => false), timedOut]);
    clearTimeout(timer);

    if (lingered && this.child === child) {
      this.logger?.warn({ pid: child.pid }, "bridge did not exit, killing it");
      child.kill();
      await this.exited;
    }
  }

  private handleLine(line: string): void {
    if (!line.trim()) {
      return;
    }

    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (error) {
      this.logger?.warn({ line, err: error }, "bridge wrote a non-JSON line");
      return;
    }

    const parsed = responseSchema.safeParse(message);
    if (!parsed.success) {
      this.logger?.warn({ line }, "bridge wrote an unexpected message");
      return;
    }

    const response = parsed.data;
    const call = this.pending.get(response.id);
    if (!call) {
      this.logger?.debug({ id: response.id }, "response for a call that already settled");
      return;
    }

    this.pending.delete(response.id);
    clearTimeout(call.timer);

    if (response.ok) {
      call.resolve(response.result);
    } else {
      call.reject(new Error(response.error));
    }
  }

  private handleExit(child: BridgeProcess, code: number | null, error?: Error): void {
    if (this.child === child) {
      this.child = null;
    }

    const reason = error ? `bridge failed: ${error.message}` : `bridge exited with code ${code ?? "null"}`;
    for (const [id, call] of this.pending) {
      clearTimeout(call.timer);
      call.reject(new Error(`${reason} (op ${call.op})`));
      this.pending.delete(id);
    }

    if (error) {
      this.logger?.error({ err: error }, "bridge process failed");
    } else {
      this.logger?.info({ code }, "bridge exited");
    }
  }
}
