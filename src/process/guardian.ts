import type { Logger } from "pino";
import { ReentrantLock } from "../host/lock";
import { attemptStep, attemptStepSync } from "../host/soft-failures";
import type { SoftFailure } from "../host/types";
import { DEFAULT_HOST_EXECUTABLE, GRACEFUL_STOP_TIMEOUT_MS, REFERENCE_RELEASE_PASSES } from "./config";
import { createProcessLister } from "./list";
import { createProcessTerminators, terminateProcessTree } from "./terminate";
import type { CleanupReport, ProcessLister, ProcessTerminator, StoppableSession } from "./types";

export interface ProcessGuardianOptions {
  executableName?: string;
  lister?: ProcessLister;
  terminators?: ProcessTerminator[];
  // Pid whose direct host children are swept in the last cleanup stage.
  currentPid?: number;
  gracefulStopTimeoutMs?: number;
  referenceReleasePasses?: number;
  logger?: Logger;
}

export interface FreshInstanceResult<T> {
  result: T;
  trackedPids: number[];
}

type ReferenceReleaser = () => Promise<void> | void;

// The part of `process` the exit hooks attach to.
export interface ExitHookTarget {
  on(event: "exit", listener: () => void): unknown;
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: "exit", listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  exit(code: number): void;
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    timer.unref();

    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

// Process-level safety net. Tracks the pids of host instances this program
// created and tears them down without relying on a (possibly dead) handle.
export class ProcessGuardian {
  readonly executableName: string;

  private readonly lister: ProcessLister;
  private readonly terminators: ProcessTerminator[];
  private readonly currentPid: number;
  private readonly gracefulStopTimeoutMs: number;
  private readonly referenceReleasePasses: number;
  private readonly logger?: Logger;

  private readonly tracked = new Set<number>();
  private readonly trackingLock = new ReentrantLock("tracked-processes");
  private readonly sessions = new Set<StoppableSession>();
  private readonly releasers = new Set<ReferenceReleaser>();
  private disposeExitHooks: (() => void) | null = null;

  constructor(options: ProcessGuardianOptions = {}) {
    this.executableName = options.executableName ?? DEFAULT_HOST_EXECUTABLE;
    this.lister = options.lister ?? createProcessLister();
    this.terminators = options.terminators ?? createProcessTerminators();
    this.currentPid = options.currentPid ?? process.pid;
    this.gracefulStopTimeoutMs = options.gracefulStopTimeoutMs ?? GRACEFUL_STOP_TIMEOUT_MS;
    this.referenceReleasePasses = options.referenceReleasePasses ?? REFERENCE_RELEASE_PASSES;
    this.logger = options.logger?.child({ component: "guardian" });
  }

  // ==========================================================================
  // Tracking
  // ==========================================================================

  trackedPids(): number[] {
    return [...this.tracked].sort((a, b) => a - b);
  }

  // Pids of every running host process. Empty when no listing strategy works.
  snapshotHostPids(): Set<number> {
    try {
      return new Set(this.lister.list(this.executableName).map((row) => row.pid));
    } catch (error) {
      this.logger?.warn({ err: error }, "host process listing failed");
      return new Set();
    }
  }

  // Wraps a fresh-create call and records the pids that appeared across it.
  // Serialized so two concurrent creates never attribute each other's pids.
  trackFreshInstance<T>(create: () => Promise<T>): Promise<FreshInstanceResult<T>> {
    return this.trackingLock.run(async () => {
      const before = this.snapshotHostPids();
      const result = await create();
      const after = this.snapshotHostPids();

      const trackedPids = [...after].filter((pid) => !before.has(pid));
      for (const pid of trackedPids) {
        this.tracked.add(pid);
      }

      this.logger?.info({ pids: trackedPids }, "tracking fresh host instance");
      return { result, trackedPids };
    });
  }

  registerSession(session: StoppableSession): void {
    this.sessions.add(session);
  }

  unregisterSession(session: StoppableSession): void {
    this.sessions.delete(session);
  }

  addReferenceReleaser(releaser: ReferenceReleaser): () => void {
    this.releasers.add(releaser);
    return () => {
      this.releasers.delete(releaser);
    };
  }

  // ==========================================================================
  // Cleanup
  // ==========================================================================

  // Full escalation chain. Every stage runs regardless of the one before it.
  async forceCleanupAll(): Promise<CleanupReport> {
    const failures: SoftFailure[] = [];
    let stoppedSessions = 0;

    // 1. Graceful stop of every known session.
    for (const session of [...this.sessions]) {
      const stopped = await attemptStep(
        failures,
        `stop session ${session.label}`,
        async () => {
          const stopFailures = await withTimeout(session.stop(false), this.gracefulStopTimeoutMs, `stop ${session.label}`);
          failures.push(...stopFailures);
        },
        this.logger
      );
      if (stopped) {
        stoppedSessions++;
      }
    }

    // 2. Release passes for references that keep the host from exiting.
    for (let pass = 0; pass < this.referenceReleasePasses; pass++) {
      for (const releaser of [...this.releasers]) {
        await attemptStep(failures, `release references (pass ${pass + 1})`, releaser, this.logger);
      }
    }

    // 3 and 4 need no handle and are shared with the exit hook.
    const { terminatedPids, sweptPids } = this.terminateProcesses(failures);

    const report: CleanupReport = { stoppedSessions, terminatedPids, sweptPids, failures };
    this.logger?.info(
      { stoppedSessions, terminatedPids, sweptPids, failureCount: failures.length },
      "forced cleanup finished"
    );
    return report;
  }

  // Stages 3 and 4 only; safe inside a process `exit` handler.
  forceCleanupSync(): CleanupReport {
    const failures: SoftFailure[] = [];
    const { terminatedPids, sweptPids } = this.terminateProcesses(failures);
    return { stoppedSessions: 0, terminatedPids, sweptPids, failures };
  }

  private terminateProcesses(failures: SoftFailure[]): { terminatedPids: number[]; sweptPids: number[] } {
    const terminatedPids: number[] = [];
    const sweptPids: number[] = [];

    // 3. Tracked pids, as whole trees.
    const pids = this.trackedPids();
    this.tracked.clear();

    for (const pid of pids) {
      attemptStepSync(
        failures,
        `terminate tracked pid ${pid}`,
        () => {
          const strategy = terminateProcessTree(pid, this.terminators);
          if (!strategy) {
            throw new Error("no termination strategy succeeded");
          }
          terminatedPids.push(pid);
        },
        this.logger
      );
    }

    // 4. Host processes parented by this program that tracking missed.
    attemptStepSync(
      failures,
      "sweep child host processes",
      () => {
        const orphans = this.lister
          .list(this.executableName)
          .filter((row) => row.parentPid === this.currentPid && !terminatedPids.includes(row.pid));

        for (const row of orphans) {
          if (terminateProcessTree(row.pid, this.terminators)) {
            sweptPids.push(row.pid);
          } else {
            failures.push({ step: `sweep pid ${row.pid}`, message: "no termination strategy succeeded" });
          }
        }
      },
      this.logger
    );

    return { terminatedPids, sweptPids };
  }

  // ==========================================================================
  // Process exit
  // ==========================================================================

  // Last-resort cleanup on normal exit and on SIGINT/SIGTERM. Idempotent;
  // the returned function removes the handlers again.
  registerExitHooks(target: ExitHookTarget = process): () => void {
    if (this.disposeExitHooks) {
      return this.disposeExitHooks;
    }

    const onExit = (): void => {
      this.forceCleanupSync();
    };

    const onSignal = (signal: NodeJS.Signals): void => {
      const exitCode = signal === "SIGINT" ? 130 : 143;
      this.forceCleanupAll().then(
        () => target.exit(exitCode),
        (error: unknown) => {
          this.logger?.error({ err: error }, "cleanup on signal failed");
          target.exit(exitCode);
        }
      );
    };

    target.on("exit", onExit);
    target.once("SIGINT", onSignal);
    target.once("SIGTERM", onSignal);

    const dispose = (): void => {
      target.off("exit", onExit);
      target.off("SIGINT", onSignal);
      target.off("SIGTERM", onSignal);
      this.disposeExitHooks = null;
    };

    this.disposeExitHooks = dispose;
    return dispose;
  }
}
