import type { Logger } from "pino";
import { describeError } from "./errors";
import type { SoftFailure } from "./types";

// Run one best-effort step. Failures are recorded and logged, never thrown.
export async function attemptStep(
  failures: SoftFailure[],
  step: string,
  run: () => Promise<void> | void,
  logger?: Logger
): Promise<boolean> {
  try {
    await run();
    return true;
  } catch (error) {
    const failure: SoftFailure = { step, message: describeError(error) };
    failures.push(failure);
    logger?.warn({ step, err: error }, "best-effort step failed");
    return false;
  }
}

// Synchronous variant for process-exit handlers, where nothing can be awaited.
export function attemptStepSync(
  failures: SoftFailure[],
  step: string,
  run: () => void,
  logger?: Logger
): boolean {
  try {
    run();
    return true;
  } catch (error) {
    failures.push({ step, message: describeError(error) });
    logger?.warn({ step, err: error }, "best-effort step failed");
    return false;
  }
}

export function formatSoftFailures(failures: SoftFailure[]): string[] {
  return failures.map((failure) => `${failure.step}: ${failure.message}`);
}
