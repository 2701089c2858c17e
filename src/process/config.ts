// Executable name of the spreadsheet host as reported by process listings.
export const DEFAULT_HOST_EXECUTABLE = "EXCEL.EXE";

// Upper bound for a single process listing utility call.
export const PROCESS_LIST_TIMEOUT_MS = 10_000;

// Upper bound for one `taskkill` invocation.
export const TASKKILL_TIMEOUT_MS = 10_000;

// How long cleanup waits for each session's graceful stop before moving on.
export const GRACEFUL_STOP_TIMEOUT_MS = 15_000;

// Rounds of reference release run between graceful stop and forced termination.
export const REFERENCE_RELEASE_PASSES = 5;

// Large listings (busy terminal servers) still fit in one read.
export const PROCESS_LIST_MAX_BUFFER_BYTES = 8 * 1024 * 1024;
