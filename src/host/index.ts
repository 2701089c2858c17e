export * from "./errors";
export * from "./handles";
export * from "./types";
export { DocumentRegistry } from "./registry";
export { ReentrantLock } from "./lock";
export { ViewStatePreserver, preserveViewState, type ViewSnapshot } from "./view-state";
export { HostSession, type HostSessionOptions, type DocumentOperation } from "./session";
export { listSheets, readRange, writeRange } from "./operations";
export { loadHostConfig, type HostConfig } from "./config";
export { normalizeDocumentPath } from "./paths";
export { attemptStep, formatSoftFailures } from "./soft-failures";
export { ProcessGuardian, type ProcessGuardianOptions } from "../process/guardian";
export type { CleanupReport, ProcessRow } from "../process/types";
