import type {
  ApplicationHandle,
  DocumentHandle,
  HostHandle,
  RangeHandle,
  SheetHandle,
} from "./handles";

// ============================================================================
// Platform binding
// ============================================================================

// Cell payloads exchanged with the host. Dates arrive as ISO strings.
export type CellValue = string | number | boolean | null;

// A document the host reports as open.
export interface OpenDocumentInfo {
  handle: DocumentHandle;
  name: string;
  // Empty for documents that were never saved to disk.
  fullName: string;
  saved: boolean;
}

export interface ScrollPosition {
  row: number;
  column: number;
}

// Process-level entry points: thread affinity and attach-or-create.
export interface ApplicationBinding {
  // Name of the host executable as it appears in process listings.
  readonly executableName: string;

  // Returns true when this call performed the initialization (and so owns the teardown).
  initializeThread(): Promise<boolean>;
  uninitializeThread(): Promise<void>;

  // Rejects when no host instance is running.
  attach(): Promise<ApplicationHandle>;
  create(): Promise<ApplicationHandle>;

  setVisible(app: ApplicationHandle, visible: boolean): Promise<void>;
  setDisplayAlerts(app: ApplicationHandle, displayAlerts: boolean): Promise<void>;
  quit(app: ApplicationHandle): Promise<void>;

  // Drop the binding's reference to a handle.
  release(handle: HostHandle): Promise<void>;
  // Flush lingering references that keep the host alive.
  collectGarbage(): Promise<void>;
}

export interface CreateDocumentOptions {
  sheetNames?: string[];
}

export interface DocumentBinding {
  documentCount(app: ApplicationHandle): Promise<number>;
  listDocuments(app: ApplicationHandle): Promise<OpenDocumentInfo[]>;
  openDocument(app: ApplicationHandle, path: string, options: { readOnly: boolean }): Promise<DocumentHandle>;
  createDocument(app: ApplicationHandle, path: string, options?: CreateDocumentOptions): Promise<DocumentHandle>;
  // Doubles as the liveness probe for a cached document handle.
  documentFullName(doc: DocumentHandle): Promise<string>;
  saveDocument(doc: DocumentHandle, saveAsPath?: string): Promise<void>;
  closeDocument(doc: DocumentHandle, options: { saveChanges: boolean }): Promise<void>;
}

export interface ViewBinding {
  activeDocument(app: ApplicationHandle): Promise<DocumentHandle | null>;
  activeSheet(app: ApplicationHandle): Promise<SheetHandle | null>;
  selection(app: ApplicationHandle): Promise<RangeHandle | null>;
  activeCell(app: ApplicationHandle): Promise<RangeHandle | null>;
  scrollPosition(app: ApplicationHandle): Promise<ScrollPosition | null>;

  // Rejects when the object behind the handle is gone.
  handleName(handle: DocumentHandle | SheetHandle): Promise<string>;
  activate(handle: DocumentHandle | SheetHandle): Promise<void>;
  setScrollRow(app: ApplicationHandle, row: number): Promise<void>;
  setScrollColumn(app: ApplicationHandle, column: number): Promise<void>;
}

export interface RangeBinding {
  listSheets(doc: DocumentHandle): Promise<string[]>;
  getSheet(doc: DocumentHandle, name: string): Promise<SheetHandle>;
  readRange(sheet: SheetHandle, address: string): Promise<CellValue[][]>;
  writeRange(sheet: SheetHandle, address: string, values: CellValue[][]): Promise<void>;
}

export interface HostBinding extends ApplicationBinding, DocumentBinding, ViewBinding, RangeBinding {}

// ============================================================================
// Session
// ============================================================================

// Registry record for one document the session knows about.
export interface DocumentEntry {
  // Normalized absolute path, original spelling.
  path: string;
  handle: DocumentHandle;
  // True when this session opened the document and must close it.
  owned: boolean;
  readOnly: boolean;
  // Held open across calls by an explicit lease; scoped operations leave it open.
  held: boolean;
}

export interface LeaseOptions {
  readOnly?: boolean;
  // Create the document when the path does not exist yet.
  create?: boolean;
  sheetNames?: string[];
}

export interface ReleaseOptions {
  save?: boolean;
  force?: boolean;
}

export interface WithDocumentOptions extends LeaseOptions {
  // Save changes when the lease is released.
  save?: boolean;
  // Wrap the operation in view-state preservation.
  mutate?: boolean;
}

export interface HostStatus {
  running: boolean;
  attachMode: boolean;
  documentCount: number;
  openPaths: string[];
}

export interface UnsavedDocument {
  name: string;
  path: string | null;
}

export interface SaveAllReport {
  saved: number;
  errors: string[];
}

// Step that failed during a best-effort procedure.
export interface SoftFailure {
  step: string;
  message: string;
}
