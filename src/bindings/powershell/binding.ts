import type { Logger } from "pino";
import { z } from "zod";
import { DEFAULT_CALL_TIMEOUT_MS, DEFAULT_POWERSHELL_EXECUTABLE } from "../../host/config";
import {
  HostHandle,
  type ApplicationHandle,
  type DocumentHandle,
  type RangeHandle,
  type SheetHandle,
} from "../../host/handles";
import type {
  CellValue,
  CreateDocumentOptions,
  HostBinding,
  OpenDocumentInfo,
  ScrollPosition,
} from "../../host/types";
import { DEFAULT_HOST_EXECUTABLE } from "../../process/config";
import { ScriptBridge, type SpawnBridgeProcess } from "./bridge";
import { BRIDGE_SCRIPT_PATH, POWERSHELL_BRIDGE_ARGS } from "./config";

export interface PowerShellHostBindingOptions {
  executableName?: string;
  powershellPath?: string;
  scriptPath?: string;
  callTimeoutMs?: number;
  spawnProcess?: SpawnBridgeProcess;
  logger?: Logger;
}

const refSchema = z.string().min(1);
const optionalRefSchema = refSchema.nullable();
const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const matrixSchema = z.array(z.array(cellSchema));
const documentInfoSchema = z.object({
  ref: refSchema,
  name: z.string(),
  fullName: z.string(),
  saved: z.boolean(),
});
const scrollSchema = z.object({ row: z.number().int(), column: z.number().int() }).nullable();

// HostBinding over the PowerShell bridge script. Handle refs are the ids the
// script assigns to the objects it keeps alive; releasing a handle drops it
// from the script's table.
export class PowerShellHostBinding implements HostBinding {
  readonly executableName: string;
  readonly bridge: ScriptBridge;

  constructor(options: PowerShellHostBindingOptions = {}) {
    this.executableName = options.executableName ?? DEFAULT_HOST_EXECUTABLE;
    this.bridge = new ScriptBridge({
      command: options.powershellPath ?? DEFAULT_POWERSHELL_EXECUTABLE,
      args: [...POWERSHELL_BRIDGE_ARGS, options.scriptPath ?? BRIDGE_SCRIPT_PATH],
      callTimeoutMs: options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS,
      spawnProcess: options.spawnProcess,
      logger: options.logger,
    });
  }

  // ==========================================================================
  // Application
  // ==========================================================================

  // The bridge process owns the apartment every handle lives in, so starting
  // it is the thread initialization.
  async initializeThread(): Promise<boolean> {
    return this.bridge.start();
  }

  uninitializeThread(): Promise<void> {
    return this.bridge.stop();
  }

  async attach(): Promise<ApplicationHandle> {
    return new HostHandle("application", await this.request("attach", {}, refSchema));
  }

  async create(): Promise<ApplicationHandle> {
    return new HostHandle("application", await this.request("create", {}, refSchema));
  }

  async setVisible(app: ApplicationHandle, visible: boolean): Promise<void> {
    await this.bridge.call("setVisible", { app: app.ref, visible });
  }

  async setDisplayAlerts(app: ApplicationHandle, displayAlerts: boolean): Promise<void> {
    await this.bridge.call("setDisplayAlerts", { app: app.ref, displayAlerts });
  }

  async quit(app: ApplicationHandle): Promise<void> {
    await this.bridge.call("quit", { app: app.ref });
  }

  async release(handle: HostHandle): Promise<void> {
    await this.bridge.call("release", { ref: handle.ref });
  }

  async collectGarbage(): Promise<void> {
    if (this.bridge.running) {
      await this.bridge.call("collectGarbage");
    }
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  documentCount(app: ApplicationHandle): Promise<number> {
    return this.request("documentCount", { app: app.ref }, z.number().int().nonnegative());
  }

  async listDocuments(app: ApplicationHandle): Promise<OpenDocumentInfo[]> {
    const documents = await this.request("listDocuments", { app: app.ref }, z.array(documentInfoSchema));
    return documents.map((document) => ({
      handle: new HostHandle("document", document.ref),
      name: document.name,
      fullName: document.fullName,
      saved: document.saved,
    }));
  }

  async openDocument(app: ApplicationHandle, path: string, options: { readOnly: boolean }): Promise<DocumentHandle> {
    const ref = await this.request("openDocument", { app: app.ref, path, readOnly: options.readOnly }, refSchema);
    return new HostHandle("document", ref);
  }

  async createDocument(
    app: ApplicationHandle,
    path: string,
    options: CreateDocumentOptions = {}
  ): Promise<DocumentHandle> {
    const ref = await this.request(
      "createDocument",
      { app: app.ref, path, sheetNames: options.sheetNames ?? [] },
      refSchema
    );
    return new HostHandle("document", ref);
  }

  documentFullName(doc: DocumentHandle): Promise<string> {
    return this.request("documentFullName", { doc: doc.ref }, z.string());
  }

  async saveDocument(doc: DocumentHandle, saveAsPath?: string): Promise<void> {
    await this.bridge.call("saveDocument", { doc: doc.ref, saveAs: saveAsPath ?? null });
  }

  async closeDocument(doc: DocumentHandle, options: { saveChanges: boolean }): Promise<void> {
    await this.bridge.call("closeDocument", { doc: doc.ref, saveChanges: options.saveChanges });
  }

  // ==========================================================================
  // View
  // ==========================================================================

  async activeDocument(app: ApplicationHandle): Promise<DocumentHandle | null> {
    const ref = await this.request("activeDocument", { app: app.ref }, optionalRefSchema);
    return ref ? new HostHandle("document", ref) : null;
  }

  async activeSheet(app: ApplicationHandle): Promise<SheetHandle | null> {
    const ref = await this.request("activeSheet", { app: app.ref }, optionalRefSchema);
    return ref ? new HostHandle("sheet", ref) : null;
  }

  async selection(app: ApplicationHandle): Promise<RangeHandle | null> {
    const ref = await this.request("selection", { app: app.ref }, optionalRefSchema);
    return ref ? new HostHandle("range", ref) : null;
  }

  async activeCell(app: ApplicationHandle): Promise<RangeHandle | null> {
    const ref = await this.request("activeCell", { app: app.ref }, optionalRefSchema);
    return ref ? new HostHandle("range", ref) : null;
  }

  scrollPosition(app: ApplicationHandle): Promise<ScrollPosition | null> {
    return this.request("scrollPosition", { app: app.ref }, scrollSchema);
  }

  handleName(handle: DocumentHandle | SheetHandle): Promise<string> {
    return this.request("handleName", { ref: handle.ref }, z.string());
  }

  async activate(handle: DocumentHandle | SheetHandle): Promise<void> {
    await this.bridge.call("activate", { ref: handle.ref });
  }

  async setScrollRow(app: ApplicationHandle, row: number): Promise<void> {
    await this.bridge.call("setScrollRow", { app: app.ref, row });
  }

  async setScrollColumn(app: ApplicationHandle, column: number): Promise<void> {
    await this.bridge.call("setScrollColumn", { app: app.ref, column });
  }

  // ==========================================================================
  // Sheets and ranges
  // ==========================================================================

  listSheets(doc: DocumentHandle): Promise<string[]> {
    return this.request("listSheets", { doc: doc.ref }, z.array(z.string()));
  }

  async getSheet(doc: DocumentHandle, name: string): Promise<SheetHandle> {
    return new HostHandle("sheet", await this.request("getSheet", { doc: doc.ref, name }, refSchema));
  }

  readRange(sheet: SheetHandle, address: string): Promise<CellValue[][]> {
    return this.request("readRange", { sheet: sheet.ref, address }, matrixSchema);
  }

  async writeRange(sheet: SheetHandle, address: string, values: CellValue[][]): Promise<void> {
    await this.bridge.call("writeRange", { sheet: sheet.ref, address, values });
  }

  private async request<T>(op: string, args: Record<string, unknown>, schema: z.ZodType<T>): Promise<T> {
    const result = await this.bridge.call(op, args);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new Error(`bridge returned an unexpected result for ${op}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}
