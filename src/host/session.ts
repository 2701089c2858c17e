import { existsSync } from "fs";
import type { Logger } from "pino";
import { createSilentLogger } from "../logging";
import type { ProcessGuardian } from "../process/guardian";
import type { StoppableSession } from "../process/types";
import { BindingThreadGuard } from "./binding-guard";
import {
  DocumentNotFoundError,
  HostError,
  HostUnavailableError,
  NotOwnedError,
  ReadOnlyDocumentError,
  StaleHandleError,
  describeError,
  platformCall,
} from "./errors";
import type { ApplicationHandle, DocumentHandle, HostHandle } from "./handles";
import { ReentrantLock } from "./lock";
import { documentKey, normalizeDocumentPath } from "./paths";
import { DocumentRegistry } from "./registry";
import { attemptStep } from "./soft-failures";
import type {
  DocumentEntry,
  HostBinding,
  HostStatus,
  LeaseOptions,
  ReleaseOptions,
  SaveAllReport,
  SoftFailure,
  UnsavedDocument,
  WithDocumentOptions,
} from "./types";
import { preserveViewState } from "./view-state";

export interface HostSessionOptions {
  binding: HostBinding;
  guardian?: ProcessGuardian;
  // Share one lock between sessions that talk to the same host.
  lock?: ReentrantLock;
  logger?: Logger;
  visible?: boolean;
  displayAlerts?: boolean;
  attachToExisting?: boolean;
  pathExists?: (path: string) => boolean;
  cwd?: string;
  label?: string;
}

export type DocumentOperation<T> = (entry: DocumentEntry, binding: HostBinding) => Promise<T>;

// Owns the application handle and every document lease taken against it.
// All state changes happen under one reentrant lock because the platform
// binding cannot be driven from two call chains at once.
export class HostSession implements StoppableSession {
  readonly label: string;
  readonly lock: ReentrantLock;

  private readonly binding: HostBinding;
  private readonly guardian?: ProcessGuardian;
  private readonly logger: Logger;
  private readonly visible: boolean;
  private readonly displayAlerts: boolean;
  private readonly attachToExisting: boolean;
  private readonly pathExists: (path: string) => boolean;
  private readonly cwd?: string;

  private readonly registry = new DocumentRegistry();
  private readonly threadGuard: BindingThreadGuard;
  private app: ApplicationHandle | null = null;
  private attached = false;
  // Set by a successful start(), cleared by stop(). Gates the implicit restart.
  private startRequested = false;

  constructor(options: HostSessionOptions) {
    this.label = options.label ?? "default";
    this.binding = options.binding;
    this.guardian = options.guardian;
    this.lock = options.lock ?? new ReentrantLock(`host-session:${this.label}`);
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "session", session: this.label });
    this.visible = options.visible ?? false;
    this.displayAlerts = options.displayAlerts ?? false;
    this.attachToExisting = options.attachToExisting ?? true;
    this.pathExists = options.pathExists ?? existsSync;
    this.cwd = options.cwd;
    this.threadGuard = new BindingThreadGuard(this.binding);

    this.guardian?.registerSession(this);
  }

  get isRunning(): boolean {
    return this.app !== null;
  }

  // True when the session joined an instance that was already running.
  get attachMode(): boolean {
    return this.app !== null && this.attached;
  }

  get createdFresh(): boolean {
    return this.app !== null && !this.attached;
  }

  isTracked(path: string): boolean {
    return this.registry.contains(normalizeDocumentPath(path, this.cwd));
  }

  isOwned(path: string): boolean {
    return this.registry.isOwned(normalizeDocumentPath(path, this.cwd));
  }

  trackedDocuments(): DocumentEntry[] {
    return this.registry.entries();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): Promise<void> {
    return this.lock.run(async () => {
      if (this.app && (await this.isAlive())) {
        return;
      }

      try {
        await this.threadGuard.acquire();
      } catch (error) {
        throw new HostUnavailableError("binding initialization failed", { cause: error });
      }

      let app: ApplicationHandle | null = null;
      let attached = false;

      if (this.attachToExisting) {
        app = await this.tryAttach();
        attached = app !== null;
      }

      if (!app) {
        try {
          app = await this.createFresh();
        } catch (error) {
          await this.threadGuard.release().catch((releaseError: unknown) => {
            this.logger.warn({ err: releaseError }, "binding teardown after failed start failed");
          });
          throw new HostUnavailableError(`could not create host instance: ${describeError(error)}`, { cause: error });
        }
      }

      this.app = app;
      this.attached = attached;
      this.startRequested = true;

      await this.configure(app, attached);
      await this.registerPreexistingDocuments(app);

      this.logger.info(
        { attachMode: attached, preexistingDocuments: this.registry.size },
        attached ? "attached to running host" : "started fresh host instance"
      );
    });
  }

  // Probes the handle with a trivial read. A failed probe drops the handle,
  // every cached document and the binding initialization (a dead host often
  // means a dead binding thread), so the next lease restarts from scratch.
  isAlive(): Promise<boolean> {
    return this.lock.run(async () => {
      const app = this.app;
      if (!app) {
        return false;
      }

      try {
        await this.probe(app);
        return true;
      } catch (error) {
        this.logger.warn({ err: error }, "host handle is stale");
        this.app = null;
        this.attached = false;
        this.registry.clear();

        const failures: SoftFailure[] = [];
        await attemptStep(failures, "release stale application handle", () => this.binding.release(app), this.logger);
        await attemptStep(failures, "uninitialize binding", () => this.threadGuard.release(), this.logger);
        return false;
      }
    });
  }

  // Closes owned documents without saving, forgets unowned ones, and quits
  // the host only when this session created it or forceQuit is set.
  // Never throws; failed steps come back as soft failures.
  stop(forceQuit = false): Promise<SoftFailure[]> {
    return this.lock.run(async () => {
      const failures: SoftFailure[] = [];
      const app = this.app;

      if (app) {
        for (const entry of this.registry.entries()) {
          if (entry.owned) {
            await attemptStep(
              failures,
              `close ${entry.path}`,
              () => this.binding.closeDocument(entry.handle, { saveChanges: false }),
              this.logger
            );
          } else {
            await attemptStep(failures, `release ${entry.path}`, () => this.binding.release(entry.handle), this.logger);
          }
          this.registry.remove(entry.path);
        }

        if (forceQuit || !this.attached) {
          await attemptStep(failures, "quit host", () => this.binding.quit(app), this.logger);
        }

        await attemptStep(failures, "release application handle", () => this.binding.release(app), this.logger);
      }

      this.registry.clear();
      this.app = null;
      this.attached = false;
      this.startRequested = false;

      await attemptStep(failures, "uninitialize binding", () => this.threadGuard.release(), this.logger);

      this.logger.info({ forceQuit, failureCount: failures.length }, "session stopped");
      return failures;
    });
  }

  // Detach from the guardian once the session is no longer in use.
  dispose(): void {
    this.guardian?.unregisterSession(this);
  }

  status(): Promise<HostStatus> {
    return this.lock.run(async () => {
      const running = await this.isAlive();
      return {
        running,
        attachMode: running && this.attached,
        documentCount: running ? this.registry.size : 0,
        openPaths: running ? this.registry.paths() : [],
      };
    });
  }

  // ==========================================================================
  // Leases
  // ==========================================================================

  // Explicit lease: the document stays open and tracked until released,
  // and scoped operations on it leave it that way.
  leaseDocument(path: string, options: LeaseOptions = {}): Promise<DocumentEntry> {
    return this.lock.run(async () => {
      const entry = await this.acquire(path, options);
      entry.held = true;
      return entry;
    });
  }

  // Ends tracking of a document. Closes it only when this session owns it
  // (or force is set); an unowned document is at most saved in place.
  // Returns false when the path was not tracked.
  releaseDocument(path: string, options: ReleaseOptions = {}): Promise<boolean> {
    return this.lock.run(async () => {
      const normalized = normalizeDocumentPath(path, this.cwd);
      const entry = this.registry.remove(normalized);
      if (!entry) {
        return false;
      }

      const save = options.save ?? false;
      if (!this.app) {
        this.logger.debug({ path: normalized }, "released document after host went away");
        return true;
      }

      if (entry.owned || options.force) {
        // Closing also drops the binding's reference.
        await platformCall("close document", () =>
          this.binding.closeDocument(entry.handle, { saveChanges: save && !entry.readOnly })
        );
        return true;
      }

      try {
        if (save) {
          await platformCall("save document", () => this.binding.saveDocument(entry.handle));
        }
      } finally {
        await this.releaseHandles([entry.handle]);
      }
      return true;
    });
  }

  // Explicit close request. Refuses documents this session did not open unless forced.
  closeDocument(path: string, options: ReleaseOptions = {}): Promise<void> {
    return this.lock.run(async () => {
      const normalized = normalizeDocumentPath(path, this.cwd);
      const entry = this.registry.get(normalized);
      if (!entry) {
        throw new DocumentNotFoundError(normalized);
      }
      if (!entry.owned && !options.force) {
        throw new NotOwnedError(entry.path);
      }
      await this.releaseDocument(entry.path, options);
    });
  }

  // Lease, run, release. The lock is held across the whole bracket, the
  // release runs on every exit path, and a failing release never hides
  // the operation's own error. With `mutate`, the user's view is captured
  // before the lease (opening a document activates it) and restored after
  // the release.
  withDocument<T>(path: string, options: WithDocumentOptions, operation: DocumentOperation<T>): Promise<T> {
    return this.lock.run(async () => {
      if (!options.mutate) {
        return this.leaseAndRun(path, options, operation);
      }

      const app = await this.ensureLive();
      return preserveViewState(this.binding, app, () => this.leaseAndRun(path, options, operation), this.logger);
    });
  }

  // ==========================================================================
  // Saving
  // ==========================================================================

  // Save a tracked document in place, or to saveAsPath. The registry keeps
  // the entry under its original path.
  saveDocument(path: string, saveAsPath?: string): Promise<void> {
    return this.lock.run(async () => {
      await this.ensureLive();
      const normalized = normalizeDocumentPath(path, this.cwd);
      const entry = this.registry.get(normalized);
      if (!entry) {
        throw new DocumentNotFoundError(normalized);
      }
      const target = saveAsPath ? normalizeDocumentPath(saveAsPath, this.cwd) : undefined;
      await platformCall("save document", () => this.binding.saveDocument(entry.handle, target));
    });
  }

  unsavedDocuments(): Promise<UnsavedDocument[]> {
    return this.lock.run(async () => {
      const app = await this.ensureLive();
      const documents = await platformCall("list documents", () => this.binding.listDocuments(app));
      await this.releaseHandles(documents.map((document) => document.handle));
      return documents
        .filter((document) => !document.saved)
        .map((document) => ({ name: document.name, path: document.fullName || null }));
    });
  }

  // Saves every document with unsaved changes that already has a path.
  saveAllDocuments(): Promise<SaveAllReport> {
    return this.lock.run(async () => {
      const app = await this.ensureLive();
      const documents = await platformCall("list documents", () => this.binding.listDocuments(app));
      const report: SaveAllReport = { saved: 0, errors: [] };

      for (const document of documents) {
        if (document.saved) {
          continue;
        }
        if (!document.fullName) {
          report.errors.push(`'${document.name}' has never been saved (no path)`);
          continue;
        }

        try {
          await this.binding.saveDocument(document.handle);
          report.saved++;
        } catch (error) {
          report.errors.push(`Failed to save '${document.name}': ${describeError(error)}`);
        }
      }

      await this.releaseHandles(documents.map((document) => document.handle));
      return report;
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  // A document held open by an explicit lease stays open afterwards and is
  // only saved when requested. Everything else, including documents the
  // user had open at start, goes through releaseDocument.
  private async leaseAndRun<T>(path: string, options: WithDocumentOptions, operation: DocumentOperation<T>): Promise<T> {
    const entry = await this.acquire(path, options);
    const borrowed = entry.held;
    const save = options.save ?? false;

    let result: T;
    try {
      if ((options.mutate || save) && entry.readOnly) {
        throw new ReadOnlyDocumentError(entry.path);
      }
      result = await operation(entry, this.binding);
    } catch (error) {
      if (!borrowed) {
        try {
          await this.releaseDocument(entry.path, { save: false });
        } catch (releaseError) {
          this.logger.warn({ path: entry.path, err: releaseError }, "release after failed operation failed");
        }
      }
      throw error;
    }

    if (!borrowed) {
      await this.releaseDocument(entry.path, { save });
    } else if (save) {
      await platformCall("save document", () => this.binding.saveDocument(entry.handle));
    }
    return result;
  }

  private async acquire(path: string, options: LeaseOptions): Promise<DocumentEntry> {
    const app = await this.ensureLive();
    const normalized = normalizeDocumentPath(path, this.cwd);
    const readOnly = options.readOnly ?? false;

    const cached = this.registry.get(normalized);
    if (cached) {
      try {
        await this.binding.documentFullName(cached.handle);
        return cached;
      } catch (error) {
        this.logger.debug({ path: normalized, err: error }, "cached document handle is stale");
        this.registry.remove(normalized);
        await this.releaseHandles([cached.handle]);
      }
    }

    // Never open a second copy of something the host already has open.
    const alreadyOpen = await this.findOpenDocument(app, normalized);
    if (alreadyOpen) {
      return this.registry.set(normalized, alreadyOpen, false, readOnly);
    }

    if (!this.pathExists(normalized)) {
      if (!options.create) {
        throw new DocumentNotFoundError(normalized);
      }

      const created = await platformCall("create document", () =>
        this.binding.createDocument(app, normalized, { sheetNames: options.sheetNames })
      );
      this.logger.info({ path: normalized }, "created document");
      return this.registry.set(normalized, created, true, false);
    }

    const opened = await platformCall("open document", () =>
      this.binding.openDocument(app, normalized, { readOnly })
    );
    this.logger.debug({ path: normalized, readOnly }, "opened document");
    return this.registry.set(normalized, opened, true, readOnly);
  }

  private async ensureLive(): Promise<ApplicationHandle> {
    if (!this.startRequested) {
      throw new HostUnavailableError("session has not been started");
    }

    if (this.app && (await this.isAlive())) {
      return this.app;
    }

    this.logger.warn("restarting session after stale handle");
    try {
      await this.start();
    } catch (error) {
      if (error instanceof HostError) {
        throw error;
      }
      throw new HostUnavailableError(`restart failed: ${describeError(error)}`, { cause: error });
    }

    if (!this.app) {
      throw new HostUnavailableError("restart did not produce a handle");
    }
    return this.app;
  }

  private async probe(app: ApplicationHandle): Promise<void> {
    try {
      await this.binding.documentCount(app);
    } catch (error) {
      throw new StaleHandleError(app.toString(), { cause: error });
    }
  }

  // Handles the session does not keep. Dropping them is best effort.
  private async releaseHandles(handles: HostHandle[]): Promise<void> {
    const failures: SoftFailure[] = [];
    for (const handle of handles) {
      await attemptStep(failures, `release ${handle.toString()}`, () => this.binding.release(handle), this.logger);
    }
  }

  // Attach is probe-based: a running instance answers a trivial read.
  private async tryAttach(): Promise<ApplicationHandle | null> {
    try {
      const app = await this.binding.attach();
      await this.binding.documentCount(app);
      return app;
    } catch (error) {
      this.logger.debug({ err: error }, "no running host to attach to");
      return null;
    }
  }

  private async createFresh(): Promise<ApplicationHandle> {
    if (!this.guardian) {
      return this.binding.create();
    }
    const { result } = await this.guardian.trackFreshInstance(() => this.binding.create());
    return result;
  }

  // Visibility is left alone on an attached instance: that window belongs to the user.
  private async configure(app: ApplicationHandle, attached: boolean): Promise<void> {
    const failures: SoftFailure[] = [];

    if (!attached) {
      await attemptStep(failures, "set visibility", () => this.binding.setVisible(app, this.visible), this.logger);
    }
    await attemptStep(
      failures,
      "set alert display",
      () => this.binding.setDisplayAlerts(app, this.displayAlerts),
      this.logger
    );
  }

  // Everything already open belongs to someone else and is never closed by us.
  private async registerPreexistingDocuments(app: ApplicationHandle): Promise<void> {
    try {
      const documents = await this.binding.listDocuments(app);
      const untitled: HostHandle[] = [];
      for (const document of documents) {
        if (!document.fullName) {
          untitled.push(document.handle);
          continue;
        }
        this.registry.set(normalizeDocumentPath(document.fullName, this.cwd), document.handle, false);
      }
      await this.releaseHandles(untitled);
    } catch (error) {
      this.logger.warn({ err: error }, "could not enumerate documents already open");
    }
  }

  private async findOpenDocument(app: ApplicationHandle, normalized: string): Promise<DocumentHandle | null> {
    const documents = await platformCall("list documents", () => this.binding.listDocuments(app));
    const key = documentKey(normalized);
    const match = documents.find(
      (document) => document.fullName && documentKey(normalizeDocumentPath(document.fullName, this.cwd)) === key
    );
    await this.releaseHandles(documents.filter((document) => document !== match).map((document) => document.handle));
    return match ? match.handle : null;
  }
}
