import type { Logger } from "pino";
import type { ApplicationHandle, DocumentHandle, RangeHandle, SheetHandle } from "./handles";
import { attemptStep, formatSoftFailures } from "./soft-failures";
import type { ApplicationBinding, ScrollPosition, SoftFailure, ViewBinding } from "./types";

// Capture takes references the binding has to be told to drop again.
export type ViewStateBinding = ViewBinding & Pick<ApplicationBinding, "release">;

// What the user was looking at when an automated operation began.
export interface ViewSnapshot {
  activeDocument: DocumentHandle | null;
  activeSheet: SheetHandle | null;
  selection: RangeHandle | null;
  activeCell: RangeHandle | null;
  scroll: Partial<ScrollPosition>;
}

function emptySnapshot(): ViewSnapshot {
  return {
    activeDocument: null,
    activeSheet: null,
    selection: null,
    activeCell: null,
    scroll: {},
  };
}

// Captures the host's visible state before a mutating operation and puts
// it back afterwards. Every field is read and restored on its own so one
// missing piece never blocks the others.
//
// Selection and active cell are captured but deliberately not restored:
// the user may have started working somewhere else in the meantime.
export class ViewStatePreserver {
  private snapshot: ViewSnapshot = emptySnapshot();
  private readonly failures: SoftFailure[] = [];

  constructor(
    private readonly binding: ViewStateBinding,
    private readonly app: ApplicationHandle,
    private readonly logger?: Logger
  ) {}

  get captured(): ViewSnapshot {
    return this.snapshot;
  }

  get softFailures(): SoftFailure[] {
    return [...this.failures];
  }

  async capture(): Promise<ViewSnapshot> {
    const snapshot = emptySnapshot();
    const { binding, app } = this;

    await this.attempt("capture active document", async () => {
      snapshot.activeDocument = await binding.activeDocument(app);
    });

    if (snapshot.activeDocument) {
      await this.attempt("capture active sheet", async () => {
        snapshot.activeSheet = await binding.activeSheet(app);
      });
    }

    await this.attempt("capture selection", async () => {
      snapshot.selection = await binding.selection(app);
    });

    await this.attempt("capture active cell", async () => {
      snapshot.activeCell = await binding.activeCell(app);
    });

    await this.attempt("capture scroll position", async () => {
      const position = await binding.scrollPosition(app);
      if (position) {
        snapshot.scroll = { ...position };
      }
    });

    this.snapshot = snapshot;
    return snapshot;
  }

  async restore(): Promise<void> {
    const { binding, app, snapshot } = this;
    const { activeDocument, activeSheet, scroll } = snapshot;

    if (activeDocument) {
      const documentRestored = await this.attempt("restore active document", async () => {
        await binding.handleName(activeDocument);
        await binding.activate(activeDocument);
      });

      if (documentRestored && activeSheet) {
        await this.attempt("restore active sheet", async () => {
          await binding.handleName(activeSheet);
          await binding.activate(activeSheet);
        });
      }
    }

    if (scroll.row !== undefined) {
      const row = scroll.row;
      await this.attempt("restore scroll row", () => binding.setScrollRow(app, row));
    }

    if (scroll.column !== undefined) {
      const column = scroll.column;
      await this.attempt("restore scroll column", () => binding.setScrollColumn(app, column));
    }
  }

  // Drops the references capture() took. Call once restore() is done.
  async dispose(): Promise<void> {
    const { activeDocument, activeSheet, selection, activeCell } = this.snapshot;
    const handles = [activeDocument, activeSheet, selection, activeCell].filter(
      (handle): handle is DocumentHandle | SheetHandle | RangeHandle => handle !== null
    );
    this.snapshot = emptySnapshot();

    for (const handle of handles) {
      await this.attempt(`release ${handle.kind} handle`, () => this.binding.release(handle));
    }
  }

  // View steps fail routinely (closed windows, deleted sheets), so they log at debug.
  private async attempt(step: string, run: () => Promise<void>): Promise<boolean> {
    const ok = await attemptStep(this.failures, step, run);
    if (!ok) {
      this.logger?.debug({ step }, "view state step skipped");
    }
    return ok;
  }
}

// Scoped form: restore runs on every exit path, including a thrown operation.
export async function preserveViewState<T>(
  binding: ViewStateBinding,
  app: ApplicationHandle,
  operation: () => Promise<T>,
  logger?: Logger
): Promise<T> {
  const preserver = new ViewStatePreserver(binding, app, logger);
  await preserver.capture();

  try {
    return await operation();
  } finally {
    await preserver.restore();
    await preserver.dispose();
    if (preserver.softFailures.length > 0) {
      logger?.debug({ failures: formatSoftFailures(preserver.softFailures) }, "view state partly restored");
    }
  }
}
