import { describe, expect, it } from "vitest";
import { ViewStatePreserver, preserveViewState } from "../../src/host/view-state";
import { FakeHostBinding } from "../helpers/fake-binding";

async function hostWithReport() {
  const binding = new FakeHostBinding();
  const report = binding.seedDocument("/work/report.xlsx", ["Sheet1", "Sheet2"]);
  const app = await binding.attach();
  binding.activeDocumentRef = report.ref;
  binding.activeSheetName = "Sheet2";
  binding.scroll = { row: 5, column: 3 };
  return { app, binding, report };
}

describe("ViewStatePreserver", () => {
  it("captures every part of the view", async () => {
    const { app, binding, report } = await hostWithReport();
    const preserver = new ViewStatePreserver(binding, app);

    const snapshot = await preserver.capture();

    expect(snapshot.activeDocument?.ref).toBe(report.ref);
    expect(snapshot.activeSheet?.ref).toBe(`${report.ref}!Sheet2`);
    expect(snapshot.selection?.ref).toBe("A1");
    expect(snapshot.activeCell?.ref).toBe("A1");
    expect(snapshot.scroll).toEqual({ row: 5, column: 3 });
    expect(preserver.softFailures).toEqual([]);
  });

  it("captures the remaining fields when one read fails", async () => {
    const { app, binding } = await hostWithReport();
    binding.failures.set("activeDocument", new Error("no window"));
    const preserver = new ViewStatePreserver(binding, app);

    const snapshot = await preserver.capture();

    expect(snapshot.activeDocument).toBeNull();
    expect(snapshot.activeSheet).toBeNull();
    expect(snapshot.scroll).toEqual({ row: 5, column: 3 });
    expect(preserver.softFailures).toEqual([{ step: "capture active document", message: "no window" }]);
  });

  it("skips the sheet when its document is gone but still restores scrolling", async () => {
    const { app, binding, report } = await hostWithReport();
    const preserver = new ViewStatePreserver(binding, app);
    await preserver.capture();

    report.closed = true;
    binding.activeDocumentRef = null;
    binding.scroll = { row: 80, column: 9 };
    await preserver.restore();

    expect(binding.activeDocumentRef).toBeNull();
    expect(binding.scroll).toEqual({ row: 5, column: 3 });
    expect(preserver.softFailures.map((failure) => failure.step)).toEqual(["restore active document"]);
  });

  it("restores the document even when the sheet was deleted", async () => {
    const { app, binding, report } = await hostWithReport();
    const preserver = new ViewStatePreserver(binding, app);
    await preserver.capture();

    report.sheets = ["Sheet1"];
    binding.activeSheetName = "Sheet1";
    await preserver.restore();

    expect(binding.activeDocumentRef).toBe(report.ref);
    expect(binding.activeSheetName).toBe("Sheet1");
    expect(preserver.softFailures).toEqual([{ step: "restore active sheet", message: "sheet Sheet2 is gone" }]);
  });

  it("restores scroll column even when the row cannot be set", async () => {
    const { app, binding } = await hostWithReport();
    const preserver = new ViewStatePreserver(binding, app);
    await preserver.capture();
    binding.scroll = { row: 40, column: 40 };
    binding.failures.set("setScrollRow", new Error("frozen pane"));

    await preserver.restore();

    expect(binding.scroll).toEqual({ row: 40, column: 3 });
  });
});

describe("preserveViewState", () => {
  it("restores after the operation throws and rethrows its error", async () => {
    const { app, binding, report } = await hostWithReport();

    await expect(
      preserveViewState(binding, app, async () => {
        binding.activeSheetName = "Sheet1";
        binding.scroll = { row: 300, column: 1 };
        throw new Error("operation failed");
      })
    ).rejects.toThrow("operation failed");

    expect(binding.activeDocumentRef).toBe(report.ref);
    expect(binding.activeSheetName).toBe("Sheet2");
    expect(binding.scroll).toEqual({ row: 5, column: 3 });
  });

  it("returns the operation's result", async () => {
    const { app, binding } = await hostWithReport();

    await expect(preserveViewState(binding, app, async () => "done")).resolves.toBe("done");
  });
});
