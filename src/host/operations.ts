import type { Logger } from "pino";
import type { SheetHandle } from "./handles";
import { platformCall } from "./errors";
import { attemptStep } from "./soft-failures";
import type { ApplicationBinding, CellValue, DocumentEntry, RangeBinding, SoftFailure } from "./types";

// Stateless range access against a leased document. Callers get the entry
// from HostSession.withDocument; nothing here keeps a handle past the call.

export type SheetBinding = RangeBinding & Pick<ApplicationBinding, "release">;

export function listSheets(binding: RangeBinding, entry: DocumentEntry): Promise<string[]> {
  return platformCall("list sheets", () => binding.listSheets(entry.handle));
}

export function readRange(
  binding: SheetBinding,
  entry: DocumentEntry,
  sheetName: string,
  address: string,
  logger?: Logger
): Promise<CellValue[][]> {
  return withSheet(binding, entry, sheetName, logger, (sheet) =>
    platformCall("read range", () => binding.readRange(sheet, address))
  );
}

export async function writeRange(
  binding: SheetBinding,
  entry: DocumentEntry,
  sheetName: string,
  address: string,
  values: CellValue[][],
  logger?: Logger
): Promise<void> {
  if (values.length === 0) {
    throw new RangeError("values must contain at least one row");
  }
  const width = values[0].length;
  if (values.some((row) => row.length !== width)) {
    throw new RangeError("every row of values must have the same number of cells");
  }

  await withSheet(binding, entry, sheetName, logger, (sheet) =>
    platformCall("write range", () => binding.writeRange(sheet, address, values))
  );
}

// The sheet reference is dropped on every exit path; a failed release is a
// soft failure and never replaces the range call's own outcome.
async function withSheet<T>(
  binding: SheetBinding,
  entry: DocumentEntry,
  sheetName: string,
  logger: Logger | undefined,
  use: (sheet: SheetHandle) => Promise<T>
): Promise<T> {
  const sheet = await platformCall("get sheet", () => binding.getSheet(entry.handle, sheetName));
  try {
    return await use(sheet);
  } finally {
    const failures: SoftFailure[] = [];
    await attemptStep(failures, `release sheet ${sheetName}`, () => binding.release(sheet), logger);
  }
}
