import { describe, expect, it } from "vitest";
import {
  DocumentNotFoundError,
  HostError,
  HostUnavailableError,
  NotOwnedError,
  PlatformCallFailedError,
  ReadOnlyDocumentError,
  StaleHandleError,
  describeError,
  platformCall,
} from "../../src/host/errors";
import { attemptStep, attemptStepSync, formatSoftFailures } from "../../src/host/soft-failures";
import type { SoftFailure } from "../../src/host/types";

describe("HostError", () => {
  it("renders a tool payload with code and details", () => {
    const error = new NotOwnedError("/work/shared.xlsx");

    expect(error).toBeInstanceOf(HostError);
    expect(error.name).toBe("NotOwnedError");
    expect(error.toJSON()).toEqual({
      error: "Document was not opened by this session and will not be closed without force: /work/shared.xlsx",
      error_type: "not_owned",
      path: "/work/shared.xlsx",
    });
  });

  it("keeps the reason of an unavailable host", () => {
    const cause = new Error("no apartment");
    const error = new HostUnavailableError("binding initialization failed", { cause });

    expect(error.code).toBe("host_unavailable");
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      error: "Host application is not available: binding initialization failed",
      error_type: "host_unavailable",
      reason: "binding initialization failed",
    });
  });

  it("names the document that was not found and the stale handle", () => {
    expect(new DocumentNotFoundError("/work/a.xlsx").message).toBe("Document not found: /work/a.xlsx");
    expect(new StaleHandleError("application:app1").details).toEqual({ handle: "application:app1" });
  });

  it("tells a read-only document apart from a missing one", () => {
    expect(new ReadOnlyDocumentError("/work/a.xlsx").toJSON()).toEqual({
      error: "Document is open read-only and cannot be modified: /work/a.xlsx",
      error_type: "read_only",
      path: "/work/a.xlsx",
    });
  });
});

describe("platformCall", () => {
  it("wraps foreign failures with the operation name", async () => {
    const error = await platformCall("read range", async () => {
      throw new Error("exception occurred");
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PlatformCallFailedError);
    expect(error).toMatchObject({
      operation: "read range",
      message: "Platform call failed during read range: exception occurred",
      details: { operation: "read range", platform_error: "exception occurred" },
    });
  });

  it("passes typed errors through untouched", async () => {
    const original = new DocumentNotFoundError("/work/a.xlsx");

    await expect(platformCall("open document", () => Promise.reject(original))).rejects.toBe(original);
  });

  it("returns the call's value", async () => {
    await expect(platformCall("count", async () => 3)).resolves.toBe(3);
  });

  it("describes non-Error throwables", () => {
    expect(describeError("plain text")).toBe("plain text");
    expect(describeError(new Error("wrapped"))).toBe("wrapped");
  });
});

describe("soft failures", () => {
  it("records a failed step and keeps going", async () => {
    const failures: SoftFailure[] = [];

    const first = await attemptStep(failures, "close a", async () => {
      throw new Error("gone");
    });
    const second = await attemptStep(failures, "close b", async () => undefined);

    expect([first, second]).toEqual([false, true]);
    expect(failures).toEqual([{ step: "close a", message: "gone" }]);
    expect(formatSoftFailures(failures)).toEqual(["close a: gone"]);
  });

  it("has a synchronous form for exit handlers", () => {
    const failures: SoftFailure[] = [];

    expect(
      attemptStepSync(failures, "kill 7", () => {
        throw new Error("denied");
      })
    ).toBe(false);
    expect(failures).toEqual([{ step: "kill 7", message: "denied" }]);
  });
});
