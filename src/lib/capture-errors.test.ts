import { describe, expect, it } from "vitest";
import {
  CaptureError,
  captureFailureHint,
  classifyCaptureFailure,
  describeError,
  isCaptureError,
} from "./capture-errors";

describe("capture failure classifier", () => {
  it("maps display-image creation failure to permission", () => {
    const reason = classifyCaptureFailure("Command failed: screencapture -x: could not create image from display");
    expect(reason).toBe("permission");
  });

  it("maps a missing grab binary to missing_tool", () => {
    expect(classifyCaptureFailure("/bin/sh: 1: import: command not found")).toBe("missing_tool");
    expect(classifyCaptureFailure("spawn scrot ENOENT")).toBe("missing_tool");
  });

  it("keeps timeout semantics", () => {
    expect(classifyCaptureFailure("grab timed out after 5000ms")).toBe("timeout");
  });

  it("falls back to io for anything else", () => {
    expect(classifyCaptureFailure("unexpected end of stream")).toBe("io");
  });
});

describe("capture error family", () => {
  it("carries kind, operation and cause", () => {
    const cause = new Error("boom");
    const error = new CaptureError("capture_failed", "Failed to capture fullscreen: boom", {
      operation: "captureFullscreen",
      reason: "io",
      cause,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("CaptureError");
    expect(error.kind).toBe("capture_failed");
    expect(error.operation).toBe("captureFullscreen");
    expect(error.reason).toBe("io");
    expect(error.cause).toBe(cause);
  });

  it("narrows by kind", () => {
    const error = new CaptureError("invalid_region", "bad", { operation: "createRegion" });
    expect(isCaptureError(error)).toBe(true);
    expect(isCaptureError(error, "invalid_region")).toBe(true);
    expect(isCaptureError(error, "save_failed")).toBe(false);
    expect(isCaptureError(new Error("bad"))).toBe(false);
  });

  it("describes unknown thrown values", () => {
    expect(describeError(new Error("disk full"))).toBe("disk full");
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });

  it("only hints for actionable reasons", () => {
    expect(captureFailureHint("permission")).toMatch(/screen recording permission/);
    expect(captureFailureHint("io")).toBeNull();
    expect(captureFailureHint(null)).toBeNull();
  });
});
