import { describe, expect, it, vi } from "vitest";
import { createCapturer, defaultCapabilityLoaders, isCaptureError } from "./index";

vi.mock("jimp", () => {
  throw new Error("Cannot find module 'jimp'");
});

describe("package entry", () => {
  it("reports a missing codec from createCapturer", async () => {
    let error: unknown;
    try {
      await createCapturer({
        platform: "linux",
        loaders: {
          loadGrabber: async () => async () => Buffer.alloc(0),
          loadCodecs: defaultCapabilityLoaders.loadCodecs,
        },
      });
    } catch (caught) {
      error = caught;
    }

    expect(isCaptureError(error, "dependency_unavailable")).toBe(true);
    expect(error).toMatchObject({
      message: "Required libraries are unavailable: jimp",
      operation: "createCapturer",
    });
  });
});
