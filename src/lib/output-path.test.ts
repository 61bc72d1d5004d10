import path from "node:path";
import { describe, expect, it } from "vitest";
import { expandHome, formatTimestamp, generateFilename, resolveOutputPath } from "./output-path";

const AT = new Date(2024, 2, 5, 9, 7, 3);

describe("generated file names", () => {
  it("stamps local date and time", () => {
    expect(formatTimestamp(AT)).toBe("20240305_090703");
  });

  it("uses the lower-cased format as extension", () => {
    expect(generateFilename("PNG", AT)).toBe("screenshot_20240305_090703.png");
    expect(generateFilename("JPEG", AT)).toBe("screenshot_20240305_090703.jpeg");
    expect(generateFilename("jpg", AT)).toBe("screenshot_20240305_090703.jpg");
  });

  it("starts with the screenshot prefix by default", () => {
    const name = generateFilename();
    expect(name.startsWith("screenshot_")).toBe(true);
    expect(name.endsWith(".png")).toBe(true);
  });
});

describe("expandHome", () => {
  it("expands a leading tilde", () => {
    expect(expandHome("~", "/home/tester")).toBe("/home/tester");
    expect(expandHome("~/Pictures", "/home/tester")).toBe(path.join("/home/tester", "Pictures"));
  });

  it("leaves other paths alone", () => {
    expect(expandHome(".", "/home/tester")).toBe(".");
    expect(expandHome("/tmp/~shots", "/home/tester")).toBe("/tmp/~shots");
    expect(expandHome("~other/dir", "/home/tester")).toBe("~other/dir");
  });
});

describe("resolveOutputPath", () => {
  it("prefers an explicit output", () => {
    expect(resolveOutputPath({ output: "out/shot.png", directory: "/shots", format: "png" })).toBe(
      "out/shot.png",
    );
  });

  it("generates a name inside the configured directory", () => {
    expect(resolveOutputPath({ directory: "/shots", format: "webp", now: AT })).toBe(
      path.join("/shots", "screenshot_20240305_090703.webp"),
    );
  });
});
