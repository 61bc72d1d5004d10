import { describe, expect, it } from "vitest";
import { isCaptureError } from "../lib/capture-errors";
import { createRegion, formatRegion, parseRegion, regionBbox, regionFitsWithin } from "./geometry";

function regionError(run: () => unknown) {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected region construction to fail");
}

describe("createRegion", () => {
  it("derives a half-open bounding box", () => {
    expect(regionBbox(createRegion(100, 100, 400, 300))).toEqual([100, 100, 500, 400]);
  });

  it("accepts the origin", () => {
    expect(createRegion(0, 0, 1, 1)).toEqual({ x: 0, y: 0, width: 1, height: 1 });
  });

  it.each([
    [0, 10],
    [-1, 10],
    [10, 0],
    [10, -20],
  ])("rejects non-positive dimensions %i x %i", (width, height) => {
    const error = regionError(() => createRegion(0, 0, width, height));
    expect(isCaptureError(error, "invalid_region")).toBe(true);
  });

  it.each([
    [-1, 0],
    [0, -1],
    [-5, -5],
  ])("rejects negative coordinates (%i, %i)", (x, y) => {
    const error = regionError(() => createRegion(x, y, 10, 10));
    expect(isCaptureError(error, "invalid_region")).toBe(true);
  });

  it("names the offending dimension and its value", () => {
    expect(() => createRegion(0, 0, 0, 10)).toThrow("Region width must be positive (got width=0)");
    expect(() => createRegion(0, 0, 10, -3)).toThrow("Region height must be positive (got height=-3)");
  });

  it("names the offending coordinate", () => {
    expect(() => createRegion(-5, 0, 10, 10)).toThrow("Region x coordinate must be non-negative (got x=-5)");
    expect(() => createRegion(0, -7, 10, 10)).toThrow("Region y coordinate must be non-negative (got y=-7)");
  });

  it("reports dimension errors before coordinate errors", () => {
    expect(() => createRegion(-1, -1, 0, 10)).toThrow(/width must be positive/);
  });

  it("rejects fractional values", () => {
    expect(() => createRegion(0, 0, 10.5, 10)).toThrow("Region width must be an integer (got width=10.5)");
  });

  it("is frozen", () => {
    expect(Object.isFrozen(createRegion(1, 2, 3, 4))).toBe(true);
  });
});

describe("region helpers", () => {
  it("formats for diagnostics", () => {
    expect(formatRegion(createRegion(10, 20, 800, 600))).toBe("10,20 800x600");
  });

  it("checks fit against display bounds", () => {
    const region = createRegion(100, 100, 400, 300);
    expect(regionFitsWithin(region, 500, 400)).toBe(true);
    expect(regionFitsWithin(region, 499, 400)).toBe(false);
  });
});

describe("parseRegion", () => {
  it("parses four comma-separated integers", () => {
    expect(parseRegion("10,20,800,600")).toEqual({ x: 10, y: 20, width: 800, height: 600 });
  });

  it("tolerates whitespace around tokens", () => {
    expect(parseRegion(" 10, 20 ,800, 600")).toEqual({ x: 10, y: 20, width: 800, height: 600 });
  });

  it("rejects the wrong arity", () => {
    expect(() => parseRegion("10,20,800")).toThrow(
      "Invalid region format: Region must have 4 values: x,y,width,height",
    );
    expect(() => parseRegion("not a region")).toThrow(/must have 4 values/);
  });

  it("rejects non-integer tokens", () => {
    expect(() => parseRegion("10,20,abc,600")).toThrow("Invalid region format: 'abc' is not an integer");
    expect(() => parseRegion("10,20,1.5,600")).toThrow(/'1.5' is not an integer/);
  });

  it("surfaces geometry violations with the parse prefix", () => {
    const error = regionError(() => parseRegion("0,0,0,600"));
    expect(isCaptureError(error, "invalid_region")).toBe(true);
    expect(error).toHaveProperty(
      "message",
      "Invalid region format: Region width must be positive (got width=0)",
    );
  });
});
