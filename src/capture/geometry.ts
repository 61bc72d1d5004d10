import { CaptureError } from "../lib/capture-errors";
import type { Bbox, Region } from "./types";

function invalidRegion(message: string, operation = "createRegion") {
  return new CaptureError("invalid_region", message, { operation });
}

function assertInteger(name: string, value: number) {
  if (!Number.isInteger(value)) {
    throw invalidRegion(`Region ${name} must be an integer (got ${name}=${value})`);
  }
}

export function createRegion(x: number, y: number, width: number, height: number): Region {
  assertInteger("width", width);
  assertInteger("height", height);
  if (width <= 0) throw invalidRegion(`Region width must be positive (got width=${width})`);
  if (height <= 0) throw invalidRegion(`Region height must be positive (got height=${height})`);

  assertInteger("x", x);
  assertInteger("y", y);
  if (x < 0) throw invalidRegion(`Region x coordinate must be non-negative (got x=${x})`);
  if (y < 0) throw invalidRegion(`Region y coordinate must be non-negative (got y=${y})`);

  return Object.freeze({ x, y, width, height });
}

export function regionBbox(region: Region): Bbox {
  return [region.x, region.y, region.x + region.width, region.y + region.height];
}

export function formatRegion(region: Region): string {
  return `${region.x},${region.y} ${region.width}x${region.height}`;
}

export function regionFitsWithin(region: Region, width: number, height: number): boolean {
  const [, , right, bottom] = regionBbox(region);
  return right <= width && bottom <= height;
}

const INTEGER_TOKEN = /^[+-]?\d+$/;

export function parseRegion(text: string): Region {
  const parts = text.split(",").map((part) => part.trim());
  if (parts.length !== 4) {
    throw invalidRegion(
      "Invalid region format: Region must have 4 values: x,y,width,height",
      "parseRegion",
    );
  }

  const badToken = parts.find((part) => !INTEGER_TOKEN.test(part));
  if (badToken !== undefined) {
    throw invalidRegion(
      `Invalid region format: '${badToken}' is not an integer`,
      "parseRegion",
    );
  }

  const [x, y, width, height] = parts.map((part) => Number.parseInt(part, 10));
  try {
    return createRegion(x, y, width, height);
  } catch (error) {
    if (error instanceof CaptureError) {
      throw invalidRegion(`Invalid region format: ${error.message}`, "parseRegion");
    }
    throw error;
  }
}
