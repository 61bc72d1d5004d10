import path from "node:path";
import { CaptureError } from "../lib/capture-errors";
import type { ImageFormat } from "./types";

const FORMAT_NAMES = new Map<string, ImageFormat>([
  ["PNG", "PNG"],
  ["JPEG", "JPEG"],
  ["JPG", "JPEG"],
  ["BMP", "BMP"],
  ["GIF", "GIF"],
  ["TIFF", "TIFF"],
  ["TIF", "TIFF"],
  ["WEBP", "WEBP"],
]);

export function isKnownFormat(name: string): boolean {
  return FORMAT_NAMES.has(name.trim().toUpperCase());
}

export function normalizeFormat(name: string): ImageFormat {
  const upper = name.trim().toUpperCase();
  const format = FORMAT_NAMES.get(upper);
  if (!format) {
    throw new CaptureError("save_failed", `Unsupported image format: ${upper}`, {
      operation: "resolveFormat",
    });
  }
  return format;
}

export function resolveFormat(format?: string | null, filePath?: string): ImageFormat {
  if (format) return normalizeFormat(format);
  const extension = filePath ? path.extname(filePath).slice(1) : "";
  return extension ? normalizeFormat(extension) : "PNG";
}
