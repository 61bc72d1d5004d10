import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { resolveFormat } from "../capture/formats";
import { channelsOf, type ImageFormat, type PixelFormat, type Raster, type Region } from "../capture/types";
import { CaptureError, describeError } from "./capture-errors";

export const DEFAULT_QUALITY = 95;

export type EncodeOptions = {
  format?: string;
  quality?: number;
};

const BMP_MIME = "image/bmp";

// Codecs load on first use so the package entry stays importable when one is
// missing; createCapturer reports that through the capability probe.
async function loadSharp() {
  return (await import("sharp")).default;
}

async function loadJimp() {
  return (await import("jimp")).default;
}

export function clampQuality(quality: number): number {
  if (!Number.isFinite(quality)) return DEFAULT_QUALITY;
  return Math.min(100, Math.max(1, Math.round(quality)));
}

export function pixelFormatFor(channels: number): PixelFormat {
  if (channels === 3) return "rgb";
  if (channels === 4) return "rgba";
  throw new Error(`Unsupported channel count: ${channels}`);
}

async function rawInput(raster: Raster) {
  const channels = channelsOf(raster.pixelFormat);
  const expected = raster.width * raster.height * channels;
  if (raster.data.length !== expected) {
    throw new Error(
      `Raster buffer holds ${raster.data.length} bytes, expected ${expected} for ${raster.width}x${raster.height} ${raster.pixelFormat}`,
    );
  }
  const sharp = await loadSharp();
  return sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels },
  });
}

async function encodeBmp(raster: Raster): Promise<Buffer> {
  const rgba =
    raster.pixelFormat === "rgba"
      ? raster.data
      : await (await rawInput(raster)).ensureAlpha().raw().toBuffer();
  const Jimp = await loadJimp();
  const image = new Jimp(raster.width, raster.height);
  rgba.copy(image.bitmap.data);
  return image.getBufferAsync(BMP_MIME);
}

async function encodeRaster(raster: Raster, format: ImageFormat, quality: number): Promise<Buffer> {
  if (format === "BMP") return encodeBmp(raster);

  const pipeline = await rawInput(raster);
  switch (format) {
    case "PNG":
      return pipeline.png().toBuffer();
    case "JPEG":
      return pipeline.jpeg({ quality: clampQuality(quality), optimiseCoding: true }).toBuffer();
    case "GIF":
      return pipeline.gif().toBuffer();
    case "TIFF":
      return pipeline.tiff().toBuffer();
    case "WEBP":
      return pipeline.webp().toBuffer();
  }
}

export async function save(raster: Raster, filePath: string, options: EncodeOptions = {}): Promise<string> {
  const target = path.resolve(filePath);
  try {
    const format = resolveFormat(options.format, filePath);
    await mkdir(path.dirname(target), { recursive: true });
    const bytes = await encodeRaster(raster, format, options.quality ?? DEFAULT_QUALITY);
    await writeFile(target, bytes);
    return target;
  } catch (error) {
    throw new CaptureError(
      "save_failed",
      `Failed to save screenshot to ${filePath}: ${describeError(error)}`,
      { operation: "save", cause: error },
    );
  }
}

export async function toBytes(raster: Raster, options: EncodeOptions = {}): Promise<Buffer> {
  try {
    const format = resolveFormat(options.format ?? "PNG");
    return await encodeRaster(raster, format, options.quality ?? DEFAULT_QUALITY);
  } catch (error) {
    throw new CaptureError(
      "save_failed",
      `Failed to convert screenshot to bytes: ${describeError(error)}`,
      { operation: "toBytes", cause: error },
    );
  }
}

function isBmp(bytes: Buffer) {
  return bytes.length > 2 && bytes[0] === 0x42 && bytes[1] === 0x4d;
}

export async function decodeImage(bytes: Buffer): Promise<Raster> {
  if (isBmp(bytes)) {
    const Jimp = await loadJimp();
    const image = await Jimp.read(bytes);
    return {
      width: image.bitmap.width,
      height: image.bitmap.height,
      pixelFormat: "rgba",
      data: image.bitmap.data,
    };
  }

  const sharp = await loadSharp();
  const { data, info } = await sharp(bytes)
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    pixelFormat: pixelFormatFor(info.channels),
    data,
  };
}

export async function cropRaster(raster: Raster, region: Region): Promise<Raster> {
  const { data, info } = await (await rawInput(raster))
    .extract({ left: region.x, top: region.y, width: region.width, height: region.height })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    pixelFormat: pixelFormatFor(info.channels),
    data,
  };
}
