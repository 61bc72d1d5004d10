export type CaptureMode = "fullscreen" | "active_window" | "region";

export const CAPTURE_MODES: readonly CaptureMode[] = ["fullscreen", "region", "active_window"];

export type Region = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type Bbox = readonly [x1: number, y1: number, x2: number, y2: number];

export type PixelFormat = "rgb" | "rgba";

export type Raster = {
  width: number;
  height: number;
  pixelFormat: PixelFormat;
  data: Buffer;
};

export type ImageFormat = "PNG" | "JPEG" | "BMP" | "GIF" | "TIFF" | "WEBP";

export const SUPPORTED_FORMATS = ["PNG", "JPEG", "JPG", "BMP", "GIF", "TIFF", "WEBP"] as const;

export type QuickCaptureRequest = {
  output?: string;
  mode?: CaptureMode;
  region?: Region;
  format?: string;
  quality?: number;
};

export type QuickCaptureResult =
  | { kind: "saved"; path: string }
  | { kind: "raster"; raster: Raster };

export function channelsOf(pixelFormat: PixelFormat): 3 | 4 {
  return pixelFormat === "rgba" ? 4 : 3;
}
