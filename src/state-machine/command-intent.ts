import { parseRegion } from "../capture/geometry";
import { isKnownFormat } from "../capture/formats";
import type { CaptureMode, Region } from "../capture/types";
import { describeError } from "../lib/capture-errors";

export type CommandOptions = {
  mode: CaptureMode;
  region?: string;
  output?: string;
  format?: string;
  quality?: number;
  showConfig?: boolean;
  setDefaultFormat?: string;
  setDefaultDir?: string;
  resetConfig?: boolean;
};

export type CommandIntent =
  | { kind: "ShowConfig" }
  | { kind: "ResetConfig" }
  | { kind: "UpdateConfig"; format: string | null; directory: string | null }
  | {
      kind: "Capture";
      mode: CaptureMode;
      region: Region | null;
      output: string | null;
      format: string | null;
      quality: number | null;
    }
  | { kind: "Invalid"; reason: string };

export function isValidQuality(quality: number) {
  return Number.isInteger(quality) && quality >= 1 && quality <= 100;
}

function resolveConfigIntent(options: CommandOptions): CommandIntent | null {
  if (options.showConfig) return { kind: "ShowConfig" };
  if (options.resetConfig) return { kind: "ResetConfig" };

  const format = options.setDefaultFormat ?? null;
  const directory = options.setDefaultDir ?? null;
  if (format === null && directory === null) return null;

  if (format !== null && !isKnownFormat(format)) {
    return { kind: "Invalid", reason: `Unsupported image format: ${format.toUpperCase()}` };
  }
  if (directory !== null && directory.trim() === "") {
    return { kind: "Invalid", reason: "Default directory must not be empty" };
  }
  return { kind: "UpdateConfig", format, directory };
}

type RegionResolution = { ok: true; region: Region | null } | { ok: false; reason: string };

function resolveRegion(options: CommandOptions): RegionResolution {
  if (options.mode !== "region") return { ok: true, region: null };
  if (!options.region) return { ok: false, reason: "--region is required for region mode" };
  try {
    return { ok: true, region: parseRegion(options.region) };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

export function resolveCommandIntent(options: CommandOptions): CommandIntent {
  const configIntent = resolveConfigIntent(options);
  if (configIntent) return configIntent;

  const resolved = resolveRegion(options);
  if (!resolved.ok) {
    return { kind: "Invalid", reason: resolved.reason };
  }

  if (options.quality !== undefined && !isValidQuality(options.quality)) {
    return { kind: "Invalid", reason: "Quality must be between 1 and 100" };
  }

  return {
    kind: "Capture",
    mode: options.mode,
    region: resolved.region,
    output: options.output ?? null,
    format: options.format ?? null,
    quality: options.quality ?? null,
  };
}
