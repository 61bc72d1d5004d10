export type SupportedPlatform = "darwin" | "win32" | "linux";

export type ActiveWindowSupport =
  | { kind: "fullscreen_equivalent" }
  | { kind: "unsupported"; guidance: string };

export type PlatformStrategy = {
  label: string;
  activeWindow: ActiveWindowSupport;
};

export const PLATFORM_STRATEGIES: Record<SupportedPlatform, PlatformStrategy> = {
  darwin: {
    label: "macOS",
    activeWindow: { kind: "fullscreen_equivalent" },
  },
  win32: {
    label: "Windows",
    activeWindow: { kind: "fullscreen_equivalent" },
  },
  linux: {
    label: "Linux",
    activeWindow: {
      kind: "unsupported",
      guidance:
        "Active window capture requires additional tools on Linux. Please use region capture instead.",
    },
  },
};

export function isSupportedPlatform(platform: string): platform is SupportedPlatform {
  return Object.prototype.hasOwnProperty.call(PLATFORM_STRATEGIES, platform);
}
