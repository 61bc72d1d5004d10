import { CaptureError } from "./capture-errors";

export type GrabPrimitive = () => Promise<unknown>;

export type CapabilityProbeResult =
  | { kind: "available"; grab: GrabPrimitive }
  | { kind: "unavailable"; missing: string[] };

export type CapabilityLoaders = {
  loadGrabber: () => Promise<GrabPrimitive>;
  loadCodecs: Array<{ name: string; load: () => Promise<unknown> }>;
};

export const defaultCapabilityLoaders: CapabilityLoaders = {
  loadGrabber: async () => {
    const { default: screenshot } = await import("screenshot-desktop");
    return () => screenshot({ format: "png" });
  },
  loadCodecs: [
    { name: "sharp", load: () => import("sharp") },
    { name: "jimp", load: () => import("jimp") },
  ],
};

export async function probeCapabilities(
  loaders: CapabilityLoaders = defaultCapabilityLoaders,
): Promise<CapabilityProbeResult> {
  const missing: string[] = [];

  let grab: GrabPrimitive | null = null;
  try {
    grab = await loaders.loadGrabber();
  } catch {
    missing.push("screenshot-desktop");
  }

  for (const codec of loaders.loadCodecs) {
    try {
      await codec.load();
    } catch {
      missing.push(codec.name);
    }
  }

  if (!grab || missing.length > 0) {
    return { kind: "unavailable", missing };
  }
  return { kind: "available", grab };
}

export function dependencyUnavailable(missing: string[]): CaptureError {
  return new CaptureError(
    "dependency_unavailable",
    `Required libraries are unavailable: ${missing.join(", ")}`,
    { operation: "createCapturer" },
  );
}
