import { formatRegion, regionFitsWithin } from "../capture/geometry";
import {
  SUPPORTED_FORMATS,
  type CaptureMode,
  type QuickCaptureRequest,
  type QuickCaptureResult,
  type Raster,
  type Region,
} from "../capture/types";
import {
  dependencyUnavailable,
  probeCapabilities,
  type CapabilityLoaders,
  type GrabPrimitive,
} from "./capabilities";
import { CaptureError, classifyCaptureFailure, describeError } from "./capture-errors";
import { DEFAULT_QUALITY, cropRaster, decodeImage, save } from "./image-codec";
import {
  PLATFORM_STRATEGIES,
  isSupportedPlatform,
  type PlatformStrategy,
  type SupportedPlatform,
} from "./platform";

export type CapturerOptions = {
  grab: GrabPrimitive;
  platform?: string;
};

function captureFailed(operation: string, label: string, error: unknown) {
  const message = describeError(error);
  return new CaptureError("capture_failed", `Failed to capture ${label}: ${message}`, {
    operation,
    reason: classifyCaptureFailure(message),
    cause: error,
  });
}

/**
 * Single entry point for screen grabs. The platform is resolved once here;
 * every capture call afterwards is a stateless request against it.
 */
export class Capturer {
  readonly platform: SupportedPlatform;
  private readonly strategy: PlatformStrategy;
  private readonly grab: GrabPrimitive;

  constructor({ grab, platform = process.platform }: CapturerOptions) {
    if (!isSupportedPlatform(platform)) {
      throw new CaptureError("platform_not_supported", `Platform '${platform}' is not supported`, {
        operation: "createCapturer",
      });
    }
    this.platform = platform;
    this.strategy = PLATFORM_STRATEGIES[platform];
    this.grab = grab;
  }

  get platformLabel(): string {
    return this.strategy.label;
  }

  get supportedFormats(): readonly string[] {
    return SUPPORTED_FORMATS;
  }

  private async grabDisplay(operation: string, label: string): Promise<Raster> {
    try {
      const bytes = await this.grab();
      if (!Buffer.isBuffer(bytes) || bytes.length === 0) {
        throw new Error("Screenshot capture returned no image");
      }
      return await decodeImage(bytes);
    } catch (error) {
      throw captureFailed(operation, label, error);
    }
  }

  captureFullscreen(): Promise<Raster> {
    return this.grabDisplay("captureFullscreen", "fullscreen");
  }

  async captureRegion(region: Region): Promise<Raster> {
    const screen = await this.grabDisplay("captureRegion", "region");
    if (!regionFitsWithin(region, screen.width, screen.height)) {
      throw new CaptureError(
        "invalid_region",
        `Region ${formatRegion(region)} lies outside the captured display (${screen.width}x${screen.height})`,
        { operation: "captureRegion" },
      );
    }

    try {
      return await cropRaster(screen, region);
    } catch (error) {
      throw captureFailed("captureRegion", "region", error);
    }
  }

  async captureActiveWindow(): Promise<Raster> {
    const support = this.strategy.activeWindow;
    if (support.kind === "unsupported") {
      throw new CaptureError("platform_not_supported", support.guidance, {
        operation: "captureActiveWindow",
      });
    }
    // Window bounds need a per-platform geometry lookup; callers wanting a tight
    // crop pass the window rectangle to captureRegion instead.
    return this.grabDisplay("captureActiveWindow", "active window");
  }

  private async captureFor(mode: CaptureMode, region?: Region): Promise<Raster> {
    switch (mode) {
      case "fullscreen":
        return this.captureFullscreen();
      case "region":
        if (!region) {
          throw new CaptureError("invalid_region", "Region must be provided for region mode", {
            operation: "quickCapture",
          });
        }
        return this.captureRegion(region);
      case "active_window":
        return this.captureActiveWindow();
    }
  }

  async quickCapture({
    output,
    mode = "fullscreen",
    region,
    format,
    quality = DEFAULT_QUALITY,
  }: QuickCaptureRequest = {}): Promise<QuickCaptureResult> {
    const raster = await this.captureFor(mode, region);
    if (!output) {
      return { kind: "raster", raster };
    }
    return { kind: "saved", path: await save(raster, output, { format, quality }) };
  }
}

export async function createCapturer(
  options: { platform?: string; loaders?: CapabilityLoaders } = {},
): Promise<Capturer> {
  const probe = await probeCapabilities(options.loaders);
  if (probe.kind === "unavailable") {
    throw dependencyUnavailable(probe.missing);
  }
  return new Capturer({ grab: probe.grab, platform: options.platform });
}
