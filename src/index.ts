export { createRegion, formatRegion, parseRegion, regionBbox, regionFitsWithin } from "./capture/geometry";
export { isKnownFormat, normalizeFormat, resolveFormat } from "./capture/formats";
export {
  CAPTURE_MODES,
  SUPPORTED_FORMATS,
  type Bbox,
  type CaptureMode,
  type ImageFormat,
  type PixelFormat,
  type QuickCaptureRequest,
  type QuickCaptureResult,
  type Raster,
  type Region,
} from "./capture/types";
export {
  defaultCapabilityLoaders,
  probeCapabilities,
  type CapabilityLoaders,
  type CapabilityProbeResult,
  type GrabPrimitive,
} from "./lib/capabilities";
export {
  CaptureError,
  isCaptureError,
  type CaptureErrorKind,
  type CaptureFailureReason,
} from "./lib/capture-errors";
export { Capturer, createCapturer, type CapturerOptions } from "./lib/capturer";
export {
  CONFIG_ENV_VAR,
  ConfigStore,
  DEFAULT_CONFIG,
  defaultConfigFile,
  type ConfigRecord,
  type JsonValue,
} from "./lib/config-store";
export { DEFAULT_QUALITY, clampQuality, cropRaster, decodeImage, save, toBytes, type EncodeOptions } from "./lib/image-codec";
export { generateFilename, resolveOutputPath } from "./lib/output-path";
export { APP_NAME, APP_VERSION } from "./version";
