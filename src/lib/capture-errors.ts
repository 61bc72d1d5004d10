export type CaptureErrorKind =
  | "platform_not_supported"
  | "capture_failed"
  | "invalid_region"
  | "save_failed"
  | "config_io"
  | "dependency_unavailable";

export type CaptureFailureReason = "permission" | "missing_tool" | "timeout" | "io";

type CaptureErrorOptions = {
  operation: string;
  reason?: CaptureFailureReason;
  cause?: unknown;
};

export class CaptureError extends Error {
  readonly kind: CaptureErrorKind;
  readonly operation: string;
  readonly reason: CaptureFailureReason | null;

  constructor(kind: CaptureErrorKind, message: string, options: CaptureErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CaptureError";
    this.kind = kind;
    this.operation = options.operation;
    this.reason = options.reason ?? null;
  }
}

export function isCaptureError(error: unknown, kind?: CaptureErrorKind): error is CaptureError {
  if (!(error instanceof CaptureError)) return false;
  return kind === undefined || error.kind === kind;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}

export function classifyCaptureFailure(message: string): CaptureFailureReason {
  const lower = message.toLowerCase();
  if (
    lower.includes("permission") ||
    lower.includes("access") ||
    lower.includes("denied") ||
    lower.includes("not authorized") ||
    lower.includes("could not create image from display")
  ) return "permission";
  if (
    lower.includes("command not found") ||
    lower.includes("not found") ||
    lower.includes("enoent") ||
    lower.includes("no such file") ||
    lower.includes("not recognized as an internal or external command")
  ) return "missing_tool";
  if (lower.includes("timed out") || lower.includes("timeout")) return "timeout";
  return "io";
}

export function captureFailureHint(reason: CaptureFailureReason | null): string | null {
  switch (reason) {
    case "permission":
      return "Grant screen recording permission to your terminal and try again.";
    case "missing_tool":
      return "Install a screen grab tool (ImageMagick or scrot on Linux) and make sure it is on PATH.";
    default:
      return null;
  }
}
