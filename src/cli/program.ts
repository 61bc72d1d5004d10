import path from "node:path";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import { isKnownFormat } from "../capture/formats";
import { CAPTURE_MODES } from "../capture/types";
import { CaptureError, captureFailureHint, describeError, isCaptureError } from "../lib/capture-errors";
import { createCapturer, type Capturer } from "../lib/capturer";
import { ConfigStore } from "../lib/config-store";
import { resolveOutputPath } from "../lib/output-path";
import { createReporter, type Reporter } from "../lib/reporter";
import {
  resolveCommandIntent,
  type CommandIntent,
} from "../state-machine/command-intent";
import { APP_NAME, APP_VERSION } from "../version";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const FORMAT_CHOICES = ["png", "jpeg", "jpg", "bmp", "gif", "tiff", "webp"] as const;

const EXAMPLES = `
Examples:
  # Capture full screen to the configured directory
  $ ${APP_NAME}

  # Capture to a specific file
  $ ${APP_NAME} -o ~/Pictures/my_screenshot.png

  # Capture a region (x, y, width, height)
  $ ${APP_NAME} -m region -r 100,100,800,600

  # Capture as JPEG with custom quality
  $ ${APP_NAME} -f jpeg -q 85

  # Show current configuration
  $ ${APP_NAME} --show-config`;

const cliOptionsSchema = z.object({
  mode: z.enum(["fullscreen", "region", "active_window"]),
  region: z.string().optional(),
  output: z.string().optional(),
  format: z.string().optional(),
  quality: z.number().int().optional(),
  showConfig: z.boolean().optional(),
  setDefaultFormat: z.string().optional(),
  setDefaultDir: z.string().optional(),
  resetConfig: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type CaptureSession = Pick<Capturer, "platform" | "quickCapture">;

export type CliDeps = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  loadConfig: (file?: string) => Promise<ConfigStore>;
  createCapturer: () => Promise<CaptureSession>;
  now: () => Date;
};

function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

const defaultDeps: CliDeps = {
  stdout: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
  stderr: (text) => process.stderr.write(text.endsWith("\n") ? text : `${text}\n`),
  loadConfig: (file) => ConfigStore.load(file),
  createCapturer: () => createCapturer(),
  now: () => new Date(),
};

export function createProgram(deps: Pick<CliDeps, "stdout" | "stderr">): Command {
  return new Command()
    .name(APP_NAME)
    .description("Cross-platform desktop screenshot capture tool")
    .version(APP_VERSION, "--version", "output the version number")
    .addOption(
      new Option("-m, --mode <mode>", "screenshot capture mode")
        .choices(CAPTURE_MODES)
        .default("fullscreen"),
    )
    .option("-r, --region <x,y,w,h>", "region to capture as 'x,y,width,height' (required for region mode)")
    .option("-o, --output <path>", "output file path (default: auto-generated in the configured directory)")
    .addOption(
      new Option("-f, --format <format>", "output image format (default: configured format)").choices(
        FORMAT_CHOICES,
      ),
    )
    .option("-q, --quality <n>", "JPEG quality 1-100 (default: configured quality)", parseInteger)
    .option("--show-config", "display current configuration and exit")
    .option("--set-default-format <format>", "set default output format in config")
    .option("--set-default-dir <path>", "set default output directory in config")
    .option("--reset-config", "restore the built-in configuration and exit")
    .option("--config <path>", "use an alternate configuration file")
    .option("-v, --verbose", "enable verbose output")
    .option("--quiet", "suppress all output except errors")
    .addHelpText("after", EXAMPLES)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text),
      writeErr: (text) => deps.stderr(text),
    });
}

function showConfig(config: ConfigStore, reporter: Reporter) {
  reporter.print("Current Configuration:");
  reporter.print(`  Default Format: ${config.defaultFormat}`);
  reporter.print(`  Default Directory: ${config.defaultOutputDir}`);
  reporter.print(`  Default Quality: ${config.defaultQuality}`);
  reporter.print(`  Config File: ${config.file}`);
}

async function updateConfig(
  config: ConfigStore,
  intent: Extract<CommandIntent, { kind: "UpdateConfig" }>,
  reporter: Reporter,
) {
  if (intent.format !== null) {
    config.setDefaultFormat(intent.format);
    reporter.info(`Default format set to: ${config.defaultFormat}`);
  }
  if (intent.directory !== null) {
    config.setDefaultOutputDir(intent.directory);
    reporter.info(`Default directory set to: ${config.defaultOutputDir}`);
  }
  await config.save();
  reporter.info("Configuration saved successfully");
}

async function capture(
  config: ConfigStore,
  intent: Extract<CommandIntent, { kind: "Capture" }>,
  reporter: Reporter,
  deps: CliDeps,
): Promise<number> {
  const format = intent.format ?? config.defaultFormat;
  if (!isKnownFormat(format)) {
    reporter.error(`Error: Unsupported image format: ${format.toUpperCase()}`);
    return EXIT_FAILURE;
  }
  const quality = intent.quality ?? config.defaultQuality;
  const output = resolveOutputPath({
    output: intent.output ?? undefined,
    directory: config.defaultOutputDir,
    format,
    now: deps.now(),
  });

  reporter.debug("Initializing screenshot capturer...");
  const capturer = await deps.createCapturer();
  reporter.debug(`Platform: ${capturer.platform}`);
  reporter.debug(`Capture mode: ${intent.mode}`);
  if (intent.region) {
    const { x, y, width, height } = intent.region;
    reporter.debug(`Region: x=${x}, y=${y}, width=${width}, height=${height}`);
  }
  reporter.debug(`Output: ${path.resolve(output)} (${format.toUpperCase()}, quality ${quality})`);
  reporter.debug("Capturing screenshot...");

  const result = await capturer.quickCapture({
    output,
    mode: intent.mode,
    region: intent.region ?? undefined,
    format,
    quality,
  });
  if (result.kind === "saved") {
    reporter.info(`Screenshot saved to: ${result.path}`);
  }
  return EXIT_SUCCESS;
}

export function handleInterrupt(
  stderr: (text: string) => void = defaultDeps.stderr,
  exit: (code: number) => void = (code) => process.exit(code),
) {
  stderr("\nOperation cancelled by user");
  exit(EXIT_INTERRUPTED);
}

function reportCaptureError(error: CaptureError, reporter: Reporter) {
  reporter.error(`Error: ${error.message}`);
  const hint = captureFailureHint(error.reason);
  if (hint) reporter.error(`Hint: ${hint}`);
  reporter.trace(error);
}

export async function run(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const program = createProgram(deps);

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_FAILURE;
    }
    throw error;
  }

  const options = cliOptionsSchema.parse(program.opts());
  const reporter = createReporter({
    verbose: options.verbose,
    quiet: options.quiet,
    stdout: deps.stdout,
    stderr: deps.stderr,
  });

  try {
    const intent = resolveCommandIntent(options);
    if (intent.kind === "Invalid") {
      reporter.error(`Error: ${intent.reason}`);
      return EXIT_FAILURE;
    }

    const config = await deps.loadConfig(options.config);
    if (config.recovered) {
      reporter.debug(`Could not read ${config.file}; using built-in defaults for this run`);
    }
    for (const key of config.repairedKeys) {
      reporter.debug(`Ignoring invalid value for ${key} in ${config.file}`);
    }

    switch (intent.kind) {
      case "ShowConfig":
        showConfig(config, reporter);
        return EXIT_SUCCESS;
      case "ResetConfig":
        await config.reset();
        reporter.info("Configuration reset to defaults");
        return EXIT_SUCCESS;
      case "UpdateConfig":
        await updateConfig(config, intent, reporter);
        return EXIT_SUCCESS;
      case "Capture":
        return await capture(config, intent, reporter, deps);
    }
  } catch (error) {
    if (isCaptureError(error)) {
      reportCaptureError(error, reporter);
      return EXIT_FAILURE;
    }
    reporter.error(`Unexpected error: ${describeError(error)}`);
    reporter.trace(error);
    return EXIT_FAILURE;
  }
}
