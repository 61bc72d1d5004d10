type Writer = (text: string) => void;

export type ReporterOptions = {
  verbose?: boolean;
  quiet?: boolean;
  stdout?: Writer;
  stderr?: Writer;
};

export type Reporter = {
  print: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
  error: (message: string) => void;
  trace: (error: unknown) => void;
};

export function createReporter({
  verbose = false,
  quiet = false,
  stdout = (text) => console.log(text),
  stderr = (text) => console.error(text),
}: ReporterOptions = {}): Reporter {
  return {
    print: (message) => stdout(message),
    info: (message) => {
      if (!quiet) stdout(message);
    },
    debug: (message) => {
      if (verbose && !quiet) stdout(message);
    },
    error: (message) => stderr(message),
    trace: (error) => {
      if (!verbose) return;
      stderr(error instanceof Error && error.stack ? error.stack : String(error));
    },
  };
}
