import { describe, expect, it, vi } from "vitest";
import { createReporter } from "./reporter";

function writers() {
  return { stdout: vi.fn(), stderr: vi.fn() };
}

describe("createReporter", () => {
  it("prints info but not debug by default", () => {
    const io = writers();
    const reporter = createReporter(io);

    reporter.info("saved");
    reporter.debug("platform: linux");

    expect(io.stdout).toHaveBeenCalledTimes(1);
    expect(io.stdout).toHaveBeenCalledWith("saved");
  });

  it("prints debug lines when verbose", () => {
    const io = writers();
    createReporter({ ...io, verbose: true }).debug("platform: linux");
    expect(io.stdout).toHaveBeenCalledWith("platform: linux");
  });

  it("keeps errors and explicit output when quiet", () => {
    const io = writers();
    const reporter = createReporter({ ...io, quiet: true, verbose: true });

    reporter.info("saved");
    reporter.debug("platform: linux");
    reporter.print("Current Configuration:");
    reporter.error("Error: boom");

    expect(io.stdout.mock.calls).toEqual([["Current Configuration:"]]);
    expect(io.stderr.mock.calls).toEqual([["Error: boom"]]);
  });

  it("only traces under verbose", () => {
    const quietIo = writers();
    createReporter(quietIo).trace(new Error("boom"));
    expect(quietIo.stderr).not.toHaveBeenCalled();

    const verboseIo = writers();
    const error = new Error("boom");
    createReporter({ ...verboseIo, verbose: true }).trace(error);
    expect(verboseIo.stderr).toHaveBeenCalledWith(error.stack);
  });
});
