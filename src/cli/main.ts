#!/usr/bin/env node
import { EXIT_FAILURE, handleInterrupt, run } from "./program";

process.once("SIGINT", () => handleInterrupt());

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_FAILURE;
  });
