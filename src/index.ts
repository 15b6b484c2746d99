#!/usr/bin/env node
import { EXIT_CODES, runCli } from "./cli";
import { startScoreboard } from "./scoreboardApp";
import { logError } from "./types/errors";
import { withSource } from "./logger";

const log = withSource("cli");

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  start: startScoreboard,
})
  .then((code) => {
    // Exit without waiting on an aborted fetch
    process.exit(code);
  })
  .catch((err: unknown) => {
    logError(log, err, { operation: "main" });
    process.stderr.write(`scoreline: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(EXIT_CODES.STARTUP_FAILURE);
  });
