#!/usr/bin/env -S node --import tsx

/**
 * datamask CLI entry point.
 *
 * Binds {@link runCli} to the real process streams and environment.
 */

import { runCli } from "./run.js";

runCli(process.argv, {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("datamask: unexpected error:", err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
