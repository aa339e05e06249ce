/**
 * CLI driver, separated from the process bindings so it can be tested
 * with in-memory streams.
 */

import fs from "node:fs";
import type { Readable, Writable } from "node:stream";

import {
  MaskingEngine,
  createProblemCollector,
  createStats,
  describeConfig,
  loadConfigFile,
  maskStream,
  resolveMaskingOptions,
} from "@datamask/mask";
import type { MaskLogger, MaskingOptions, MaskingStats } from "@datamask/mask";

import { getHelp, isError, parseArgs } from "./args.js";
import type { MaskArgs } from "./args.js";

export const VERSION = "0.1.0";

/** Exit codes. */
export const EXIT_OK = 0;
export const EXIT_PROBLEM = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
}

function stderrLogger(stderr: Writable, verbose: boolean): MaskLogger {
  return {
    info(message) {
      if (verbose) stderr.write(`[mask] ${message}\n`);
    },
    error(message, err) {
      const detail = err === undefined ? "" : `: ${err instanceof Error ? err.message : String(err)}`;
      stderr.write(`[mask] ${message}${detail}\n`);
    },
  };
}

/** Flags win over the config file; the file wins over the environment. */
function buildEngine(args: MaskArgs, io: CliIo, logger: MaskLogger): MaskingEngine {
  const fromFile: MaskingOptions = args.config ? loadConfigFile(args.config) : {};
  const options = resolveMaskingOptions(
    {
      enabled: args.disable ? false : fromFile.enabled,
      fields: args.fields ?? fromFile.fields,
      failClosed: args.failClosed ? true : fromFile.failClosed,
      strategies: fromFile.strategies,
    },
    io.env,
  );
  return new MaskingEngine({ ...options, logger });
}

function formatStats(stats: MaskingStats): string {
  const details = Object.entries(stats.byStrategy)
    .map(([name, count]) => `${name}=${count}`)
    .join(", ");
  return `Masked ${stats.totalMasked} field(s)${details ? `: ${details}` : ""}`;
}

/**
 * Run the CLI. Resolves with the process exit code; never rejects for
 * input or masking problems, which are written to stderr instead.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(argv);
  if (isError(parsed)) {
    io.stderr.write(`${parsed.error}\n`);
    return EXIT_USAGE;
  }

  if (parsed.command === "help") {
    io.stdout.write(`${getHelp()}\n`);
    return EXIT_OK;
  }

  if (parsed.command === "version") {
    io.stdout.write(`datamask ${VERSION}\n`);
    return EXIT_OK;
  }

  const logger = stderrLogger(io.stderr, parsed.verbose);

  let engine: MaskingEngine;
  try {
    engine = buildEngine(parsed, io, logger);
  } catch (err) {
    io.stderr.write(`datamask: ${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_USAGE;
  }
  logger.info(describeConfig(engine.config));

  const input =
    parsed.file && parsed.file !== "-" ? fs.createReadStream(parsed.file) : io.stdin;
  const collector = createProblemCollector();
  const stats = createStats();

  const output = await maskStream(engine, input, collector, stats);
  if (!output) {
    for (const problem of collector.problems) {
      io.stderr.write(`datamask: ${problem}\n`);
    }
    return EXIT_PROBLEM;
  }

  for await (const chunk of output) {
    io.stdout.write(chunk);
  }
  logger.info(formatStats(stats));

  return EXIT_OK;
}
