/**
 * Argument parser for the datamask CLI.
 *
 * Hand-rolled; the surface is a handful of flags and one positional.
 */

export interface MaskArgs {
  command: "mask";
  /** Input file. Null or "-" reads stdin. */
  file: string | null;
  /** Comma-separated field list, or null for config/env/defaults. */
  fields: string | null;
  /** True when --disable was passed. */
  disable: boolean;
  config: string | null;
  failClosed: boolean;
  verbose: boolean;
}

export interface HelpArgs {
  command: "help";
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs = MaskArgs | HelpArgs | VersionArgs;

export interface ParseError {
  error: string;
}

export type ParseResult = ParsedArgs | ParseError;

export function isError(result: ParseResult): result is ParseError {
  return "error" in result;
}

const MAIN_HELP = `
datamask [options] [file]

Mask sensitive fields in a JSON document. Reads <file>, or stdin when no
file (or "-") is given, and writes the masked document to stdout.

Options:
  --fields <list>     Comma-separated field names to mask
                      (default: name, phone, phonenumber, phone_number,
                      email, emailaddress, email_address; env: DATAMASK_FIELDS)
  --config <path>     Path to a masking config JSON file
  --disable           Pass the document through unmasked (env: DATAMASK_ENABLED=false)
  --fail-closed       Fail instead of passing malformed documents through
                      (env: DATAMASK_FAIL_CLOSED=1)
  --verbose           Log the active configuration and mask counts to stderr
  -v, --version       Show version
  -h, --help          Show this help

Examples:
  datamask payload.json                     Mask with the default fields
  cat payload.json | datamask --fields name,email
  datamask --config mask.json - < payload.json
`.trim();

export function getHelp(): string {
  return MAIN_HELP;
}

export function parseArgs(argv: string[]): ParseResult {
  // Strip node and script path
  const args = argv.slice(2);

  const result: MaskArgs = {
    command: "mask",
    file: null,
    fields: null,
    disable: false,
    config: null,
    failClosed: false,
    verbose: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help" };
    }

    if (arg === "--version" || arg === "-v") {
      return { command: "version" };
    }

    if (arg === "--fields") {
      i++;
      if (i >= args.length) return { error: "--fields requires a value" };
      result.fields = args[i];
    } else if (arg === "--config") {
      i++;
      if (i >= args.length) return { error: "--config requires a value" };
      result.config = args[i];
    } else if (arg === "--disable") {
      result.disable = true;
    } else if (arg === "--fail-closed") {
      result.failClosed = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      return { error: `Unknown option: ${arg}\n\n${MAIN_HELP}` };
    } else if (result.file !== null) {
      return { error: `Unexpected argument: ${arg}\n\n${MAIN_HELP}` };
    } else {
      result.file = arg;
    }

    i++;
  }

  return result;
}
