import { parseSeverity, Severity } from "../core/severity.js";
import { ConfigError, toRelaylogError } from "../errors.js";
import type { LoggerConfig } from "../types/config.js";

export interface CliOptions {
  help: boolean;
  /** Severity of the message being written. */
  level: Severity;
  /** Print the rendered message on stdout as well. */
  echo: boolean;
  /** Logger settings given on the command line; merged over the environment. */
  config: LoggerConfig;
  format: string;
  args: (string | number)[];
}

export const HELP_TEXT = `
  relaylog — write one formatted log line

  Usage: relaylog [options] <format> [args...]

  Format tokens:
    %%                     literal percent
    %x                     0x-prefixed argument (hex with --hex numeric)
    %s, %d, %<alnum>       next argument

  Options:
    --level <severity>     Message severity (default: info)
    --threshold <severity> Minimum severity written (default: info)
    --name <name>          Logger name
    --date-format <pat>    strftime-style stamp pattern
    --utc                  Stamp in UTC
    --hex <mode>           verbatim | numeric (default: verbatim)
    --file <path>          Append to a file instead of stderr
    --echo                 Also print the rendered message on stdout
    --help, -h             Show this help

  Severities: verbose, debug, info, warning, error, emergency.
  An emergency message exits with status 255.
`;

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i];
  if (value === undefined) throw new ConfigError(`${flag} requires a value`);
  return value;
}

function requireSeverity(text: string, flag: string): Severity {
  const level = parseSeverity(text);
  if (level === undefined) throw new ConfigError(`${flag}: unknown severity "${text}"`);
  return level;
}

/** Integer-looking arguments become numbers so %x has something to render. */
function coerceArg(arg: string): string | number {
  if (/^-?\d+$/.test(arg)) {
    const n = Number(arg);
    if (Number.isSafeInteger(n)) return n;
  }
  return arg;
}

/** Parse `process.argv`-shaped input (node binary and script path first). */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    level: Severity.Info,
    echo: false,
    config: {},
    format: "",
    args: [],
  };
  const positional: string[] = [];
  let optionsEnded = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    // Options stop at "--" or at the format string
    if (optionsEnded || positional.length > 0) {
      positional.push(arg);
      continue;
    }
    if (arg === "--") {
      optionsEnded = true;
      continue;
    }
    switch (arg) {
      case "--level":
        options.level = requireSeverity(requireValue(argv, ++i, arg), arg);
        break;
      case "--threshold":
        options.config.level = requireSeverity(requireValue(argv, ++i, arg), arg);
        break;
      case "--name":
        options.config.name = requireValue(argv, ++i, arg);
        break;
      case "--date-format":
        options.config.dateFormat = requireValue(argv, ++i, arg);
        break;
      case "--utc":
        options.config.utc = true;
        break;
      case "--hex": {
        const mode = requireValue(argv, ++i, arg);
        if (mode !== "verbatim" && mode !== "numeric") {
          throw new ConfigError(`--hex must be "verbatim" or "numeric", got "${mode}"`);
        }
        options.config.hexRendering = mode;
        break;
      }
      case "--file":
        options.config.destination = { file: requireValue(argv, ++i, arg) };
        break;
      case "--echo":
        options.echo = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        return options;
      default:
        if (arg.startsWith("-") && arg.length > 1) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length === 0) {
    throw new ConfigError("Missing format string");
  }
  const [format, ...rest] = positional;
  options.format = format;
  options.args = rest.map(coerceArg);
  return options;
}

/** One-line report for a startup failure, tagged with its error code. */
export function describeFailure(err: unknown): string {
  const failure = toRelaylogError(err);
  return `Error [${failure.code}]: ${failure.message}`;
}
