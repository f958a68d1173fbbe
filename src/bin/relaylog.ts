#!/usr/bin/env node
import { type CliOptions, describeFailure, HELP_TEXT, parseArgs } from "../cli/parse-args.js";
import { createLogger } from "../core/create-logger.js";
import type { Logger } from "../core/logger.js";
import { Severity } from "../core/severity.js";
import { configFromEnv } from "../types/config.js";

function main(argv: string[]): number {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    console.error(`${describeFailure(err)}\nRun with --help for usage.`);
    return 1;
  }

  if (options.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  let logger: Logger;
  try {
    logger = createLogger({ ...configFromEnv(), ...options.config });
  } catch (err) {
    console.error(describeFailure(err));
    return 1;
  }

  const message =
    options.level === Severity.Emergency
      ? logger.emergency(options.format, ...options.args)
      : logger.log(options.level, options.format, ...options.args);
  if (options.echo) console.log(message);

  logger.close();
  return 0;
}

process.exitCode = main(process.argv);
