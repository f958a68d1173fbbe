/**
 * Level-keyed logging calls that are not bound to a logger instance.
 * They all go through one default logger (stderr, threshold Info unless
 * replaced with setDefaultLogger), independent of the named registry.
 * @module
 */

import { Logger } from "./logger.js";
import type { Severity } from "./severity.js";

let defaultLogger: Logger | null = null;

export function getDefaultLogger(): Logger {
  defaultLogger ??= new Logger();
  return defaultLogger;
}

/** Replace the default logger; `null` restores a fresh stderr logger on next use. */
export function setDefaultLogger(logger: Logger | null): void {
  defaultLogger = logger;
}

export function log<Args extends readonly unknown[]>(
  level: Severity,
  fmt: string,
  ...args: Args
): string {
  return getDefaultLogger().log(level, fmt, ...args);
}

export function verbose<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
  return getDefaultLogger().verbose(fmt, ...args);
}

export function debug<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
  return getDefaultLogger().debug(fmt, ...args);
}

export function info<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
  return getDefaultLogger().info(fmt, ...args);
}

export function warning<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
  return getDefaultLogger().warning(fmt, ...args);
}

export function error<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
  return getDefaultLogger().error(fmt, ...args);
}

/** Write through the default logger, then terminate the process. */
export function emergency<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
  return getDefaultLogger().emergency(fmt, ...args);
}
