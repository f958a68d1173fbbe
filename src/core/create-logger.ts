import { FileSink } from "../adapters/file-sink.js";
import { StreamSink } from "../adapters/stream-sink.js";
import type { LogSink } from "../interfaces/sink.js";
import { type Destination, type LoggerConfig, resolveConfig } from "../types/config.js";
import { Logger, type LoggerOptions } from "./logger.js";

/** Runtime hooks that have no configuration-file form. */
export type LoggerHooks = Pick<LoggerOptions, "clock" | "terminator" | "onSinkError">;

function sinkFor(destination: Destination): LogSink {
  if (destination === "stderr") return new StreamSink(process.stderr);
  if (destination === "stdout") return new StreamSink(process.stdout);
  return new FileSink(destination.file);
}

/**
 * Build a logger from validated configuration.
 * Throws ConfigError for invalid config and SinkError when a log file cannot be opened.
 */
export function createLogger(config: LoggerConfig = {}, hooks: LoggerHooks = {}): Logger {
  const resolved = resolveConfig(config);
  return new Logger({
    ...hooks,
    name: resolved.name,
    level: resolved.level,
    dateFormat: resolved.dateFormat,
    utc: resolved.utc,
    hexRendering: resolved.hexRendering,
    sink: sinkFor(resolved.destination),
  });
}
