/**
 * relaylog public API barrel.
 *
 * Re-exports the severity model, format engine, logger, registry, sinks,
 * configuration and errors that make up the public surface of the package.
 * @module
 */

// Adapters
export { FileSink } from "./adapters/file-sink.js";
export { EMERGENCY_EXIT_CODE, terminateProcess } from "./adapters/process-terminator.js";
export { StreamSink } from "./adapters/stream-sink.js";
// Configuration
export { destinationSchema, loggerConfigSchema } from "./config/config-schema.js";
// Core
export type { LoggerHooks } from "./core/create-logger.js";
export { createLogger } from "./core/create-logger.js";
export type { DatePatternOptions } from "./core/date-pattern.js";
export { renderDate } from "./core/date-pattern.js";
export {
  debug,
  emergency,
  error,
  getDefaultLogger,
  info,
  log,
  setDefaultLogger,
  verbose,
  warning,
} from "./core/default-logger.js";
export type { FormatArg, FormatArgKind } from "./core/format-arg.js";
export { ArgumentList, renderNatural, toFormatArg } from "./core/format-arg.js";
export type { FormatEngineOptions, HexRendering } from "./core/format-engine.js";
export { FormatEngine, format } from "./core/format-engine.js";
export type { LoggerOptions } from "./core/logger.js";
export { DEFAULT_DATE_FORMAT, DEFAULT_LOGGER_NAME, Logger } from "./core/logger.js";
export {
  addLogger,
  getLogger,
  getRegistry,
  LoggerRegistry,
  removeLogger,
  resetRegistry,
} from "./core/logger-registry.js";
export {
  isAccepted,
  isSeverity,
  parseSeverity,
  SEVERITIES,
  Severity,
  severityLabel,
} from "./core/severity.js";
// Errors
export {
  ArgumentIndexError,
  ConfigError,
  errorMessage,
  RelaylogError,
  SinkError,
  toRelaylogError,
} from "./errors.js";
// Interfaces
export type { LogSink, SinkErrorHandler } from "./interfaces/sink.js";
export type { Terminator } from "./interfaces/terminator.js";
export type { Destination, LoggerConfig, ResolvedConfig } from "./types/config.js";
export { configFromEnv, DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
