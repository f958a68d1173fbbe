import { loggerConfigSchema } from "../config/config-schema.js";
import type { HexRendering } from "../core/format-engine.js";
import { DEFAULT_DATE_FORMAT, DEFAULT_LOGGER_NAME } from "../core/logger.js";
import { Severity } from "../core/severity.js";
import { ConfigError } from "../errors.js";

export type Destination = "stderr" | "stdout" | { file: string };

/** Logger configuration; every field is optional. */
export interface LoggerConfig {
  name?: string; // default: "default"
  /** Threshold as a Severity or a level name ("warn", "error", ...). */
  level?: Severity | string; // default: Info
  dateFormat?: string; // default: DEFAULT_DATE_FORMAT
  utc?: boolean; // default: false (local time)
  hexRendering?: HexRendering; // default: "verbatim"
  destination?: Destination; // default: "stderr"
}

/** Fully resolved configuration with defaults applied. */
export interface ResolvedConfig {
  name: string;
  level: Severity;
  dateFormat: string;
  utc: boolean;
  hexRendering: HexRendering;
  destination: Destination;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  name: DEFAULT_LOGGER_NAME,
  level: Severity.Info,
  dateFormat: DEFAULT_DATE_FORMAT,
  utc: false,
  hexRendering: "verbatim",
  destination: "stderr",
};

export function resolveConfig(config: LoggerConfig = {}): ResolvedConfig {
  const validation = loggerConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const parsed = validation.data;
  return {
    name: parsed.name ?? DEFAULT_CONFIG.name,
    level: parsed.level ?? DEFAULT_CONFIG.level,
    dateFormat: parsed.dateFormat ?? DEFAULT_CONFIG.dateFormat,
    utc: parsed.utc ?? DEFAULT_CONFIG.utc,
    hexRendering: parsed.hexRendering ?? DEFAULT_CONFIG.hexRendering,
    destination: parsed.destination ?? DEFAULT_CONFIG.destination,
  };
}

function isHexRendering(value: string): value is HexRendering {
  return value === "verbatim" || value === "numeric";
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

/**
 * Read logger settings from the environment:
 * RELAYLOG_NAME, RELAYLOG_LEVEL, RELAYLOG_DATE_FORMAT, RELAYLOG_UTC,
 * RELAYLOG_HEX (verbatim|numeric), RELAYLOG_FILE.
 * Unset variables are left out so defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = {};

  if (env.RELAYLOG_NAME) config.name = env.RELAYLOG_NAME;
  if (env.RELAYLOG_LEVEL) config.level = env.RELAYLOG_LEVEL;
  if (env.RELAYLOG_DATE_FORMAT !== undefined) config.dateFormat = env.RELAYLOG_DATE_FORMAT;
  if (env.RELAYLOG_UTC) config.utc = TRUTHY.has(env.RELAYLOG_UTC.toLowerCase());
  if (env.RELAYLOG_FILE) config.destination = { file: env.RELAYLOG_FILE };

  const hex = env.RELAYLOG_HEX;
  if (hex) {
    if (!isHexRendering(hex)) {
      throw new ConfigError(`Invalid RELAYLOG_HEX "${hex}": expected "verbatim" or "numeric"`);
    }
    config.hexRendering = hex;
  }

  return config;
}
