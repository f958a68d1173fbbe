/**
 * Severity levels, ordered by rank.
 *
 * Ranks are spaced so each level below Emergency occupies its own bit,
 * which keeps them usable as masks as well as for ordering.
 */
export enum Severity {
  Verbose = 0x00,
  Debug = 0x10,
  Info = 0x20,
  Warning = 0x40,
  Error = 0x80,
  Emergency = 0xff,
}

const SEVERITY_LABELS: Record<Severity, string> = {
  [Severity.Verbose]: "VERBOSE",
  [Severity.Debug]: "DEBUG",
  [Severity.Info]: "INFO",
  [Severity.Warning]: "WARNING",
  [Severity.Error]: "ERROR",
  [Severity.Emergency]: "EMERGENCY",
};

/** All levels, lowest rank first. */
export const SEVERITIES: readonly Severity[] = [
  Severity.Verbose,
  Severity.Debug,
  Severity.Info,
  Severity.Warning,
  Severity.Error,
  Severity.Emergency,
];

const ALIASES = new Map<string, Severity>([
  ["verbose", Severity.Verbose],
  ["trace", Severity.Verbose],
  ["debug", Severity.Debug],
  ["info", Severity.Info],
  ["warning", Severity.Warning],
  ["warn", Severity.Warning],
  ["error", Severity.Error],
  ["emergency", Severity.Emergency],
  ["fatal", Severity.Emergency],
]);

/** A message at `level` passes when its rank is at least the threshold's. */
export function isAccepted(level: Severity, threshold: Severity): boolean {
  return level >= threshold;
}

export function severityLabel(level: Severity): string {
  return SEVERITY_LABELS[level];
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "number" && SEVERITIES.some((level) => level === value);
}

/**
 * Parse a level name (case-insensitive, with `warn`/`fatal`/`trace` aliases)
 * or a decimal / `0x` rank. Returns undefined for anything unrecognized.
 */
export function parseSeverity(text: string): Severity | undefined {
  const key = text.trim().toLowerCase();
  const named = ALIASES.get(key);
  if (named !== undefined) return named;

  if (/^(0x[0-9a-f]+|\d+)$/.test(key)) {
    const rank = Number(key);
    return isSeverity(rank) ? rank : undefined;
  }
  return undefined;
}
