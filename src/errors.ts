export class RelaylogError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RelaylogError";
    this.code = code;
  }
}

// ── Domain errors ──

/**
 * Raised when an argument list is indexed outside its bounds.
 * The format engine guards every access, so seeing this means the
 * lower-level `ArgumentList` API was misused.
 */
export class ArgumentIndexError extends RelaylogError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`Argument index ${index} out of range (argument count: ${length})`, "ARG_INDEX");
    this.name = "ArgumentIndexError";
    this.index = index;
    this.length = length;
  }
}

export class SinkError extends RelaylogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SINK", options);
    this.name = "SinkError";
  }
}

export class ConfigError extends RelaylogError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to RelaylogError (preserves cause chain). */
export function toRelaylogError(value: unknown): RelaylogError {
  if (value instanceof RelaylogError) return value;
  if (value instanceof Error) return new RelaylogError(value.message, "UNKNOWN", { cause: value });
  return new RelaylogError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
