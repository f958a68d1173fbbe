import { ArgumentIndexError } from "../errors.js";
import { safeJson } from "../utils/safe-json.js";

/**
 * One call-site argument, lifted into a closed variant so the format engine
 * can address arguments by position and dispatch on `kind` instead of on
 * each value's static type.
 */
export type FormatArg =
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number }
  | { kind: "bigint"; value: bigint }
  | { kind: "text"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "nullish"; value: null | undefined }
  | { kind: "symbol"; value: symbol }
  | { kind: "function"; name: string }
  | { kind: "error"; value: Error }
  | { kind: "date"; value: Date }
  | { kind: "object"; value: object };

export type FormatArgKind = FormatArg["kind"];

export function toFormatArg(value: unknown): FormatArg {
  if (typeof value === "string") return { kind: "text", value };
  if (typeof value === "number") {
    return Number.isInteger(value) ? { kind: "integer", value } : { kind: "float", value };
  }
  if (typeof value === "bigint") return { kind: "bigint", value };
  if (typeof value === "boolean") return { kind: "boolean", value };
  if (typeof value === "symbol") return { kind: "symbol", value };
  if (typeof value === "function") return { kind: "function", name: value.name };
  if (typeof value === "object") {
    if (value === null) return { kind: "nullish", value: null };
    if (value instanceof Error) return { kind: "error", value };
    if (value instanceof Date) return { kind: "date", value };
    return { kind: "object", value };
  }
  return { kind: "nullish", value: undefined };
}

/** The value's natural textual form, with integers in decimal. */
export function renderNatural(arg: FormatArg): string {
  switch (arg.kind) {
    case "integer":
    case "float":
    case "bigint":
    case "boolean":
      return String(arg.value);
    case "text":
      return arg.value;
    case "nullish":
      return arg.value === null ? "null" : "undefined";
    case "symbol":
      return arg.value.toString();
    case "function":
      return `[Function ${arg.name || "anonymous"}]`;
    case "error":
      return arg.value.message ? `${arg.value.name}: ${arg.value.message}` : arg.value.name;
    case "date":
      return Number.isNaN(arg.value.getTime()) ? "Invalid Date" : arg.value.toISOString();
    case "object":
      return safeJson(arg.value);
  }
}

/**
 * Fixed-arity argument sequence with positional access.
 * Indexing outside `[0, length)` is a contract violation and throws
 * {@link ArgumentIndexError}.
 */
export class ArgumentList {
  private readonly args: readonly FormatArg[];

  constructor(values: readonly unknown[]) {
    this.args = values.map(toFormatArg);
  }

  get length(): number {
    return this.args.length;
  }

  at(index: number): FormatArg {
    if (!Number.isInteger(index) || index < 0 || index >= this.args.length) {
      throw new ArgumentIndexError(index, this.args.length);
    }
    return this.args[index];
  }

  /** Apply `visitor` to the argument at `index`, whatever its kind. */
  visit<R>(index: number, visitor: (arg: FormatArg) => R): R {
    return visitor(this.at(index));
  }
}
