import { ArgumentList, type FormatArg, renderNatural } from "./format-arg.js";

/**
 * How an argument marked by `%x` is rendered after the `0x` prefix.
 * - `verbatim`: the argument's natural text, no numeric reinterpretation (`0x255` for 255)
 * - `numeric`: integers and bigints in lowercase base 16 (`0xff` for 255)
 */
export type HexRendering = "verbatim" | "numeric";

export interface FormatEngineOptions {
  hexRendering?: HexRendering;
}

function isAlphanumeric(ch: string): boolean {
  return /^[A-Za-z0-9]$/.test(ch);
}

/**
 * Renders printf-like format strings against a call-site argument list.
 *
 * Tokens: `%%` is a literal percent; `%x` prefixes `0x` and marks the next
 * argument as hexadecimal; any other `%` consumes the next argument and skips
 * the alphanumeric specifier run that follows it. Once the arguments run out a
 * substitution renders a bare `%`. Surplus arguments are ignored.
 */
export class FormatEngine {
  readonly hexRendering: HexRendering;

  constructor(options: FormatEngineOptions = {}) {
    this.hexRendering = options.hexRendering ?? "verbatim";
  }

  format<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    return this.render(fmt, new ArgumentList(args));
  }

  render(fmt: string, args: ArgumentList): string {
    let out = "";
    let consumed = 0;
    let i = 0;

    while (i < fmt.length) {
      const percent = fmt.indexOf("%", i);
      if (percent === -1) {
        out += fmt.slice(i);
        break;
      }
      out += fmt.slice(i, percent);
      i = percent + 1;

      if (fmt[i] === "%") {
        out += "%";
        i++;
        continue;
      }

      // One-shot: applies to this substitution only
      let hex = false;
      if (fmt[i] === "x") {
        out += "0x";
        hex = true;
      }

      if (consumed < args.length) {
        out += args.visit(consumed++, (arg) => this.renderArg(arg, hex));
      } else {
        out += "%";
      }

      while (i < fmt.length && isAlphanumeric(fmt[i])) i++;
    }

    return out;
  }

  private renderArg(arg: FormatArg, hex: boolean): string {
    if (hex && this.hexRendering === "numeric") {
      if (arg.kind === "integer" || arg.kind === "bigint") return arg.value.toString(16);
    }
    return renderNatural(arg);
  }
}

const defaultEngine = new FormatEngine();

/** Format with the default (verbatim hex) engine. */
export function format<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
  return defaultEngine.format(fmt, ...args);
}
