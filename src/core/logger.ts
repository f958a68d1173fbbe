import { EMERGENCY_EXIT_CODE, terminateProcess } from "../adapters/process-terminator.js";
import { StreamSink } from "../adapters/stream-sink.js";
import { SinkError } from "../errors.js";
import type { LogSink } from "../interfaces/sink.js";
import type { Terminator } from "../interfaces/terminator.js";
import { renderDate } from "./date-pattern.js";
import { FormatEngine, type HexRendering } from "./format-engine.js";
import { isAccepted, Severity, severityLabel } from "./severity.js";

export const DEFAULT_DATE_FORMAT = "%A %b %d %H:%M:%S %Y \t->\t ";
export const DEFAULT_LOGGER_NAME = "default";

export interface LoggerOptions {
  name?: string;
  /** Destination for accepted lines. Default: a StreamSink over process.stderr. */
  sink?: LogSink;
  /** Minimum severity written. Default: Info. */
  level?: Severity;
  /** strftime-style pattern for the line stamp. */
  dateFormat?: string;
  /** Stamp in UTC instead of local time. */
  utc?: boolean;
  hexRendering?: HexRendering;
  /** Time source for the stamp. */
  clock?: () => Date;
  /** Called by emergency() after the line is written. Default: exits the process. */
  terminator?: Terminator;
  /**
   * Receives sink failures, including those a sink reports after the write returned.
   * Logging calls themselves never throw. Default: process warning.
   */
  onSinkError?: (err: SinkError) => void;
}

const reportSinkError = (err: SinkError): void => {
  process.emitWarning(err);
};

/**
 * A named logger with its own sink and severity threshold.
 *
 * Every level method renders the message, writes `<stamp>[<LABEL>] <message>`
 * when the level passes the threshold, and returns the rendered message
 * whether or not it was written. Emergency lines are never filtered.
 */
export class Logger {
  private _name: string;
  private _level: Severity;
  private _dateFormat: string;
  private readonly sink: LogSink;
  private readonly engine: FormatEngine;
  private readonly utc: boolean;
  private readonly clock: () => Date;
  private readonly terminator: Terminator;
  private readonly onSinkError: (err: SinkError) => void;

  constructor(options: LoggerOptions = {}) {
    this._name = options.name ?? DEFAULT_LOGGER_NAME;
    this._level = options.level ?? Severity.Info;
    this._dateFormat = options.dateFormat ?? DEFAULT_DATE_FORMAT;
    this.sink = options.sink ?? new StreamSink();
    this.engine = new FormatEngine({ hexRendering: options.hexRendering });
    this.utc = options.utc ?? false;
    this.clock = options.clock ?? (() => new Date());
    this.terminator = options.terminator ?? terminateProcess;
    this.onSinkError = options.onSinkError ?? reportSinkError;
    this.sink.setErrorHandler?.(this.onSinkError);
  }

  get name(): string {
    return this._name;
  }

  get level(): Severity {
    return this._level;
  }

  get dateFormat(): string {
    return this._dateFormat;
  }

  setLevel(level: Severity): void {
    this._level = level;
  }

  setName(name: string): void {
    this._name = name;
  }

  setDateFormat(pattern: string): void {
    this._dateFormat = pattern;
  }

  /** Render a message without stamping or writing it. */
  format<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    return this.engine.format(fmt, ...args);
  }

  /** The full line as it would be written for `message` at `level`. */
  stamp(level: Severity, message: string): string {
    const date = renderDate(this._dateFormat, this.clock(), { utc: this.utc });
    return `${date}[${severityLabel(level)}] ${message}`;
  }

  /**
   * Render and, when accepted, write a message at any level.
   * Emergency messages are always written but do not end the process here;
   * use {@link emergency} for the fatal path.
   */
  log<Args extends readonly unknown[]>(level: Severity, fmt: string, ...args: Args): string {
    const message = this.engine.format(fmt, ...args);
    if (level === Severity.Emergency || isAccepted(level, this._level)) {
      this.write(this.stamp(level, message));
    }
    return message;
  }

  verbose<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    return this.log(Severity.Verbose, fmt, ...args);
  }

  debug<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    return this.log(Severity.Debug, fmt, ...args);
  }

  info<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    return this.log(Severity.Info, fmt, ...args);
  }

  warning<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    return this.log(Severity.Warning, fmt, ...args);
  }

  error<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    return this.log(Severity.Error, fmt, ...args);
  }

  /** Write the message regardless of threshold, then terminate. */
  emergency<Args extends readonly unknown[]>(fmt: string, ...args: Args): string {
    const message = this.log(Severity.Emergency, fmt, ...args);
    this.terminate();
    return message;
  }

  /** Hand the emergency exit status to the terminator. */
  terminate(): void {
    this.terminator(EMERGENCY_EXIT_CODE);
  }

  /** Release the sink if it owns its destination. */
  close(): void {
    this.sink.close?.();
  }

  toString(): string {
    return `Logger(${this._name}, ${severityLabel(this._level)})`;
  }

  private write(line: string): void {
    try {
      this.sink.write(line);
    } catch (err) {
      this.onSinkError(
        err instanceof SinkError ? err : new SinkError("Sink write failed", { cause: err }),
      );
    }
  }
}
