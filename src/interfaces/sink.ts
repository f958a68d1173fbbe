/**
 * Output destination for rendered log lines.
 * Loggers write one line per accepted message; the sink adds the line terminator.
 * @module
 */

import type { SinkError } from "../errors.js";

export type SinkErrorHandler = (err: SinkError) => void;

export interface LogSink {
  /** Synchronous failures throw; failures reported later go to the error handler. */
  write(line: string): void;
  /** Release a destination the sink owns. Sinks over borrowed destinations omit this. */
  close?(): void;
  /** Route failures that surface after `write` has returned. */
  setErrorHandler?(handler: SinkErrorHandler): void;
}
