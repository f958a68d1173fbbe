import { errorMessage, SinkError } from "../errors.js";
import type { LogSink, SinkErrorHandler } from "../interfaces/sink.js";

const warnSinkError: SinkErrorHandler = (err) => {
  process.emitWarning(err);
};

/**
 * Writes lines to a borrowed writable stream (stderr by default).
 * The stream is never ended by the sink.
 *
 * Streams report most write failures asynchronously, first through the write
 * callback and then as an `'error'` event carrying the same error. Both paths
 * reach the error handler once, wrapped in SinkError.
 */
export class StreamSink implements LogSink {
  private stream: NodeJS.WritableStream;
  private handler: SinkErrorHandler;
  private lastReported: unknown = undefined;
  private readonly onStreamError = (err: unknown): void => {
    this.report(err);
  };

  constructor(stream: NodeJS.WritableStream = process.stderr, onError?: SinkErrorHandler) {
    this.stream = stream;
    this.handler = onError ?? warnSinkError;
    this.stream.on("error", this.onStreamError);
  }

  setErrorHandler(handler: SinkErrorHandler): void {
    this.handler = handler;
  }

  write(line: string): void {
    try {
      this.stream.write(`${line}\n`, (err) => {
        if (err) this.report(err);
      });
    } catch (err) {
      throw new SinkError(`Stream write failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Detach from the stream; the stream itself stays open. */
  close(): void {
    this.stream.removeListener("error", this.onStreamError);
  }

  private report(err: unknown): void {
    if (err === this.lastReported) return;
    this.lastReported = err;
    this.handler(new SinkError(`Stream write failed: ${errorMessage(err)}`, { cause: err }));
  }
}
