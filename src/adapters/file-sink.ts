import { closeSync, openSync, writeSync } from "node:fs";
import { errorMessage, SinkError } from "../errors.js";
import type { LogSink } from "../interfaces/sink.js";

function openForAppend(path: string): number {
  try {
    return openSync(path, "a");
  } catch (err) {
    throw new SinkError(`Cannot open log file ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Appends lines to a file the sink owns. Writes are synchronous, so a line is
 * on disk before `write` returns and lines from separate calls never interleave.
 */
export class FileSink implements LogSink {
  readonly path: string;
  private fd: number | null;

  constructor(path: string) {
    this.path = path;
    this.fd = openForAppend(path);
  }

  write(line: string): void {
    if (this.fd === null) {
      throw new SinkError(`Log file ${this.path} is closed`);
    }
    try {
      writeSync(this.fd, `${line}\n`);
    } catch (err) {
      throw new SinkError(`Write to ${this.path} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Idempotent. */
  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  get closed(): boolean {
    return this.fd === null;
  }
}
