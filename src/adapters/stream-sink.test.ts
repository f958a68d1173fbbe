import { PassThrough, Writable } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { SinkError } from "../errors.js";
import { StreamSink } from "./stream-sink.js";

const failingStream = (): Writable =>
  new Writable({
    write(_chunk, _encoding, callback) {
      callback(new Error("EPIPE"));
    },
  });

const settle = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("StreamSink", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one newline-terminated line per call", () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });
    const sink = new StreamSink(stream);

    sink.write("first");
    sink.write("second");

    expect(chunks).toEqual(["first\n", "second\n"]);
  });

  it("defaults to process.stderr", () => {
    const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    new StreamSink().write("to stderr");

    expect(spy).toHaveBeenCalledWith("to stderr\n", expect.any(Function));
  });

  it("wraps synchronous write failures in SinkError", () => {
    const stream = new PassThrough();
    vi.spyOn(stream, "write").mockImplementation(() => {
      throw new Error("EPIPE");
    });
    const sink = new StreamSink(stream);

    expect(() => sink.write("lost")).toThrow(SinkError);
    expect(() => sink.write("lost")).toThrow("Stream write failed: EPIPE");
  });

  it("reports asynchronous write failures once, wrapped in SinkError", async () => {
    const errors: SinkError[] = [];
    const stream = failingStream();
    const sink = new StreamSink(stream, (err) => errors.push(err));

    expect(() => sink.write("lost")).not.toThrow();
    await settle();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(SinkError);
    expect(errors[0]?.message).toBe("Stream write failed: EPIPE");
    expect(errors[0]?.cause).toBeInstanceOf(Error);
    expect(stream.listenerCount("error")).toBe(1);
  });

  it("routes failures to a handler installed after construction", async () => {
    const errors: SinkError[] = [];
    const sink = new StreamSink(failingStream());
    sink.setErrorHandler((err) => errors.push(err));

    sink.write("lost");
    await settle();

    expect(errors.map((err) => err.code)).toEqual(["SINK"]);
  });

  it("warns through the process when no handler is given", async () => {
    const warn = vi.spyOn(process, "emitWarning").mockImplementation(() => {});
    const sink = new StreamSink(failingStream());

    sink.write("lost");
    await settle();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBeInstanceOf(SinkError);
  });

  it("detaches its error listener on close without ending the stream", () => {
    const stream = new PassThrough();
    const sink = new StreamSink(stream);
    expect(stream.listenerCount("error")).toBe(1);

    sink.close();

    expect(stream.listenerCount("error")).toBe(0);
    expect(stream.writableEnded).toBe(false);
  });
});
