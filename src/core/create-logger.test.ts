import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, SinkError } from "../errors.js";
import { createRecordingTerminator } from "../testing/recording-terminator.js";
import { createLogger } from "./create-logger.js";
import { Severity } from "./severity.js";

const FIXED_CLOCK = () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

describe("createLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "relaylog-create-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("applies configuration to the logger", () => {
    const logger = createLogger({ name: "relay", level: "warn", dateFormat: "%T " });
    expect(logger.name).toBe("relay");
    expect(logger.level).toBe(Severity.Warning);
    expect(logger.dateFormat).toBe("%T ");
  });

  it("writes to a file destination", () => {
    const path = join(dir, "relay.log");
    const logger = createLogger(
      { destination: { file: path }, dateFormat: "%F %T ", utc: true, hexRendering: "numeric" },
      { clock: FIXED_CLOCK },
    );

    logger.info("peer %s sent %x", "10.0.0.2", 4096);
    logger.close();

    expect(readFileSync(path, "utf-8")).toBe(
      "2024-01-02 03:04:05 [INFO] peer 10.0.0.2 sent 0x1000\n",
    );
  });

  it("writes to stdout when asked", () => {
    const spy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const logger = createLogger({ destination: "stdout", dateFormat: "" });

    logger.info("hello");

    expect(spy).toHaveBeenCalledWith("[INFO] hello\n", expect.any(Function));
  });

  it("passes runtime hooks through", () => {
    const terminator = createRecordingTerminator();
    const spy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = createLogger({ dateFormat: "" }, { terminator });

    logger.emergency("down");

    expect(spy).toHaveBeenCalledWith("[EMERGENCY] down\n", expect.any(Function));
    expect(terminator.codes).toEqual([255]);
  });

  it("throws ConfigError for invalid configuration", () => {
    expect(() => createLogger({ level: "nope" })).toThrow(ConfigError);
  });

  it("throws SinkError when the log file cannot be opened", () => {
    const path = join(dir, "no-such-dir", "relay.log");
    expect(() => createLogger({ destination: { file: path } })).toThrow(SinkError);
  });
});
