/**
 * Logger Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { createLogger, parseLogLevel, type LogSink } from "../src/logger";

class CaptureSink implements LogSink {
  lines: Array<[string, unknown[]]> = [];

  log(...args: unknown[]): void {
    this.lines.push(["log", args]);
  }

  warn(...args: unknown[]): void {
    this.lines.push(["warn", args]);
  }

  error(...args: unknown[]): void {
    this.lines.push(["error", args]);
  }
}

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    assert.strictEqual(parseLogLevel("DEBUG"), "debug");
    assert.strictEqual(parseLogLevel("warn"), "warn");
    assert.strictEqual(parseLogLevel("Error"), "error");
  });

  it("falls back to info", () => {
    assert.strictEqual(parseLogLevel("verbose"), "info");
    assert.strictEqual(parseLogLevel(""), "info");
  });
});

describe("createLogger", () => {
  it("prefixes the scope and routes by level", () => {
    const sink = new CaptureSink();
    const log = createLogger("Monitor", "debug", sink);

    log.debug("scan", 2);
    log.info("ready");
    log.warn("slow");

    assert.deepStrictEqual(sink.lines, [
      ["log", ["[Monitor]", "scan", 2]],
      ["log", ["[Monitor]", "ready"]],
      ["warn", ["[Monitor]", "slow"]],
    ]);
  });

  it("drops messages below the level", () => {
    const sink = new CaptureSink();
    const log = createLogger("Monitor", "warn", sink);

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");

    assert.deepStrictEqual(sink.lines, [["warn", ["[Monitor]", "shown"]]]);
  });

  it("logs errors with their stack", () => {
    const sink = new CaptureSink();
    const log = createLogger("Monitor", "error", sink);
    const err = new Error("disk gone");

    log.error("Scan failed:", err, "opz");

    assert.deepStrictEqual(sink.lines, [["error", ["[Monitor]", "Scan failed:", err.stack, "opz"]]]);
  });
});
