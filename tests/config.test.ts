/**
 * Configuration and logging tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ConfigurationError,
  LOG_LEVEL_ENV,
  Logger,
  TreeCodec,
  consoleSink,
  resolveConfig,
} from "../src/index.js";
import { recordingSink, registry } from "./helpers.js";

describe("resolveConfig", () => {
  it("should fill in defaults", () => {
    expect(resolveConfig({}, {})).toEqual({
      logLevel: "warn",
      sourceStyle: "expanded",
      jsonIndent: 2,
      yamlLineWidth: 80,
      logSink: consoleSink,
    });
  });

  it("should read the log level from the environment", () => {
    expect(resolveConfig({}, { [LOG_LEVEL_ENV]: "DEBUG" }).logLevel).toBe("debug");
    expect(
      resolveConfig({ logLevel: "error" }, { [LOG_LEVEL_ENV]: "debug" }).logLevel
    ).toBe("error");
  });

  it("should reject invalid values", () => {
    expect(() => resolveConfig({ sourceStyle: "xml" }, {})).toThrow(ConfigurationError);
    expect(() => resolveConfig({ jsonIndent: -1 }, {})).toThrow(ConfigurationError);
    expect(() => resolveConfig({}, { [LOG_LEVEL_ENV]: "loud" })).toThrow(
      /^Invalid configuration \(logLevel: /
    );
  });

  it("should be applied by the codec", () => {
    const codec = new TreeCodec(registry, { logLevel: "silent", jsonIndent: 4 });
    expect(codec.config.jsonIndent).toBe(4);
    expect(() => new TreeCodec(registry, { yamlLineWidth: 1.5 })).toThrow(
      ConfigurationError
    );
  });
});

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should drop entries below its level", () => {
    const { entries, sink } = recordingSink();
    const logger = new Logger("test", "warn", sink);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too", { code: 7 });

    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ["warn", "shown"],
      ["error", "shown too"],
    ]);
    expect("details" in entries[0]).toBe(false);
    expect(entries[1].details).toEqual({ code: 7 });
  });

  it("should log nothing when silent", () => {
    const { entries, sink } = recordingSink();
    new Logger("test", "silent", sink).error("nothing");

    expect(entries).toEqual([]);
  });

  it("should nest scopes in children", () => {
    const { entries, sink } = recordingSink();
    new Logger("codec", "debug", sink).child("yaml").debug("read");

    expect(entries[0].scope).toBe("codec:yaml");
  });

  it("should write console lines tagged with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    new Logger("registry").warn("careful", { file: "a.json" });

    expect(warn).toHaveBeenCalledWith("[registry] careful", { file: "a.json" });
  });
});
