import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config.js";
import { canonicalize } from "../src/utils/canonical.js";
import { extractErrorMessage, logger, serializeError, setLogLevel } from "../src/utils/logger.js";

describe("loadConfig", () => {
  it("defaults to info / text", () => {
    expect(loadConfig({})).toEqual({ logLevel: "info", outputFormat: "text" });
  });

  it("reads values case-insensitively", () => {
    expect(loadConfig({ LOG_LEVEL: "DEBUG", OPTION_CODES_OUTPUT: " Json " })).toEqual({
      logLevel: "debug",
      outputFormat: "json",
    });
  });

  it("ignores unsupported values", () => {
    expect(loadConfig({ LOG_LEVEL: "verbose", OPTION_CODES_OUTPUT: "xml" })).toEqual({
      logLevel: "info",
      outputFormat: "text",
    });
  });
});

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("drops messages below the level", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("warn");
    logger.info("quiet");
    logger.debug("quieter");
    expect(err).not.toHaveBeenCalled();
  });

  it("writes warn lines with compact meta", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.warn("careful", { a: 1, skipped: undefined });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[WARN\] careful \{"a":1\}$/);
  });

  it("serializes errors found in meta", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.error("boom", { error: new Error("bad") });
    const line = String(err.mock.calls[0][0]);
    expect(line).toContain('[ERROR] boom {"error":{"name":"Error","message":"bad"');
  });
});

describe("error helpers", () => {
  it("serializes non-errors", () => {
    expect(serializeError("plain")).toEqual({ message: "plain" });
    expect(serializeError({ code: 1 })).toEqual({ code: 1 });
  });

  it("extracts messages", () => {
    expect(extractErrorMessage(new TypeError("nope"))).toBe("nope");
    expect(extractErrorMessage(404)).toBe("404");
  });
});

describe("canonicalize", () => {
  it("sorts keys recursively and trims strings", () => {
    expect(canonicalize({ b: 1, a: { d: " x ", c: [2, 1] } })).toBe('{"a":{"c":[2,1],"d":"x"},"b":1}');
  });

  it("indents when asked", () => {
    expect(canonicalize({ b: 1, a: 2 }, 2)).toBe('{\n  "a": 2,\n  "b": 1\n}');
  });
});
