import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, loadConfig, resolveConfig } from "../src/index.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "warn",
      strictFinish: true,
      privateSeedBytes: 32,
      entropyBytes: 32,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      DUPLEXFS_LOG_LEVEL: " DEBUG ",
      DUPLEXFS_STRICT_FINISH: "no",
      DUPLEXFS_SEED_BYTES: "64",
      DUPLEXFS_ENTROPY_BYTES: "48",
    });
    expect(config).toEqual({ logLevel: "debug", strictFinish: false, privateSeedBytes: 64, entropyBytes: 48 });
  });

  it("falls back on unparsable numbers", () => {
    expect(loadConfig({ DUPLEXFS_SEED_BYTES: "lots" }).privateSeedBytes).toBe(32);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ DUPLEXFS_LOG_LEVEL: "loud" })).toThrow(/^invalid transcript config: logLevel: /);
    expect(() => loadConfig({ DUPLEXFS_SEED_BYTES: "8" })).toThrow(/invalid transcript config: privateSeedBytes/);
    expect(() => loadConfig({ DUPLEXFS_ENTROPY_BYTES: "4096" })).toThrow(/entropyBytes/);
  });

  it("validates explicit overrides", () => {
    expect(resolveConfig({ entropyBytes: 64 }).entropyBytes).toBe(64);
    expect(() => resolveConfig({ privateSeedBytes: 1 })).toThrow(/privateSeedBytes/);
  });
});

describe("createLogger", () => {
  it("writes lines at or above its level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createLogger("warn");
    logger.debug("hidden");
    logger.warn("hello");
    logger.error("failed", new Error("bad input"));

    expect(debug).not.toHaveBeenCalled();
    expect(warn.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[duplexfs\] WARN: hello$/);
    expect(error.mock.calls[0][0]).toMatch(/\[duplexfs\] ERROR: failed \(bad input\)$/);
  });

  it("is quiet when silent", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("silent");
    logger.info("x");
    logger.error("y");
    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
