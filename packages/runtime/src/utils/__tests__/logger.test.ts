import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, resolveLogLevel, scopedLogger } from "../logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves log levels case-insensitively and falls back to warn", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel(" silent ")).toBe("silent");
    expect(resolveLogLevel("verbose")).toBe("warn");
    expect(resolveLogLevel("")).toBe("warn");
  });

  it("prefixes messages with the scope and respects the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const logger = createConsoleLogger("ChannelMonitor", "info");

    logger.debug("hidden");
    logger.info("visible", { channel: "notes" });
    logger.info("plain");

    expect(debug).not.toHaveBeenCalled();
    expect(info.mock.calls).toEqual([
      ["[ChannelMonitor] visible", { channel: "notes" }],
      ["[ChannelMonitor] plain"],
    ]);
  });

  it("prints nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createConsoleLogger("ToolCallTracker", "silent").error("boom");
    expect(error).not.toHaveBeenCalled();
  });

  it("adds a sub-scope to an existing logger", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = scopedLogger(createConsoleLogger("StreamSession", "warn"), "ToolCallTracker");

    logger.warn("orphan chunk");

    expect(warn).toHaveBeenCalledWith("[StreamSession] ToolCallTracker: orphan chunk");
  });
});
