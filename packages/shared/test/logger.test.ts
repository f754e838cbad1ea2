import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger("scheduler", "warn");
    logger.info("ignored");
    logger.warn("kept", { interviewId: "i-1" });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/ WARN \[scheduler\] kept$/);
    expect(warn.mock.calls[0]?.[1]).toEqual({ interviewId: "i-1" });
  });

  it("prefixes child scopes", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("scheduler", "debug").child("events").error("publish failed");

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]).toHaveLength(1);
    expect(error.mock.calls[0]?.[0]).toMatch(/ ERROR \[scheduler:events\] publish failed$/);
  });

  it("stays quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("scheduler", "silent").error("nothing");

    expect(error).not.toHaveBeenCalled();
  });
});
