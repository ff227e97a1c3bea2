import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, noopLogger } from "../logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should prefix messages with the tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createConsoleLogger("batch-ingest").warn("p1.zip failed", { attempt: 1 });

    expect(warn).toHaveBeenCalledWith("[batch-ingest] p1.zip failed", { attempt: 1 });
  });

  it("should drop messages below warn by default", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createConsoleLogger("test");
    logger.info("quiet");
    logger.error("loud");

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[test] loud");
  });

  it("should write nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createConsoleLogger("test", "silent").error("nothing");

    expect(error).not.toHaveBeenCalled();
  });

  it("should write debug output at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    createConsoleLogger("test", "debug").debug("details");

    expect(debug).toHaveBeenCalledWith("[test] details");
  });
});

describe("noopLogger", () => {
  it("should never write", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    noopLogger.warn("ignored");

    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});
