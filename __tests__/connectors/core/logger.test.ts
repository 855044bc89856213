import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger } from "../../../src/connectors/core/logger.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope and appends data as JSON", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("sync").info("Processed 50 trackers...", { page: 1 });
    expect(log).toHaveBeenCalledWith('[sync] Processed 50 trackers... {"page":1}');
  });

  it("marks warnings and errors", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger("jira");
    logger.warn("slow");
    logger.error("down");
    expect(warn).toHaveBeenCalledWith("[jira] ⚠ slow");
    expect(error).toHaveBeenCalledWith("[jira] ✗ down");
  });

  it("drops messages below its level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new ConsoleLogger("sync", "warn");
    logger.debug("hidden");
    logger.info("hidden");
    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it("child loggers extend the scope and keep the level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const child = new ConsoleLogger("vulntrack", "info").child("sync");
    child.debug("hidden");
    child.info("hello");
    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith("[vulntrack:sync] hello");
  });
});
