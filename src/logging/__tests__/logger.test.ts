import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger } from "../logger.js";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes scoped lines to stderr with data as JSON", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger({ scope: "termctx" });

    logger.info("Fetched", { term: "aspirin" });
    logger.child("arxiv").error("Request failed");

    expect(warn.mock.calls).toEqual([['[termctx] INFO Fetched {"term":"aspirin"}']]);
    expect(error.mock.calls).toEqual([["[termctx:arxiv] ERROR Request failed"]]);
  });

  it("drops records below the configured level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.child("cache").warn("shown");

    expect(warn.mock.calls).toEqual([["[termctx:cache] WARN shown"]]);
  });

  it("writes nothing when silent", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: "silent" });

    logger.warn("x");
    logger.error("y");

    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
