import * as log from "../../packages/core/logger";
import { createTestLogger } from "../harness/test-logger";

describe("logger", () => {
  afterEach(() => {
    log.setLogLevel("info");
    jest.restoreAllMocks();
  });

  it("drops messages below the current level", () => {
    const debug = jest.spyOn(console, "debug").mockImplementation(() => {});
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {});

    log.debug("hidden");
    log.warn("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("shown");

    log.setLogLevel("debug");
    log.debug("now shown");
    expect(debug).toHaveBeenCalledWith("now shown");
    expect(log.getLogLevel()).toBe("debug");
  });

  it("prefixes scoped messages", () => {
    const base = createTestLogger();
    const scoped = log.scopedLogger("clipboard", base);

    scoped.info("Polling started", { interval: 100 });
    scoped.error("boom");

    expect(base.info).toHaveBeenCalledWith("[clipboard]", "Polling started", { interval: 100 });
    expect(base.error).toHaveBeenCalledWith("[clipboard]", "boom");
  });

  it("recognises level names", () => {
    expect(log.isLogLevel("error")).toBe(true);
    expect(log.isLogLevel("trace")).toBe(false);
    expect(log.isLogLevel("toString")).toBe(false);
  });
});
