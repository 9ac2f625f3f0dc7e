import { describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger.js";

function fakeConsole() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe("createLogger()", () => {
  it("writes at and above the configured level", () => {
    const target = fakeConsole();
    const logger = createLogger("warn", target);

    logger.error("e", 1);
    logger.warn("w");
    logger.info("i");
    logger.debug("d");

    expect(target.error).toHaveBeenCalledWith("e", 1);
    expect(target.warn).toHaveBeenCalledWith("w");
    expect(target.info).not.toHaveBeenCalled();
    expect(target.debug).not.toHaveBeenCalled();
  });

  it("debug lets everything through", () => {
    const target = fakeConsole();
    createLogger("debug", target).debug("d");
    expect(target.debug).toHaveBeenCalledWith("d");
  });

  it("silent writes nothing", () => {
    const target = fakeConsole();
    createLogger("silent", target).error("e");
    expect(target.error).not.toHaveBeenCalled();
  });
});
