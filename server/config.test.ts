import { describe, expect, it } from "vitest";
import { ValidationError } from "../domain/errors.js";
import { loadConfig } from "./config.js";

describe("loadConfig()", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ logLevel: "warn", verifyInvariants: true, identifierStart: 1 });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      STAR_LOG_LEVEL: "DEBUG",
      STAR_VERIFY_INVARIANTS: "false",
      STAR_ID_START: "500",
    });
    expect(config).toEqual({ logLevel: "debug", verifyInvariants: false, identifierStart: 500 });
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ STAR_LOG_LEVEL: "loud" })).toThrow(ValidationError);
    expect(() => loadConfig({ STAR_LOG_LEVEL: "loud" })).toThrow(/^Invalid configuration \(STAR_LOG_LEVEL\): /);
  });

  it("rejects a non-positive identifier start", () => {
    expect(() => loadConfig({ STAR_ID_START: "0" })).toThrow(/^Invalid configuration \(STAR_ID_START\): /);
  });
});
