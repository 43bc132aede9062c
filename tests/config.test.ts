import { describe, it, expect } from "vitest";
import { parseNumericEnv } from "../src/config.js";
import { AppError } from "../src/errors.js";

describe("parseNumericEnv", () => {
  it("falls back to defaults for unset or empty variables", () => {
    expect(parseNumericEnv({ PORT: "", SCHEDULER_TICK_SECONDS: undefined })).toEqual({
      PORT: 8000,
      DEFAULT_UPDATE_INTERVAL: 300,
      MIN_UPDATE_INTERVAL: 10,
      SCHEDULER_TICK_SECONDS: 5,
      PRICE_TIMEOUT_MS: 10_000,
      SEND_TIMEOUT_MS: 10_000,
      SCHEDULER_CONCURRENCY: 4,
    });
  });

  it("reads numeric strings", () => {
    const settings = parseNumericEnv({ MIN_UPDATE_INTERVAL: "30", SCHEDULER_CONCURRENCY: "8" });
    expect(settings.MIN_UPDATE_INTERVAL).toBe(30);
    expect(settings.SCHEDULER_CONCURRENCY).toBe(8);
  });

  it("rejects a value that is not a number", () => {
    expect(() => parseNumericEnv({ SCHEDULER_TICK_SECONDS: "fast" })).toThrow(/^Invalid configuration: SCHEDULER_TICK_SECONDS: /);
  });

  it("rejects zero and negative values", () => {
    expect(() => parseNumericEnv({ SCHEDULER_CONCURRENCY: "0" })).toThrow(AppError);
    expect(() => parseNumericEnv({ MIN_UPDATE_INTERVAL: "-5" })).toThrow(/MIN_UPDATE_INTERVAL/);
  });

  it("rejects fractional values and out-of-range ports", () => {
    expect(() => parseNumericEnv({ SEND_TIMEOUT_MS: "1.5" })).toThrow(/SEND_TIMEOUT_MS/);
    expect(() => parseNumericEnv({ PORT: "70000" })).toThrow(/PORT/);
  });
});
