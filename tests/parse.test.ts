import { describe, it, expect } from "vitest";
import {
  USAGE,
  parseAlertArgs,
  parseAlertId,
  parseCoinsCount,
  parsePriceArgs,
  parseSubscribeArgs,
  parseUnsubscribeArgs,
  splitArgs,
} from "../src/bot/parse.js";

const defaults = { currency: "usd", intervalSeconds: 300 };

describe("splitArgs", () => {
  it("splits on any run of whitespace", () => {
    expect(splitArgs("  bitcoin   above\t100 ")).toEqual(["bitcoin", "above", "100"]);
    expect(splitArgs("")).toEqual([]);
    expect(splitArgs(undefined)).toEqual([]);
  });
});

describe("parsePriceArgs", () => {
  it("lowercases the coin and defaults the currency", () => {
    expect(parsePriceArgs(["Bitcoin"], "usd")).toEqual({ ok: true, value: { coinId: "bitcoin", currency: "usd" } });
  });

  it("accepts an explicit currency", () => {
    expect(parsePriceArgs(["ethereum", "EUR"], "usd")).toEqual({
      ok: true,
      value: { coinId: "ethereum", currency: "eur" },
    });
  });

  it("rejects a missing or malformed coin id", () => {
    expect(parsePriceArgs([], "usd")).toEqual({ ok: false, error: USAGE.price });
    expect(parsePriceArgs(["<b>x</b>"], "usd")).toEqual({ ok: false, error: USAGE.price });
  });
});

describe("parseCoinsCount", () => {
  it("defaults to 10 and clamps to 1..50", () => {
    expect(parseCoinsCount([])).toBe(10);
    expect(parseCoinsCount(["abc"])).toBe(10);
    expect(parseCoinsCount(["0"])).toBe(1);
    expect(parseCoinsCount(["500"])).toBe(50);
    expect(parseCoinsCount(["25"])).toBe(25);
  });
});

describe("parseSubscribeArgs", () => {
  it("uses defaults for interval and currency", () => {
    expect(parseSubscribeArgs(["bitcoin"], defaults)).toEqual({
      ok: true,
      value: { coinId: "bitcoin", intervalSeconds: 300, currency: "usd" },
    });
  });

  it("reads interval and currency", () => {
    expect(parseSubscribeArgs(["bitcoin", "60", "gbp"], defaults)).toEqual({
      ok: true,
      value: { coinId: "bitcoin", intervalSeconds: 60, currency: "gbp" },
    });
  });

  it("falls back to the default interval when it is not a number", () => {
    const parsed = parseSubscribeArgs(["bitcoin", "soon"], defaults);
    expect(parsed.ok && parsed.value.intervalSeconds).toBe(300);
  });

  it("needs a coin", () => {
    expect(parseSubscribeArgs([], defaults)).toEqual({ ok: false, error: USAGE.subscribe });
  });
});

describe("parseUnsubscribeArgs", () => {
  it("leaves the currency out when not given", () => {
    expect(parseUnsubscribeArgs(["bitcoin"])).toEqual({ ok: true, value: { coinId: "bitcoin" } });
  });

  it("reads a currency", () => {
    expect(parseUnsubscribeArgs(["bitcoin", "EUR"])).toEqual({ ok: true, value: { coinId: "bitcoin", currency: "eur" } });
  });

  it("rejects a malformed currency", () => {
    expect(parseUnsubscribeArgs(["bitcoin", "e1"])).toEqual({ ok: false, error: USAGE.unsubscribe });
  });
});

describe("parseAlertArgs", () => {
  it("parses a full alert", () => {
    expect(parseAlertArgs(["bitcoin", "Above", "70000.5", "usd"], "usd")).toEqual({
      ok: true,
      value: { coinId: "bitcoin", direction: "above", threshold: 70000.5, currency: "usd" },
    });
  });

  it("defaults the currency", () => {
    const parsed = parseAlertArgs(["ethereum", "below", "2500"], "eur");
    expect(parsed.ok && parsed.value.currency).toBe("eur");
  });

  it("rejects a bad direction", () => {
    expect(parseAlertArgs(["bitcoin", "over", "1"], "usd")).toEqual({
      ok: false,
      error: "Direction must be 'above' or 'below'",
    });
  });

  it("rejects a bad price", () => {
    expect(parseAlertArgs(["bitcoin", "above", "lots"], "usd")).toEqual({ ok: false, error: "Invalid price value" });
    expect(parseAlertArgs(["bitcoin", "above", "-5"], "usd")).toEqual({ ok: false, error: "Invalid price value" });
  });

  it("needs three arguments", () => {
    expect(parseAlertArgs(["bitcoin", "above"], "usd")).toEqual({ ok: false, error: USAGE.alert });
  });
});

describe("parseAlertId", () => {
  it("accepts a plain or #-prefixed id", () => {
    expect(parseAlertId(["12"])).toEqual({ ok: true, value: 12 });
    expect(parseAlertId(["#12"])).toEqual({ ok: true, value: 12 });
  });

  it("rejects anything else", () => {
    expect(parseAlertId([])).toEqual({ ok: false, error: USAGE.delalert });
    expect(parseAlertId(["1.5"])).toEqual({ ok: false, error: "Invalid alert id" });
  });
});
