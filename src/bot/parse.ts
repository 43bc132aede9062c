import type { Direction } from "../types.js";

const COIN_ID = /^[a-z0-9][a-z0-9-]*$/;
const CURRENCY = /^[a-z]{2,10}$/;

export const USAGE = {
  price: "Usage: /price <coin_id> [currency]",
  subscribe: "Usage: /subscribe <coin_id> [interval_seconds] [currency]",
  unsubscribe: "Usage: /unsubscribe <coin_id> [currency]",
  alert: "Usage: /alert <coin_id> <above|below> <price> [currency]",
  delalert: "Usage: /delalert <alert_id>",
} as const;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

export function splitArgs(match: string | undefined): string[] {
  return (match ?? "").trim().split(/\s+/).filter(Boolean);
}

function coinArg(raw: string | undefined): string | null {
  if (!raw) return null;
  const coin = raw.toLowerCase();
  return COIN_ID.test(coin) ? coin : null;
}

function currencyArg(raw: string | undefined, fallback: string): string | null {
  if (!raw) return fallback;
  const currency = raw.toLowerCase();
  return CURRENCY.test(currency) ? currency : null;
}

export function parsePriceArgs(args: string[], defaultCurrency: string): ParseResult<{ coinId: string; currency: string }> {
  const coinId = coinArg(args[0]);
  const currency = currencyArg(args[1], defaultCurrency);
  if (!coinId || !currency) return fail(USAGE.price);
  return { ok: true, value: { coinId, currency } };
}

export function parseCoinsCount(args: string[]): number {
  const n = Number.parseInt(args[0] ?? "", 10);
  if (Number.isNaN(n)) return 10;
  return Math.min(50, Math.max(1, n));
}

export function parseSubscribeArgs(
  args: string[],
  defaults: { currency: string; intervalSeconds: number },
): ParseResult<{ coinId: string; intervalSeconds: number; currency: string }> {
  const coinId = coinArg(args[0]);
  const currency = currencyArg(args[2], defaults.currency);
  if (!coinId || !currency) return fail(USAGE.subscribe);

  const interval = Number.parseInt(args[1] ?? "", 10);
  const intervalSeconds = Number.isNaN(interval) ? defaults.intervalSeconds : interval;
  return { ok: true, value: { coinId, intervalSeconds, currency } };
}

export function parseUnsubscribeArgs(args: string[]): ParseResult<{ coinId: string; currency?: string }> {
  const coinId = coinArg(args[0]);
  if (!coinId) return fail(USAGE.unsubscribe);
  if (args[1] === undefined) return { ok: true, value: { coinId } };

  const currency = currencyArg(args[1], "");
  if (!currency) return fail(USAGE.unsubscribe);
  return { ok: true, value: { coinId, currency } };
}

export function parseAlertArgs(
  args: string[],
  defaultCurrency: string,
): ParseResult<{ coinId: string; direction: Direction; threshold: number; currency: string }> {
  if (args.length < 3) return fail(USAGE.alert);

  const coinId = coinArg(args[0]);
  if (!coinId) return fail(USAGE.alert);

  const direction = args[1].toLowerCase();
  if (direction !== "above" && direction !== "below") {
    return fail("Direction must be 'above' or 'below'");
  }

  const threshold = Number(args[2]);
  if (!Number.isFinite(threshold) || threshold <= 0) return fail("Invalid price value");

  const currency = currencyArg(args[3], defaultCurrency);
  if (!currency) return fail(USAGE.alert);

  return { ok: true, value: { coinId, direction, threshold, currency } };
}

export function parseAlertId(args: string[]): ParseResult<number> {
  if (!args[0]) return fail(USAGE.delalert);
  const id = Number(args[0].replace(/^#/, ""));
  if (!Number.isInteger(id) || id <= 0) return fail("Invalid alert id");
  return { ok: true, value: id };
}
