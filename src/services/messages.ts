import type { AlertRule, CoinListing, PriceQuote, Subscription } from "../types.js";

const priceFormat = new Intl.NumberFormat("en-US", { maximumSignificantDigits: 6 });

export function formatPrice(price: number): string {
  return priceFormat.format(price);
}

export function formatChange(change: number): string {
  return `${change >= 0 ? "+" : ""}${change.toFixed(2)}%`;
}

const marketCapFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatPriceLine(quote: PriceQuote): string {
  const cur = quote.currency.toUpperCase();
  const line = `<b>${quote.coinId}</b>: ${formatPrice(quote.price)} ${cur}`;
  if (quote.change24h == null && quote.marketCap == null) return line;

  const change = quote.change24h == null ? "N/A" : formatChange(quote.change24h);
  const marketCap = quote.marketCap ? `${marketCapFormat.format(quote.marketCap)} ${cur}` : "N/A";
  return `${line}\n24h: ${change} • Mkt cap: ${marketCap}`;
}

export function renderSubscriptionUpdate(quote: PriceQuote): string {
  return `Scheduled update:\n${formatPriceLine(quote)}`;
}

export function renderAlert(rule: AlertRule, quote: PriceQuote): string {
  return [
    `Alert triggered for <b>${rule.coinId}</b> (${rule.currency.toUpperCase()}):`,
    `Condition: ${rule.direction} ${formatPrice(rule.threshold)}`,
    `Current: ${formatPrice(quote.price)}`,
  ].join("\n");
}

export function renderSubscriptionList(subscriptions: Subscription[]): string {
  if (subscriptions.length === 0) return "No subscriptions.";
  const lines = subscriptions.map(
    (s) => `${s.coinId} every ${s.intervalSeconds}s (${s.currency.toUpperCase()})`,
  );
  return `Subscriptions:\n${lines.join("\n")}`;
}

export function renderAlertList(rules: AlertRule[]): string {
  if (rules.length === 0) return "No alerts.";
  const lines = rules.map(
    (r) =>
      `#${r.id} ${r.coinId} ${r.direction} ${formatPrice(r.threshold)} ${r.currency.toUpperCase()} (${r.armed ? "armed" : "fired"})`,
  );
  return `Your alerts:\n${lines.join("\n")}`;
}

export function renderTopCoins(coins: CoinListing[], currency: string): string {
  return coins
    .map((c) => `${c.id} (${c.name}): ${c.price == null ? "N/A" : `${formatPrice(c.price)} ${currency.toUpperCase()}`}`)
    .join("\n");
}

export const HELP_TEXT = [
  "Crypto prices from CoinGecko.",
  "",
  "Commands:",
  "/price &lt;coin_id&gt; [currency] - current price (e.g. /price bitcoin usd)",
  "/coins [n] - top N coins by market cap",
  "/subscribe &lt;coin_id&gt; [interval_seconds] [currency] - periodic updates",
  "/unsubscribe &lt;coin_id&gt; [currency] - stop updates",
  "/list - your subscriptions",
  "/alert &lt;coin_id&gt; &lt;above|below&gt; &lt;price&gt; [currency] - price alert",
  "/alerts - your alerts",
  "/delalert &lt;alert_id&gt; - delete an alert",
].join("\n");
