import type { Action, AlertRule, Direction, PriceQuote, Subscription } from "../types.js";
import { pairKey } from "./batching.js";

export function crosses(direction: Direction, threshold: number, price: number): boolean {
  return direction === "above" ? price >= threshold : price <= threshold;
}

export function isOppositeSide(direction: Direction, threshold: number, price: number): boolean {
  return direction === "above" ? price < threshold : price > threshold;
}

export function isSubscriptionDue(subscription: Subscription, now: Date): boolean {
  if (!subscription.lastSentAt) return true;
  const elapsed = now.getTime() - subscription.lastSentAt.getTime();
  return elapsed >= subscription.intervalSeconds * 1000;
}

export function decideSubscription(subscription: Subscription, quote: PriceQuote, now: Date): Action | null {
  if (!isSubscriptionDue(subscription, now)) return null;
  return { kind: "update", subscription, quote, mutation: { lastSentAt: now } };
}

/**
 * Edge-triggered alert check. An armed rule fires once on crossing and then
 * stays quiet until the price is seen on the other side of the threshold,
 * which re-arms it. Re-arming and firing never happen in the same call.
 */
export function decideAlert(rule: AlertRule, quote: PriceQuote, now: Date): Action | null {
  if (!rule.armed) {
    if (isOppositeSide(rule.direction, rule.threshold, quote.price)) {
      return { kind: "rearm", rule, quote, mutation: { armed: true } };
    }
    return null;
  }

  if (crosses(rule.direction, rule.threshold, quote.price)) {
    return { kind: "fire", rule, quote, mutation: { armed: false, lastFiredAt: now } };
  }
  return null;
}

export function decide(target: Subscription | AlertRule, quote: PriceQuote, now: Date): Action | null {
  return "direction" in target ? decideAlert(target, quote, now) : decideSubscription(target, quote, now);
}

export function decideAll(
  targets: Array<Subscription | AlertRule>,
  quotes: Map<string, PriceQuote>,
  now: Date,
): Action[] {
  const actions: Action[] = [];

  for (const target of targets) {
    const quote = quotes.get(pairKey(target.coinId, target.currency));
    if (!quote) continue;

    const action = decide(target, quote, now);
    if (action) actions.push(action);
  }

  return actions;
}
