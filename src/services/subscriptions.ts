import type { AlertRule, Direction, Store, Subscription } from "../types.js";

// Pass-throughs to the store used by the command layer. The scheduler picks
// up whatever they write on its next tick.

export interface SubscribeInput {
  chatId: number;
  coinId: string;
  currency: string;
  intervalSeconds: number;
}

export function subscribe(store: Store, input: SubscribeInput, minIntervalSeconds: number): Promise<Subscription> {
  return store.upsertSubscription({
    chatId: input.chatId,
    coinId: input.coinId.toLowerCase(),
    currency: input.currency.toLowerCase(),
    intervalSeconds: Math.max(minIntervalSeconds, Math.floor(input.intervalSeconds)),
  });
}

/** Without a currency, drops the coin in every currency. Returns the count removed. */
export function unsubscribe(store: Store, chatId: number, coinId: string, currency?: string): Promise<number> {
  return store.deleteSubscription(chatId, coinId.toLowerCase(), currency?.toLowerCase());
}

export function listSubscriptions(store: Store, chatId: number): Promise<Subscription[]> {
  return store.listSubscriptions(chatId);
}

export interface CreateAlertInput {
  chatId: number;
  coinId: string;
  currency: string;
  threshold: number;
  direction: Direction;
}

export function createAlert(store: Store, input: CreateAlertInput): Promise<AlertRule> {
  return store.addAlertRule({
    chatId: input.chatId,
    coinId: input.coinId.toLowerCase(),
    currency: input.currency.toLowerCase(),
    threshold: input.threshold,
    direction: input.direction,
  });
}

export function listAlerts(store: Store, chatId: number): Promise<AlertRule[]> {
  return store.listAlertRules(chatId);
}

export function deleteAlert(store: Store, chatId: number, alertId: number): Promise<boolean> {
  return store.deleteAlertRule(chatId, alertId);
}
