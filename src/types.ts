import type { ConfigInvalidError } from "./errors.js";

export type Direction = "above" | "below";

export interface Chat {
  chatId: number;
  createdAt: Date;
}

export interface Subscription {
  id: number;
  chatId: number;
  coinId: string;
  currency: string;
  intervalSeconds: number;
  lastSentAt: Date | null;
}

export interface AlertRule {
  id: number;
  chatId: number;
  coinId: string;
  currency: string;
  threshold: number;
  direction: Direction;
  armed: boolean;
  lastFiredAt: Date | null;
  createdAt: Date;
}

export interface PriceQuote {
  coinId: string;
  currency: string;
  price: number;
  change24h: number | null;
  marketCap: number | null;
  fetchedAt: Date;
}

export interface CoinListing {
  id: string;
  name: string;
  symbol: string;
  price: number | null;
}

/** Rows read from the store, with the ones that failed validation kept apart. */
export interface Snapshot<T> {
  valid: T[];
  invalid: ConfigInvalidError[];
}

export type Action =
  | {
      kind: "update";
      subscription: Subscription;
      quote: PriceQuote;
      mutation: { lastSentAt: Date };
    }
  | {
      kind: "fire";
      rule: AlertRule;
      quote: PriceQuote;
      mutation: { armed: false; lastFiredAt: Date };
    }
  | {
      kind: "rearm";
      rule: AlertRule;
      quote: PriceQuote;
      mutation: { armed: true };
    };

export interface PriceSource {
  /** Aborting `signal` cancels the request and any pending retry. */
  getPrice(coinId: string, currency: string, signal?: AbortSignal): Promise<PriceQuote>;
  listTopCoins(count: number, currency: string): Promise<CoinListing[]>;
}

export interface Notifier {
  send(chatId: number, text: string, signal?: AbortSignal): Promise<void>;
}

export interface NewSubscription {
  chatId: number;
  coinId: string;
  currency: string;
  intervalSeconds: number;
}

export interface NewAlertRule {
  chatId: number;
  coinId: string;
  currency: string;
  threshold: number;
  direction: Direction;
}

export interface Store {
  loadActiveSubscriptions(): Promise<Snapshot<Subscription>>;
  loadAllAlertRules(): Promise<Snapshot<AlertRule>>;
  /** Writes only `lastSentAt`. */
  saveSubscription(subscription: Subscription): Promise<void>;
  /** Writes only `armed` and `lastFiredAt`. */
  saveAlertRule(rule: AlertRule): Promise<void>;

  ensureChat(chatId: number): Promise<void>;
  removeChat(chatId: number): Promise<boolean>;
  upsertSubscription(input: NewSubscription): Promise<Subscription>;
  deleteSubscription(chatId: number, coinId: string, currency?: string): Promise<number>;
  listSubscriptions(chatId: number): Promise<Subscription[]>;
  addAlertRule(input: NewAlertRule): Promise<AlertRule>;
  listAlertRules(chatId: number): Promise<AlertRule[]>;
  deleteAlertRule(chatId: number, id: number): Promise<boolean>;
}

export type CycleFailure =
  | { kind: "load"; message: string }
  | { kind: "config"; message: string }
  | { kind: "source"; coinId: string; currency: string; message: string }
  | { kind: "delivery"; target: string; chatId: number; message: string }
  | { kind: "persistence"; target: string; chatId: number; message: string };

export interface CycleReport {
  startedAt: Date;
  loadFailed: boolean;
  pairs: number;
  quotes: number;
  updatesSent: number;
  alertsFired: number;
  rearmed: number;
  chatsRemoved: number;
  failures: CycleFailure[];
}
