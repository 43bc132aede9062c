import cron from "node-cron";
import { DeliveryFailedError, SourceUnavailableError, TimeoutError, errorMessage } from "./errors.js";
import { groupByPair, mapWithConcurrency, pairKey, withTimeout } from "./services/batching.js";
import { decideAll } from "./services/evaluator.js";
import { renderAlert, renderSubscriptionUpdate } from "./services/messages.js";
import type {
  Action,
  AlertRule,
  CycleReport,
  Notifier,
  PriceQuote,
  PriceSource,
  Store,
  Subscription,
} from "./types.js";

export interface SchedulerOptions {
  concurrency: number;
  priceTimeoutMs: number;
  sendTimeoutMs: number;
}

export interface SchedulerDeps {
  store: Store;
  priceSource: PriceSource;
  notifier: Notifier;
  options: SchedulerOptions;
}

function timestamp(): string {
  return new Date().toLocaleTimeString();
}

function describeTarget(action: Action): string {
  return action.kind === "update" ? `subscription #${action.subscription.id}` : `alert #${action.rule.id}`;
}

function chatOf(action: Action): number {
  return action.kind === "update" ? action.subscription.chatId : action.rule.chatId;
}

function emptyReport(startedAt: Date): CycleReport {
  return {
    startedAt,
    loadFailed: false,
    pairs: 0,
    quotes: 0,
    updatesSent: 0,
    alertsFired: 0,
    rearmed: 0,
    chatsRemoved: 0,
    failures: [],
  };
}

async function fetchQuotes(
  targets: Array<Subscription | AlertRule>,
  deps: SchedulerDeps,
  report: CycleReport,
): Promise<Map<string, PriceQuote>> {
  const pairs = [...groupByPair(targets).values()].map((g) => g.pair);
  report.pairs = pairs.length;

  const results = await mapWithConcurrency(pairs, deps.options.concurrency, (pair) =>
    withTimeout(
      (signal) => deps.priceSource.getPrice(pair.coinId, pair.currency, signal),
      deps.options.priceTimeoutMs,
      `Price lookup for ${pair.coinId}/${pair.currency}`,
    ).catch((err: unknown) => {
      if (err instanceof TimeoutError) throw new SourceUnavailableError(pair.coinId, pair.currency, err.message, err);
      throw err;
    }),
  );

  const quotes = new Map<string, PriceQuote>();
  results.forEach((result, i) => {
    const { coinId, currency } = pairs[i];
    if (result.status === "fulfilled") {
      quotes.set(pairKey(coinId, currency), result.value);
      return;
    }
    const message =
      result.reason instanceof SourceUnavailableError
        ? result.reason.message
        : `Price lookup for ${coinId}/${currency} failed: ${errorMessage(result.reason)}`;
    console.warn(`  [SCHEDULER] ${message}; skipping its rules this cycle`);
    report.failures.push({ kind: "source", coinId, currency, message });
  });

  report.quotes = quotes.size;
  return quotes;
}

async function persist(action: Action, store: Store): Promise<void> {
  switch (action.kind) {
    case "update":
      await store.saveSubscription({ ...action.subscription, ...action.mutation });
      return;
    case "fire":
    case "rearm":
      await store.saveAlertRule({ ...action.rule, ...action.mutation });
      return;
  }
}

function render(action: Action): string | null {
  switch (action.kind) {
    case "update":
      return renderSubscriptionUpdate(action.quote);
    case "fire":
      return renderAlert(action.rule, action.quote);
    case "rearm":
      return null;
  }
}

/**
 * Delivers first and persists second: a failed send leaves the stored state
 * as it was, so the same action comes up again on the next tick.
 */
async function dispatch(action: Action, deps: SchedulerDeps, report: CycleReport, goneChats: Set<number>): Promise<void> {
  const target = describeTarget(action);
  const chatId = chatOf(action);
  const text = render(action);

  if (text !== null) {
    try {
      await withTimeout(
        (signal) => deps.notifier.send(chatId, text, signal),
        deps.options.sendTimeoutMs,
        `Send to chat ${chatId}`,
      ).catch((err: unknown) => {
        if (err instanceof TimeoutError) throw new DeliveryFailedError(chatId, err.message, false, err);
        throw err;
      });
    } catch (err) {
      const message = errorMessage(err);
      console.error(`  [SCHEDULER] Delivery for ${target} to chat ${chatId} failed: ${message}`);
      report.failures.push({ kind: "delivery", target, chatId, message });
      if (err instanceof DeliveryFailedError && err.chatGone) goneChats.add(chatId);
      return;
    }
  }

  try {
    await persist(action, deps.store);
  } catch (err) {
    const message = errorMessage(err);
    const risk = text !== null ? " (message already delivered, may repeat next cycle)" : "";
    console.error(`  [SCHEDULER] Saving ${target} failed${risk}: ${message}`);
    report.failures.push({ kind: "persistence", target, chatId, message });
    return;
  }

  if (action.kind === "update") report.updatesSent++;
  else if (action.kind === "fire") report.alertsFired++;
  else report.rearmed++;
}

async function removeGoneChats(chatIds: Set<number>, store: Store, report: CycleReport): Promise<void> {
  for (const chatId of chatIds) {
    try {
      if (await store.removeChat(chatId)) {
        report.chatsRemoved++;
        console.log(`  [SCHEDULER] Chat ${chatId} is unreachable; removed it with its subscriptions and alerts`);
      }
    } catch (err) {
      const message = errorMessage(err);
      console.error(`  [SCHEDULER] Removing chat ${chatId} failed: ${message}`);
      report.failures.push({ kind: "persistence", target: `chat ${chatId}`, chatId, message });
    }
  }
}

export async function runCycle(now: Date, deps: SchedulerDeps): Promise<CycleReport> {
  const report = emptyReport(now);

  let subscriptions: Subscription[];
  let rules: AlertRule[];
  try {
    const [subs, alerts] = await Promise.all([
      deps.store.loadActiveSubscriptions(),
      deps.store.loadAllAlertRules(),
    ]);
    subscriptions = subs.valid;
    rules = alerts.valid;
    for (const invalid of [...subs.invalid, ...alerts.invalid]) {
      console.warn(`  [SCHEDULER] Skipping ${invalid.message}`);
      report.failures.push({ kind: "config", message: invalid.message });
    }
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[${timestamp()}] [SCHEDULER] Loading rules failed, skipping cycle: ${message}`);
    report.loadFailed = true;
    report.failures.push({ kind: "load", message });
    return report;
  }

  const targets: Array<Subscription | AlertRule> = [...subscriptions, ...rules];
  if (targets.length === 0) return report;

  const quotes = await fetchQuotes(targets, deps, report);
  const actions = decideAll(targets, quotes, now);

  const goneChats = new Set<number>();
  await mapWithConcurrency(actions, deps.options.concurrency, (action) => dispatch(action, deps, report, goneChats));
  await removeGoneChats(goneChats, deps.store, report);

  console.log(
    `[${timestamp()}] [SCHEDULER] ${targets.length} rule(s), ${report.quotes}/${report.pairs} pair(s) priced, ` +
      `${report.updatesSent} update(s), ${report.alertsFired} alert(s), ${report.rearmed} re-armed, ` +
      `${report.failures.length} failure(s)`,
  );
  return report;
}

// ── Driver ──────────────────────────────────────────────────────────────

export function computeTickSeconds(minIntervalSeconds: number, tickFloorSeconds: number): number {
  return Math.max(1, Math.floor(Math.min(minIntervalSeconds, tickFloorSeconds)));
}

/** node-cron expression firing every `seconds` (whole minutes above 59s). */
export function toCronExpression(seconds: number): string {
  if (seconds < 60) return `*/${seconds} * * * * *`;
  const minutes = Math.min(59, Math.round(seconds / 60));
  return `0 */${minutes} * * * *`;
}

export interface SchedulerHandle {
  /** Resolves once the timer is stopped and no cycle is running. */
  stop(): Promise<void>;
  /** Runs a cycle now unless one is already in flight. */
  trigger(): Promise<CycleReport | null>;
}

export function startScheduler(
  deps: SchedulerDeps,
  tickSeconds: number,
  clock: () => Date = () => new Date(),
): SchedulerHandle {
  let inFlight: Promise<CycleReport> | null = null;

  async function trigger(): Promise<CycleReport | null> {
    if (inFlight) {
      console.warn(`[${timestamp()}] [SCHEDULER] Previous cycle still running, skipping tick`);
      return null;
    }
    inFlight = runCycle(clock(), deps);
    try {
      return await inFlight;
    } finally {
      inFlight = null;
    }
  }

  function onTick(): void {
    trigger().catch((err) => {
      console.error(`[${timestamp()}] [SCHEDULER] Cycle crashed:`, err);
    });
  }

  const expression = toCronExpression(tickSeconds);
  console.log(`[SCHEDULER] Tick every ${tickSeconds}s (${expression})`);
  const task = cron.schedule(expression, onTick);

  // Run immediately on start
  onTick();

  return {
    trigger,
    async stop() {
      task.stop();
      if (inFlight) {
        // onTick already logs a crashed cycle
        await inFlight.catch(() => undefined);
      }
      console.log("[SCHEDULER] Stopped");
    },
  };
}
