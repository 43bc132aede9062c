import { Bot, Composer, type BotError, type Context } from "grammy";
import { SourceUnavailableError, errorMessage } from "../errors.js";
import {
  HELP_TEXT,
  formatPrice,
  formatPriceLine,
  renderAlertList,
  renderSubscriptionList,
  renderTopCoins,
} from "../services/messages.js";
import {
  createAlert,
  deleteAlert,
  listAlerts,
  listSubscriptions,
  subscribe,
  unsubscribe,
} from "../services/subscriptions.js";
import type { PriceSource, Store } from "../types.js";
import {
  parseAlertArgs,
  parseAlertId,
  parseCoinsCount,
  parsePriceArgs,
  parseSubscribeArgs,
  parseUnsubscribeArgs,
  splitArgs,
} from "./parse.js";

export interface BotServices {
  store: Store;
  priceSource: PriceSource;
  defaultCurrency: string;
  defaultIntervalSeconds: number;
  minIntervalSeconds: number;
}

export type BotContext = Context & { services: BotServices };

const html = { parse_mode: "HTML", link_preview_options: { is_disabled: true } } as const;

export const commandController = new Composer<BotContext>();

commandController.command(["start", "help"], async (ctx) => {
  await ctx.reply(HELP_TEXT, html);
});

commandController.command("price", async (ctx) => {
  const parsed = parsePriceArgs(splitArgs(ctx.match), ctx.services.defaultCurrency);
  if (!parsed.ok) {
    await ctx.reply(parsed.error);
    return;
  }

  const { coinId, currency } = parsed.value;
  try {
    const quote = await ctx.services.priceSource.getPrice(coinId, currency);
    await ctx.reply(formatPriceLine(quote), html);
  } catch (err) {
    if (!(err instanceof SourceUnavailableError)) throw err;
    console.warn(`[BOT] ${err.message}`);
    await ctx.reply(`Could not fetch data for '${coinId}'. Make sure the coin id is correct.`);
  }
});

commandController.command("coins", async (ctx) => {
  const count = parseCoinsCount(splitArgs(ctx.match));
  const currency = ctx.services.defaultCurrency;
  try {
    const coins = await ctx.services.priceSource.listTopCoins(count, currency);
    await ctx.reply(coins.length ? renderTopCoins(coins, currency) : "Could not fetch coins list.");
  } catch (err) {
    if (!(err instanceof SourceUnavailableError)) throw err;
    console.warn(`[BOT] ${err.message}`);
    await ctx.reply("Could not fetch coins list.");
  }
});

commandController.command("subscribe", async (ctx) => {
  const { services } = ctx;
  const parsed = parseSubscribeArgs(splitArgs(ctx.match), {
    currency: services.defaultCurrency,
    intervalSeconds: services.defaultIntervalSeconds,
  });
  if (!parsed.ok || !ctx.chat) {
    await ctx.reply(parsed.ok ? "Unknown chat." : parsed.error);
    return;
  }

  const { coinId, currency, intervalSeconds } = parsed.value;
  let price: number;
  try {
    price = (await services.priceSource.getPrice(coinId, currency)).price;
  } catch (err) {
    if (!(err instanceof SourceUnavailableError)) throw err;
    await ctx.reply(`Could not find coin '${coinId}' in ${currency.toUpperCase()}.`);
    return;
  }

  const sub = await subscribe(
    services.store,
    { chatId: ctx.chat.id, coinId, currency, intervalSeconds },
    services.minIntervalSeconds,
  );
  await ctx.reply(
    `Subscribed to ${sub.coinId} updates every ${sub.intervalSeconds}s (${sub.currency.toUpperCase()}). ` +
      `Current: ${formatPrice(price)}`,
  );
});

commandController.command("unsubscribe", async (ctx) => {
  const parsed = parseUnsubscribeArgs(splitArgs(ctx.match));
  if (!parsed.ok || !ctx.chat) {
    await ctx.reply(parsed.ok ? "Unknown chat." : parsed.error);
    return;
  }

  const { coinId, currency } = parsed.value;
  const removed = await unsubscribe(ctx.services.store, ctx.chat.id, coinId, currency);
  await ctx.reply(removed > 0 ? `Unsubscribed from ${coinId}.` : `You were not subscribed to ${coinId}.`);
});

commandController.command("list", async (ctx) => {
  if (!ctx.chat) return;
  const subs = await listSubscriptions(ctx.services.store, ctx.chat.id);
  await ctx.reply(renderSubscriptionList(subs));
});

commandController.command("alert", async (ctx) => {
  const { services } = ctx;
  const parsed = parseAlertArgs(splitArgs(ctx.match), services.defaultCurrency);
  if (!parsed.ok || !ctx.chat) {
    await ctx.reply(parsed.ok ? "Unknown chat." : parsed.error);
    return;
  }

  const { coinId, currency, direction, threshold } = parsed.value;
  try {
    await services.priceSource.getPrice(coinId, currency);
  } catch (err) {
    if (!(err instanceof SourceUnavailableError)) throw err;
    await ctx.reply(`Could not find coin '${coinId}' in ${currency.toUpperCase()}.`);
    return;
  }

  const rule = await createAlert(services.store, { chatId: ctx.chat.id, coinId, currency, direction, threshold });
  await ctx.reply(
    `Alert #${rule.id} created: ${rule.coinId} ${rule.direction} ${formatPrice(rule.threshold)} ${rule.currency.toUpperCase()}`,
  );
});

commandController.command("alerts", async (ctx) => {
  if (!ctx.chat) return;
  const rules = await listAlerts(ctx.services.store, ctx.chat.id);
  await ctx.reply(renderAlertList(rules));
});

commandController.command("delalert", async (ctx) => {
  const parsed = parseAlertId(splitArgs(ctx.match));
  if (!parsed.ok || !ctx.chat) {
    await ctx.reply(parsed.ok ? "Unknown chat." : parsed.error);
    return;
  }

  const deleted = await deleteAlert(ctx.services.store, ctx.chat.id, parsed.value);
  await ctx.reply(deleted ? `Alert #${parsed.value} deleted.` : `Alert #${parsed.value} not found.`);
});

commandController.on("message:text", async (ctx) => {
  const command = /^\/\w+(?:@(\w+))?/.exec(ctx.message.text);
  if (!command) return;
  // In groups, `/cmd@otherbot` belongs to another bot.
  const addressee = command[1];
  if (addressee && addressee.toLowerCase() !== ctx.me.username.toLowerCase()) return;
  await ctx.reply("Unknown command. Send /start for help.");
});

async function replyWithGenericError({ ctx, error }: BotError<BotContext>): Promise<void> {
  console.error(`[BOT] Error handling update ${ctx.update.update_id}: ${errorMessage(error)}`);
  try {
    await ctx.reply("Internal error while handling your command.");
  } catch (replyErr) {
    console.error(`[BOT] Could not report the error to chat: ${errorMessage(replyErr)}`);
  }
}

export function createBot(token: string, services: BotServices): Bot<BotContext> {
  const bot = new Bot<BotContext>(token);

  bot.use(async (ctx, next) => {
    ctx.services = services;
    if (ctx.chat) await services.store.ensureChat(ctx.chat.id);
    await next();
  });

  // The boundary applies under both polling and webhooks; bot.catch only sees
  // polling errors that escape it, such as a failed ensureChat.
  bot.errorBoundary(replyWithGenericError, commandController);

  bot.catch(({ ctx, error }) => {
    console.error(`[BOT] Unhandled error for update ${ctx.update.update_id}: ${errorMessage(error)}`);
  });

  return bot;
}
