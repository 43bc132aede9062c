import { describe, it, expect, beforeEach } from "vitest";
import type { Update } from "grammy/types";
import { createBot } from "../src/bot/controller.js";
import { USAGE } from "../src/bot/parse.js";
import { FakePriceSource } from "./helpers/fakes.js";
import { MemoryStore } from "./helpers/memory-store.js";

const BOT_USERNAME = "test_price_bot";

// Responses go through JSON the way they arrive from the Bot API.
function wire(result: unknown) {
  return JSON.parse(JSON.stringify({ ok: true, result }));
}

let nextUpdateId = 1;

function message(text: string, chatId = 42): Update {
  const updateId = nextUpdateId++;
  const command = /^\/\S+/.exec(text);
  return {
    update_id: updateId,
    message: {
      message_id: updateId,
      date: 0,
      chat: { id: chatId, type: "private", first_name: "Test" },
      from: { id: chatId, is_bot: false, first_name: "Test" },
      text,
      entities: command ? [{ type: "bot_command", offset: 0, length: command[0].length }] : [],
    },
  };
}

async function setup() {
  const store = new MemoryStore();
  const priceSource = new FakePriceSource();
  priceSource.set("bitcoin", "usd", 64000);
  const replies: Array<{ chatId: unknown; text: unknown }> = [];

  const bot = createBot("test-secret", {
    store,
    priceSource,
    defaultCurrency: "usd",
    defaultIntervalSeconds: 300,
    minIntervalSeconds: 10,
  });
  bot.api.config.use(async (_prev, method, payload) => {
    if (method === "getMe") {
      return wire({
        id: 1,
        is_bot: true,
        first_name: "Price Bot",
        username: BOT_USERNAME,
        can_join_groups: true,
        can_read_all_group_messages: false,
        supports_inline_queries: false,
      });
    }
    const body: unknown = payload;
    if (method === "sendMessage" && typeof body === "object" && body !== null && "chat_id" in body && "text" in body) {
      replies.push({ chatId: body.chat_id, text: body.text });
      return wire({ message_id: 1, date: 0, chat: { id: body.chat_id, type: "private", first_name: "Test" }, text: body.text });
    }
    return wire(true);
  });
  await bot.init();

  return { bot, store, priceSource, replies };
}

describe("bot commands", () => {
  let h: Awaited<ReturnType<typeof setup>>;

  beforeEach(async () => {
    h = await setup();
  });

  it("registers the chat before handling a command", async () => {
    await h.bot.handleUpdate(message("/list", 77));

    expect(h.store.chats.has(77)).toBe(true);
    expect(h.replies).toEqual([{ chatId: 77, text: "No subscriptions." }]);
  });

  it("answers /price with the formatted quote", async () => {
    await h.bot.handleUpdate(message("/price Bitcoin"));

    expect(h.priceSource.getPrice).toHaveBeenCalledWith("bitcoin", "usd");
    expect(h.replies).toEqual([{ chatId: 42, text: "<b>bitcoin</b>: 64,000 USD" }]);
  });

  it("checks the coin before saving a subscription", async () => {
    await h.bot.handleUpdate(message("/subscribe bitcoin 60"));

    expect(h.priceSource.getPrice).toHaveBeenCalledWith("bitcoin", "usd");
    expect(h.store.subscriptions).toEqual([
      { id: 1, chatId: 42, coinId: "bitcoin", currency: "usd", intervalSeconds: 60, lastSentAt: null },
    ]);
    expect(h.replies).toEqual([
      { chatId: 42, text: "Subscribed to bitcoin updates every 60s (USD). Current: 64,000" },
    ]);
  });

  it("does not subscribe to an unknown coin", async () => {
    await h.bot.handleUpdate(message("/subscribe notacoin"));

    expect(h.store.subscriptions).toEqual([]);
    expect(h.replies).toEqual([{ chatId: 42, text: "Could not find coin 'notacoin' in USD." }]);
  });

  it("creates an armed alert for a known coin", async () => {
    await h.bot.handleUpdate(message("/alert bitcoin above 70000"));

    expect(h.store.alerts).toHaveLength(1);
    expect(h.store.alerts[0]).toMatchObject({ id: 1, chatId: 42, direction: "above", threshold: 70000, armed: true });
    expect(h.replies).toEqual([{ chatId: 42, text: "Alert #1 created: bitcoin above 70,000 USD" }]);
  });

  it("does not create an alert for an unknown coin", async () => {
    await h.bot.handleUpdate(message("/alert notacoin below 1"));

    expect(h.store.alerts).toEqual([]);
    expect(h.replies).toEqual([{ chatId: 42, text: "Could not find coin 'notacoin' in USD." }]);
  });

  it("replies with usage on malformed arguments", async () => {
    await h.bot.handleUpdate(message("/alert bitcoin"));

    expect(h.replies).toEqual([{ chatId: 42, text: USAGE.alert }]);
  });

  it("replies with a generic error when a handler throws", async () => {
    h.priceSource.getPrice.mockRejectedValueOnce(new Error("boom"));

    await h.bot.handleUpdate(message("/price bitcoin"));

    expect(h.replies).toEqual([{ chatId: 42, text: "Internal error while handling your command." }]);
  });

  it("answers unknown commands addressed to this bot only", async () => {
    await h.bot.handleUpdate(message("/foo"));
    await h.bot.handleUpdate(message("/foo@other_bot"));
    await h.bot.handleUpdate(message(`/foo@${BOT_USERNAME}`));
    await h.bot.handleUpdate(message("hello"));

    expect(h.replies).toEqual([
      { chatId: 42, text: "Unknown command. Send /start for help." },
      { chatId: 42, text: "Unknown command. Send /start for help." },
    ]);
  });
});
