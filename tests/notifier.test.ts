import { describe, it, expect, vi } from "vitest";
import { GrammyError } from "grammy";
import { DeliveryFailedError } from "../src/errors.js";
import { createTelegramNotifier, type MessageApi } from "../src/services/notifier.js";

function apiError(code: number, description: string): GrammyError {
  return new GrammyError(
    `Call to 'sendMessage' failed! (${code}: ${description})`,
    { ok: false, error_code: code, description },
    "sendMessage",
    {},
  );
}

function fakeApi(impl: () => Promise<void> = async () => {}) {
  const sendMessage = vi.fn(impl);
  const calls: unknown[][] = [];
  const api: MessageApi = {
    sendMessage: async (...args) => {
      calls.push(args);
      await sendMessage();
      return {
        message_id: 1,
        date: 0,
        chat: { id: Number(args[0]), type: "private", first_name: "test" },
        text: args[1],
      };
    },
  };
  return { api, calls };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a rejection");
}

describe("Telegram notifier", () => {
  it("sends HTML messages without link previews", async () => {
    const { api, calls } = fakeApi();
    const controller = new AbortController();

    await createTelegramNotifier(api).send(42, "<b>bitcoin</b>: 1 USD", controller.signal);

    expect(calls).toEqual([
      [
        42,
        "<b>bitcoin</b>: 1 USD",
        { parse_mode: "HTML", link_preview_options: { is_disabled: true } },
        controller.signal,
      ],
    ]);
  });

  it("marks the chat as gone when the bot was blocked", async () => {
    const { api } = fakeApi(async () => Promise.reject(apiError(403, "Forbidden: bot was blocked by the user")));

    const err = await captureError(createTelegramNotifier(api).send(42, "hi"));

    expect(err).toBeInstanceOf(DeliveryFailedError);
    expect(err).toMatchObject({ chatId: 42, chatGone: true });
  });

  it("marks the chat as gone when it no longer exists", async () => {
    const { api } = fakeApi(async () => Promise.reject(apiError(400, "Bad Request: chat not found")));
    const err = await captureError(createTelegramNotifier(api).send(7, "hi"));
    expect(err).toMatchObject({ chatGone: true });
  });

  it("keeps the chat on transient failures", async () => {
    const { api } = fakeApi(async () => Promise.reject(apiError(429, "Too Many Requests: retry after 5")));
    const err = await captureError(createTelegramNotifier(api).send(42, "hi"));
    expect(err).toBeInstanceOf(DeliveryFailedError);
    expect(err).toMatchObject({
      chatGone: false,
      message: "Telegram rejected message: Too Many Requests: retry after 5",
    });
  });

  it("wraps network errors", async () => {
    const { api } = fakeApi(async () => Promise.reject(new Error("ECONNRESET")));
    const err = await captureError(createTelegramNotifier(api).send(42, "hi"));
    expect(err).toMatchObject({ chatGone: false, message: "ECONNRESET" });
  });
});
