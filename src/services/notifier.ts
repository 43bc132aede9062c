import { GrammyError, HttpError, type Api } from "grammy";
import { DeliveryFailedError } from "../errors.js";
import type { Notifier } from "../types.js";

export type MessageApi = Pick<Api, "sendMessage">;

// Telegram answers 403 when the bot was blocked or kicked, and 400 "chat not
// found" when the chat no longer exists. Neither ever recovers.
function isChatGone(err: GrammyError): boolean {
  if (err.error_code === 403) return true;
  return err.error_code === 400 && /chat not found/i.test(err.description);
}

export function createTelegramNotifier(api: MessageApi): Notifier {
  return {
    async send(chatId, text, signal) {
      try {
        await api.sendMessage(
          chatId,
          text,
          { parse_mode: "HTML", link_preview_options: { is_disabled: true } },
          signal,
        );
      } catch (err) {
        if (err instanceof GrammyError) {
          throw new DeliveryFailedError(chatId, `Telegram rejected message: ${err.description}`, isChatGone(err), err);
        }
        if (err instanceof HttpError) {
          throw new DeliveryFailedError(chatId, `Telegram unreachable: ${err.message}`, false, err);
        }
        throw new DeliveryFailedError(chatId, err instanceof Error ? err.message : String(err), false, err);
      }
    },
  };
}
