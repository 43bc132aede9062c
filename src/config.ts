import "dotenv/config";
import { z } from "zod";
import { AppError, ErrorCodes } from "./errors.js";

// Unset and empty variables take the default.
function positiveInt(fallback: number) {
  return z.preprocess(
    (v) => (v === "" ? undefined : v),
    z.coerce.number().int().positive().default(fallback),
  );
}

const numericEnv = z.object({
  PORT: positiveInt(8000).pipe(z.number().max(65535)),
  DEFAULT_UPDATE_INTERVAL: positiveInt(300),
  MIN_UPDATE_INTERVAL: positiveInt(10),
  SCHEDULER_TICK_SECONDS: positiveInt(5),
  PRICE_TIMEOUT_MS: positiveInt(10_000),
  SEND_TIMEOUT_MS: positiveInt(10_000),
  SCHEDULER_CONCURRENCY: positiveInt(4),
});

export type NumericSettings = z.infer<typeof numericEnv>;

export function parseNumericEnv(env: Record<string, string | undefined>): NumericSettings {
  const parsed = numericEnv.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new AppError(ErrorCodes.CONFIG_INVALID, `Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

const numbers = parseNumericEnv(process.env);

export const config = {
  databaseUrl: process.env.DATABASE_URL || "postgresql://localhost:5432/crypto_bot",
  telegram: {
    token: process.env.TELEGRAM_TOKEN || "",
    webhookUrl: (process.env.TELEGRAM_WEBHOOK_URL || "").trim(),
    webhookPath: (process.env.WEBHOOK_PATH || "/webhook").replace(/\/+$/, ""),
  },
  server: {
    host: process.env.HOST || "0.0.0.0",
    port: numbers.PORT,
  },
  coingecko: {
    baseUrl: process.env.COINGECKO_BASE_URL || "https://api.coingecko.com/api/v3",
    apiKey: process.env.COINGECKO_API_KEY,
  },
  defaultCurrency: (process.env.DEFAULT_CURRENCY || "usd").toLowerCase(),
  defaultIntervalSeconds: numbers.DEFAULT_UPDATE_INTERVAL,
  minIntervalSeconds: numbers.MIN_UPDATE_INTERVAL,
  scheduler: {
    tickFloorSeconds: numbers.SCHEDULER_TICK_SECONDS,
    priceTimeoutMs: numbers.PRICE_TIMEOUT_MS,
    sendTimeoutMs: numbers.SEND_TIMEOUT_MS,
    concurrency: numbers.SCHEDULER_CONCURRENCY,
  },
};

export function isTelegramConfigured(): boolean {
  return !!config.telegram.token;
}

export function isWebhookConfigured(): boolean {
  return !!(config.telegram.token && config.telegram.webhookUrl);
}
