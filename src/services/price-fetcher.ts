import { setTimeout as delay } from "node:timers/promises";
import axios from "axios";
import { z } from "zod";
import { config } from "../config.js";
import { SourceUnavailableError, errorMessage } from "../errors.js";
import type { CoinListing, PriceQuote, PriceSource } from "../types.js";

export interface HttpClient {
  get(url: string, options?: { params?: Record<string, unknown>; signal?: AbortSignal }): Promise<{ data: unknown }>;
}

export interface CoinGeckoOptions {
  http?: HttpClient;
  retries?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

const simplePriceSchema = z.record(z.record(z.number().nullable()));

const marketsSchema = z.array(
  z.object({
    id: z.string(),
    symbol: z.string(),
    name: z.string(),
    current_price: z.number().nullable().optional(),
  }),
);

function createHttpClient(): HttpClient {
  return axios.create({
    baseURL: config.coingecko.baseUrl,
    timeout: config.scheduler.priceTimeoutMs,
    headers: config.coingecko.apiKey ? { "x-cg-demo-api-key": config.coingecko.apiKey } : {},
  });
}

function isRateLimited(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response?.status === 429;
}

const defaultSleep = (ms: number, signal?: AbortSignal) => delay(ms, undefined, { signal });

export function createCoinGeckoSource(options: CoinGeckoOptions = {}): PriceSource {
  const http = options.http ?? createHttpClient();
  const retries = options.retries ?? 2;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());

  async function getWithRetry(path: string, params: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();
      try {
        const { data } = await http.get(path, { params, signal });
        return data;
      } catch (err) {
        if (isRateLimited(err) && attempt < retries) {
          const wait = (attempt + 1) * 2000;
          console.warn(`[PRICES] CoinGecko 429, retrying in ${wait / 1000}s (attempt ${attempt + 1}/${retries})`);
          await sleep(wait, signal);
          continue;
        }
        throw err;
      }
    }
  }

  return {
    async getPrice(coinId, currency, signal) {
      let data: unknown;
      try {
        data = await getWithRetry(
          "/simple/price",
          { ids: coinId, vs_currencies: currency, include_24hr_change: "true", include_market_cap: "true" },
          signal,
        );
      } catch (err) {
        throw new SourceUnavailableError(coinId, currency, `Price lookup for ${coinId}/${currency} failed: ${errorMessage(err)}`, err);
      }

      const parsed = simplePriceSchema.safeParse(data);
      const entry = parsed.success ? parsed.data[coinId] : undefined;
      const price = entry?.[currency];
      if (price == null) {
        throw new SourceUnavailableError(coinId, currency, `No ${currency} price for ${coinId}`);
      }

      return {
        coinId,
        currency,
        price,
        change24h: entry?.[`${currency}_24h_change`] ?? null,
        marketCap: entry?.[`${currency}_market_cap`] ?? null,
        fetchedAt: now(),
      } satisfies PriceQuote;
    },

    async listTopCoins(count, currency) {
      let data: unknown;
      try {
        data = await getWithRetry("/coins/markets", {
          vs_currency: currency,
          order: "market_cap_desc",
          per_page: count,
          page: 1,
        });
      } catch (err) {
        throw new SourceUnavailableError("*", currency, `Top coins lookup failed: ${errorMessage(err)}`, err);
      }

      const parsed = marketsSchema.safeParse(data);
      if (!parsed.success) {
        throw new SourceUnavailableError("*", currency, "Unexpected coins/markets response");
      }
      return parsed.data.map(
        (c): CoinListing => ({ id: c.id, symbol: c.symbol, name: c.name, price: c.current_price ?? null }),
      );
    },
  };
}
