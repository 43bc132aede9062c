import { TimeoutError } from "../errors.js";

export interface Pair {
  coinId: string;
  currency: string;
}

export function pairKey(coinId: string, currency: string): string {
  return `${coinId}|${currency}`;
}

/** Groups items by their (coin, currency) pair, keeping first-seen order. */
export function groupByPair<T extends Pair>(items: T[]): Map<string, { pair: Pair; items: T[] }> {
  const groups = new Map<string, { pair: Pair; items: T[] }>();

  for (const item of items) {
    const key = pairKey(item.coinId, item.currency);
    const group = groups.get(key);
    if (group) {
      group.items.push(item);
    } else {
      groups.set(key, { pair: { coinId: item.coinId, currency: item.currency }, items: [item] });
    }
  }

  return groups;
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order; a rejection is captured per item instead of failing the batch.
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: "fulfilled", value: await fn(items[index]) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs, label));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
