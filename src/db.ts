import pg from "pg";
import { z } from "zod";
import { config } from "./config.js";
import { ConfigInvalidError } from "./errors.js";
import type { AlertRule, NewAlertRule, NewSubscription, Snapshot, Store, Subscription } from "./types.js";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

export function createPool(databaseUrl = config.databaseUrl): pg.Pool {
  const isLocal = databaseUrl.includes("localhost") || databaseUrl.includes("127.0.0.1");
  const url = !isLocal && !databaseUrl.includes("sslmode=")
    ? databaseUrl + (databaseUrl.includes("?") ? "&" : "?") + "sslmode=require"
    : databaseUrl;

  return new pg.Pool({
    connectionString: url,
    ssl: isLocal ? false : { rejectUnauthorized: false },
  });
}

// ── Schema initialization ────────────────────────────────────────────────

export async function initDb(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS chats (
      chat_id     BIGINT PRIMARY KEY,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS subscriptions (
      id               SERIAL PRIMARY KEY,
      chat_id          BIGINT NOT NULL REFERENCES chats(chat_id) ON DELETE CASCADE,
      coin_id          TEXT NOT NULL,
      currency         TEXT NOT NULL DEFAULT 'usd',
      interval_seconds INTEGER NOT NULL,
      last_sent_at     TIMESTAMPTZ,
      created_at       TIMESTAMPTZ NOT NULL DEFAULT now(),
      UNIQUE (chat_id, coin_id, currency)
    );

    CREATE TABLE IF NOT EXISTS alerts (
      id             SERIAL PRIMARY KEY,
      chat_id        BIGINT NOT NULL REFERENCES chats(chat_id) ON DELETE CASCADE,
      coin_id        TEXT NOT NULL,
      currency       TEXT NOT NULL DEFAULT 'usd',
      threshold      DOUBLE PRECISION NOT NULL,
      direction      TEXT NOT NULL,
      armed          BOOLEAN NOT NULL DEFAULT true,
      last_fired_at  TIMESTAMPTZ,
      created_at     TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE INDEX IF NOT EXISTS subscriptions_chat_idx ON subscriptions (chat_id);
    CREATE INDEX IF NOT EXISTS alerts_chat_idx ON alerts (chat_id);
  `);
}

// ── Row mapping ─────────────────────────────────────────────────────────

// BIGINT comes back from pg as a string.
const subscriptionRow = z.object({
  id: z.number().int(),
  chatId: z.coerce.number().int(),
  coinId: z.string().min(1),
  currency: z.string().min(1),
  intervalSeconds: z.number().int().positive(),
  lastSentAt: z.date().nullable(),
});

const alertRow = z.object({
  id: z.number().int(),
  chatId: z.coerce.number().int(),
  coinId: z.string().min(1),
  currency: z.string().min(1),
  threshold: z.number().finite(),
  direction: z.enum(["above", "below"]),
  armed: z.boolean(),
  lastFiredAt: z.date().nullable(),
  createdAt: z.date(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "row"}: ${i.message}`).join("; ");
}

export function parseSubscriptionRows(rows: Record<string, unknown>[]): Snapshot<Subscription> {
  const snapshot: Snapshot<Subscription> = { valid: [], invalid: [] };
  for (const row of rows) {
    const parsed = subscriptionRow.safeParse(row);
    if (parsed.success) {
      snapshot.valid.push(parsed.data);
    } else {
      snapshot.invalid.push(
        new ConfigInvalidError("subscription", row.id, `Invalid subscription ${String(row.id)}: ${describeIssues(parsed.error)}`),
      );
    }
  }
  return snapshot;
}

export function parseAlertRows(rows: Record<string, unknown>[]): Snapshot<AlertRule> {
  const snapshot: Snapshot<AlertRule> = { valid: [], invalid: [] };
  for (const row of rows) {
    const parsed = alertRow.safeParse(row);
    if (parsed.success) {
      snapshot.valid.push(parsed.data);
    } else {
      snapshot.invalid.push(
        new ConfigInvalidError("alert", row.id, `Invalid alert ${String(row.id)}: ${describeIssues(parsed.error)}`),
      );
    }
  }
  return snapshot;
}

const SUBSCRIPTION_COLUMNS = `
  id, chat_id AS "chatId", coin_id AS "coinId", currency,
  interval_seconds AS "intervalSeconds", last_sent_at AS "lastSentAt"
`;

const ALERT_COLUMNS = `
  id, chat_id AS "chatId", coin_id AS "coinId", currency, threshold,
  direction, armed, last_fired_at AS "lastFiredAt", created_at AS "createdAt"
`;

function firstValid<T>(snapshot: Snapshot<T>): T {
  const [item] = snapshot.valid;
  if (!item) throw snapshot.invalid[0] ?? new Error("Query returned no row");
  return item;
}

// ── Store ───────────────────────────────────────────────────────────────

export function createPgStore(db: Queryable): Store {
  async function ensureChat(chatId: number): Promise<void> {
    await db.query(`INSERT INTO chats (chat_id) VALUES ($1) ON CONFLICT (chat_id) DO NOTHING`, [chatId]);
  }

  return {
    ensureChat,

    async removeChat(chatId) {
      const { rowCount } = await db.query(`DELETE FROM chats WHERE chat_id = $1`, [chatId]);
      return (rowCount ?? 0) > 0;
    },

    async loadActiveSubscriptions() {
      const { rows } = await db.query(`SELECT ${SUBSCRIPTION_COLUMNS} FROM subscriptions ORDER BY id`);
      return parseSubscriptionRows(rows);
    },

    async loadAllAlertRules() {
      const { rows } = await db.query(`SELECT ${ALERT_COLUMNS} FROM alerts ORDER BY id`);
      return parseAlertRows(rows);
    },

    async saveSubscription(subscription) {
      await db.query(`UPDATE subscriptions SET last_sent_at = $1 WHERE id = $2`, [
        subscription.lastSentAt,
        subscription.id,
      ]);
    },

    async saveAlertRule(rule) {
      await db.query(`UPDATE alerts SET armed = $1, last_fired_at = $2 WHERE id = $3`, [
        rule.armed,
        rule.lastFiredAt,
        rule.id,
      ]);
    },

    async upsertSubscription(input: NewSubscription) {
      await ensureChat(input.chatId);
      const { rows } = await db.query(
        `INSERT INTO subscriptions (chat_id, coin_id, currency, interval_seconds)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (chat_id, coin_id, currency) DO UPDATE SET interval_seconds = EXCLUDED.interval_seconds
         RETURNING ${SUBSCRIPTION_COLUMNS}`,
        [input.chatId, input.coinId, input.currency, input.intervalSeconds],
      );
      return firstValid(parseSubscriptionRows(rows));
    },

    async deleteSubscription(chatId, coinId, currency) {
      const { rowCount } = currency
        ? await db.query(`DELETE FROM subscriptions WHERE chat_id = $1 AND coin_id = $2 AND currency = $3`, [
            chatId,
            coinId,
            currency,
          ])
        : await db.query(`DELETE FROM subscriptions WHERE chat_id = $1 AND coin_id = $2`, [chatId, coinId]);
      return rowCount ?? 0;
    },

    async listSubscriptions(chatId) {
      const { rows } = await db.query(
        `SELECT ${SUBSCRIPTION_COLUMNS} FROM subscriptions WHERE chat_id = $1 ORDER BY id`,
        [chatId],
      );
      return parseSubscriptionRows(rows).valid;
    },

    async addAlertRule(input: NewAlertRule) {
      await ensureChat(input.chatId);
      const { rows } = await db.query(
        `INSERT INTO alerts (chat_id, coin_id, currency, threshold, direction)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${ALERT_COLUMNS}`,
        [input.chatId, input.coinId, input.currency, input.threshold, input.direction],
      );
      return firstValid(parseAlertRows(rows));
    },

    async listAlertRules(chatId) {
      const { rows } = await db.query(`SELECT ${ALERT_COLUMNS} FROM alerts WHERE chat_id = $1 ORDER BY id`, [chatId]);
      return parseAlertRows(rows).valid;
    },

    async deleteAlertRule(chatId, id) {
      const { rowCount } = await db.query(`DELETE FROM alerts WHERE id = $1 AND chat_id = $2`, [id, chatId]);
      return (rowCount ?? 0) > 0;
    },
  };
}
