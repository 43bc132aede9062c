import { Command } from "commander";
import type { Server } from "node:http";
import { Api, webhookCallback } from "grammy";
import { config, isTelegramConfigured, isWebhookConfigured } from "./config.js";
import { createPgStore, createPool, initDb } from "./db.js";
import { createBot } from "./bot/controller.js";
import { computeTickSeconds, runCycle, startScheduler, type SchedulerDeps } from "./scheduler.js";
import { createApp, startServer } from "./server.js";
import { createTelegramNotifier } from "./services/notifier.js";
import { createCoinGeckoSource } from "./services/price-fetcher.js";

const program = new Command();

program
  .name("crypto-price-bot")
  .description("Telegram bot for crypto price updates and threshold alerts");

function requireToken(): string {
  if (!isTelegramConfigured()) {
    console.error("Error: TELEGRAM_TOKEN is not set.");
    process.exit(1);
  }
  return config.telegram.token;
}

program
  .command("init-db")
  .description("Create the database tables")
  .action(async () => {
    const pool = createPool();
    try {
      await initDb(pool);
      console.log("Database initialized.");
    } finally {
      await pool.end();
    }
  });

program
  .command("cycle")
  .description("Run a single evaluation cycle and print its report")
  .action(async () => {
    const token = requireToken();
    const pool = createPool();
    try {
      const report = await runCycle(new Date(), {
        store: createPgStore(pool),
        priceSource: createCoinGeckoSource(),
        notifier: createTelegramNotifier(new Api(token)),
        options: config.scheduler,
      });
      console.log(JSON.stringify(report, null, 2));
    } finally {
      await pool.end();
    }
  });

program
  .command("start")
  .description("Run the bot and the price scheduler")
  .option("--webhook", "Serve the Telegram webhook instead of long polling (needs TELEGRAM_WEBHOOK_URL)")
  .action(async (opts: { webhook?: boolean }) => {
    const token = requireToken();
    const useWebhook = Boolean(opts.webhook);
    if (useWebhook && !isWebhookConfigured()) {
      console.error("Error: --webhook needs TELEGRAM_WEBHOOK_URL.");
      process.exit(1);
    }

    const pool = createPool();
    await initDb(pool);

    const store = createPgStore(pool);
    const priceSource = createCoinGeckoSource();
    const bot = createBot(token, {
      store,
      priceSource,
      defaultCurrency: config.defaultCurrency,
      defaultIntervalSeconds: config.defaultIntervalSeconds,
      minIntervalSeconds: config.minIntervalSeconds,
    });

    const deps: SchedulerDeps = {
      store,
      priceSource,
      notifier: createTelegramNotifier(bot.api),
      options: config.scheduler,
    };
    const scheduler = startScheduler(
      deps,
      computeTickSeconds(config.minIntervalSeconds, config.scheduler.tickFloorSeconds),
    );

    let server: Server | undefined;
    let shuttingDown = false;
    async function shutdown(signal: string): Promise<void> {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`Received ${signal}, shutting down...`);
      await scheduler.stop();
      if (useWebhook) {
        try {
          await bot.api.deleteWebhook();
          console.log("Webhook removed");
        } catch (err) {
          console.error("Failed to remove webhook during shutdown:", err);
        }
        server?.close();
      } else {
        await bot.stop();
      }
      await pool.end();
      console.log("Shutdown complete");
    }

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((err) => {
          console.error("Shutdown failed:", err);
          process.exitCode = 1;
        });
      });
    }

    if (useWebhook) {
      const app = createApp({
        webhook: { path: config.telegram.webhookPath, token, handler: webhookCallback(bot, "express") },
      });
      server = await startServer(app, config.server.host, config.server.port);
      await bot.api.setWebhook(config.telegram.webhookUrl);
      console.log(`Webhook registered at ${config.telegram.webhookUrl}`);
    } else {
      console.log("Starting in polling mode.");
      await bot.start({
        onStart: (me) => console.log(`[BOT] @${me.username} is polling for updates`),
      });
    }
  });

await program.parseAsync();
