import 'dotenv/config';
import { loadConfig } from './config.js';
import { createServices } from './services.js';
import { createTelegramBot } from './telegram/bot.js';
import { startScheduler } from './scheduler.js';
import { sendPerformanceReport } from './pipeline/daily-report.js';
import { formatStartup } from './telegram/notifier.js';
import { startDashboard } from './dashboard/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`[Boot] setup-alert-tracker starting (${config.NODE_ENV})`);

  // ── Trade ledger + services ─────────────────────────────────────────────
  const services = await createServices(config);
  const { ledger, monitor, sweep, notifier, calendar } = services;
  console.log(`[Boot] Trade log ready (${ledger.active().length} trade(s) monitoring)`);

  // ── Dashboard (Express API) ─────────────────────────────────────────────
  const server = startDashboard(services, config.PORT);

  // ── Telegram Bot ────────────────────────────────────────────────────────
  // bot.launch() with long polling never resolves — fire-and-forget
  const bot = config.TELEGRAM_BOT_ENABLED
    ? createTelegramBot(config.TELEGRAM_BOT_TOKEN, config.TELEGRAM_CHAT_ID, services)
    : null;
  if (bot) {
    bot.launch().catch(err => console.error('[TelegramBot] Launch error:', err));
    console.log('[Boot] Telegram bot launched');
  }

  // ── Monitoring loop ─────────────────────────────────────────────────────
  monitor.start();

  // ── Scheduler ───────────────────────────────────────────────────────────
  const scheduler = startScheduler({
    sweep,
    marketHours: calendar,
    sweepIntervalMs: config.SWEEP_INTERVAL_MS,
    sweepEnabled: config.SWEEP_ENABLED,
    reportCron: config.DAILY_REPORT_CRON,
    timeZone: config.EXCHANGE_TIMEZONE,
    sendDailyReport: () => sendPerformanceReport(ledger, notifier),
  });

  // ── Startup notification ────────────────────────────────────────────────
  await notifier.notify(formatStartup({
    symbols: sweep.symbolCount,
    activeTrades: ledger.active().length,
    sweepIntervalMin: config.SWEEP_INTERVAL_MS / 60_000,
  }));

  console.log(`[Boot] All systems up. Dashboard: http://localhost:${config.PORT}`);

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[Boot] ${signal} received — shutting down`);
    scheduler.stop();
    bot?.stop(signal);
    await monitor.stop();
    await ledger.flushPending();
    server.close();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('[Boot] Fatal error:', err);
  process.exit(1);
});
