import { Telegraf } from 'telegraf';
import { errorMessage } from '../lib/errors.js';
import { buildPerformanceReport } from '../pipeline/daily-report.js';
import { triggerSweep } from '../services.js';
import type { AppServices } from '../services.js';
import type { PerformanceSummary } from '../types/stats.js';
import type { TradeRecord } from '../types/trade.js';
import { escapeHtml } from './notifier.js';

const MAX_LISTED_TRADES = 20;

// ── Argument parsing ──────────────────────────────────────────────────────────

/** "/enter@my_bot AAPL_day_20250715_1030 2.15" → ["AAPL_day_20250715_1030", "2.15"] */
export function parseCommandArgs(text: string): string[] {
  return text.trim().split(/\s+/).slice(1);
}

/** `<trade_id> <price>` with a positive price, or null. */
export function parseTradePrice(text: string): { tradeId: string; price: number } | null {
  const [tradeId, rawPrice] = parseCommandArgs(text);
  if (!tradeId || !rawPrice) return null;
  const price = Number(rawPrice.replace(/^\$/, ''));
  if (!Number.isFinite(price) || price <= 0) return null;
  return { tradeId, price };
}

/** Optional positive day count, defaulting to 30. Null when the argument is not a number. */
export function parseSummaryDays(text: string, fallback = 30): number | null {
  const [raw] = parseCommandArgs(text);
  if (raw === undefined) return fallback;
  const days = Number(raw);
  return Number.isInteger(days) && days > 0 ? days : null;
}

export function parseSweepForce(text: string): boolean {
  const [raw] = parseCommandArgs(text);
  return raw?.toLowerCase() === 'force';
}

// ── Formatting ────────────────────────────────────────────────────────────────

function tradeLine(t: TradeRecord): string {
  const entry = t.actualEntry != null ? `entry $${t.actualEntry.toFixed(2)}` : `est. $${t.estimatedEntry.toFixed(2)}`;
  const pnl = t.status === 'SETUP_READY' ? '' : ` | P&L $${t.pnl.toFixed(2)}`;
  return `<code>${t.id}</code>\n  ${t.status} · ${entry}${pnl}`;
}

function summaryText(summary: PerformanceSummary): string {
  if (!summary.hasData) return `📊 ${summary.periodDays}-day summary\n${summary.message}`;
  return (
    `📊 <b>${summary.periodDays}-day summary</b>\n` +
    `Trades: ${summary.totalTrades} (${summary.wins}W / ${summary.losses}L)\n` +
    `Win rate: ${summary.winRate.toFixed(1)}%\n` +
    `Total P&L: $${summary.totalPnl.toFixed(2)} (${summary.totalPnlPercent.toFixed(1)}%)\n` +
    `Avg P&L: $${summary.avgPnlPerTrade.toFixed(2)} | Avg confluence: ${summary.avgConfluenceScore.toFixed(1)}/100\n` +
    `Best: ${summary.bestTrade.symbol} ${summary.bestTrade.style} $${summary.bestTrade.pnl.toFixed(2)}\n` +
    `Worst: ${summary.worstTrade.symbol} ${summary.worstTrade.style} $${summary.worstTrade.pnl.toFixed(2)}`
  );
}

const HELP_TEXT =
  `🤖 Setup Alert Tracker\n\n` +
  `Commands:\n` +
  `/status — system and market status\n` +
  `/trades — setups awaiting entry and open trades\n` +
  `/enter &lt;id&gt; &lt;price&gt; — record a fill\n` +
  `/close &lt;id&gt; &lt;price&gt; — close an open trade manually\n` +
  `/summary [days] — performance summary (default 30)\n` +
  `/report — 7-day and 30-day performance report\n` +
  `/sweep [force] — run a setup sweep now\n` +
  `/help — this message`;

// ── Bot ───────────────────────────────────────────────────────────────────────

export function createTelegramBot(token: string, chatId: string, services: AppServices): Telegraf {
  const bot = new Telegraf(token);
  const { ledger, agent, calendar, monitor, sweep, clock } = services;

  // Only the configured chat is served
  bot.use(async (ctx, next) => {
    if (String(ctx.chat?.id ?? '') !== chatId) {
      console.warn(`[TelegramBot] Ignoring update from chat ${ctx.chat?.id ?? 'unknown'}`);
      return;
    }
    await next();
  });

  bot.start(async (ctx) => {
    await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' });
  });

  bot.help(async (ctx) => {
    await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' });
  });

  // ── /status ───────────────────────────────────────────────────────────────
  bot.command('status', async (ctx) => {
    const market = calendar.getMarketStatus(clock());
    const health = ledger.health();
    const msg =
      `✅ System running\n` +
      `🏛 Market: ${market.isOpen ? 'OPEN' : `CLOSED (${market.reason ?? 'closed'})`}\n` +
      `📍 Monitoring: ${ledger.active().length} | Awaiting entry: ${ledger.list({ status: 'SETUP_READY' }).length}\n` +
      `🔁 Sweep: ${sweep.isRunning ? 'running' : 'idle'} | Monitor: ${monitor.running ? 'on' : 'off'}\n` +
      `💾 Persistence: ${health.ok ? 'ok' : `${health.pendingFlushes.length} unflushed`}\n` +
      `🕐 ${market.currentTime} ET`;
    await ctx.reply(msg);
  });

  // ── /trades ───────────────────────────────────────────────────────────────
  bot.command('trades', async (ctx) => {
    const open = [...ledger.list({ status: 'SETUP_READY' }), ...ledger.active()];
    if (open.length === 0) {
      await ctx.reply('No setups or open trades.');
      return;
    }
    const shown = open.slice(-MAX_LISTED_TRADES);
    const msg = `<b>Trades (${open.length})</b>\n\n` + shown.map(tradeLine).join('\n\n');
    await ctx.reply(msg, { parse_mode: 'HTML' });
  });

  // ── /enter <id> <price> ───────────────────────────────────────────────────
  bot.command('enter', async (ctx) => {
    const args = parseTradePrice(ctx.message.text);
    if (!args) {
      await ctx.reply('Usage: <code>/enter &lt;trade_id&gt; &lt;price&gt;</code>', { parse_mode: 'HTML' });
      return;
    }
    try {
      await agent.enter(args.tradeId, args.price);
    } catch (err) {
      await ctx.reply(`❌ ${escapeHtml(errorMessage(err))}`);
    }
  });

  // ── /close <id> <price> ───────────────────────────────────────────────────
  bot.command('close', async (ctx) => {
    const args = parseTradePrice(ctx.message.text);
    if (!args) {
      await ctx.reply('Usage: <code>/close &lt;trade_id&gt; &lt;price&gt;</code>', { parse_mode: 'HTML' });
      return;
    }
    try {
      await agent.close(args.tradeId, args.price);
    } catch (err) {
      await ctx.reply(`❌ ${escapeHtml(errorMessage(err))}`);
    }
  });

  // ── /summary [days] ───────────────────────────────────────────────────────
  bot.command('summary', async (ctx) => {
    const days = parseSummaryDays(ctx.message.text);
    if (days === null) {
      await ctx.reply('Usage: /summary [days]');
      return;
    }
    await ctx.reply(summaryText(ledger.summary(days, clock())), { parse_mode: 'HTML' });
  });

  // ── /report ───────────────────────────────────────────────────────────────
  bot.command('report', async (ctx) => {
    await ctx.reply(buildPerformanceReport(ledger, clock()), { parse_mode: 'HTML' });
  });

  // ── /sweep [force] ────────────────────────────────────────────────────────
  bot.command('sweep', async (ctx) => {
    const trigger = triggerSweep(services, parseSweepForce(ctx.message.text));
    switch (trigger.status) {
      case 'started':
        await ctx.reply(`🔍 Sweep started (${sweep.symbolCount} symbols)`);
        break;
      case 'skipped':
        await ctx.reply(`⏸ Sweep skipped: ${trigger.reason}. Use /sweep force to override.`);
        break;
      case 'already-running':
        await ctx.reply('⏳ A sweep is already running');
        break;
    }
  });

  // Error handler
  bot.catch((err, ctx) => {
    console.error('[TelegramBot] Error:', errorMessage(err), 'for update:', ctx.updateType);
  });

  return bot;
}
