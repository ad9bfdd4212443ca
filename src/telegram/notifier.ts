import type { IndicatorSnapshot } from '../types/snapshot.js';
import { STYLE_PROFILES } from '../types/setup.js';
import type { PerformanceSummary } from '../types/stats.js';
import type { TradeRecord } from '../types/trade.js';
import { movingAverage } from '../types/snapshot.js';
import { errorMessage } from '../lib/errors.js';

const TELEGRAM_BASE = 'https://api.telegram.org';

/** Outbound message channel. `notify` resolves false on failure and never rejects. */
export interface Notifier {
  notify(text: string): Promise<boolean>;
}

export interface TelegramNotifierOptions {
  token: string;
  chatId: string;
  timeoutMs: number;
  baseUrl?: string;
}

export class TelegramNotifier implements Notifier {
  constructor(private readonly opts: TelegramNotifierOptions) {}

  async notify(text: string): Promise<boolean> {
    const base = this.opts.baseUrl ?? TELEGRAM_BASE;
    try {
      const res = await fetch(`${base}/bot${this.opts.token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.opts.chatId,
          text,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });

      if (!res.ok) {
        const err = await res.text();
        console.error(`[Telegram] Send error ${res.status}:`, err);
        return false;
      }
      return true;
    } catch (err) {
      console.error('[Telegram] Network error:', errorMessage(err));
      return false;
    }
  }
}

// ── Helpers ────────────────────────────────────────────────────────────────────

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function fmt(n: number | null | undefined, dp = 2): string {
  if (n == null || !Number.isFinite(n)) return 'n/a';
  return n.toFixed(dp);
}

function fmtUsd(n: number | null | undefined): string {
  if (n == null || !Number.isFinite(n)) return 'n/a';
  return n < 0 ? `-$${Math.abs(n).toFixed(2)}` : `$${n.toFixed(2)}`;
}

function fmtSignedUsd(n: number): string {
  return n >= 0 ? `+$${n.toFixed(2)}` : `-$${Math.abs(n).toFixed(2)}`;
}

function fmtSignedPct(n: number): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(1)}%`;
}

/** 45 → "45m", 125 → "2h 5m", 1500 → "1d 1h" */
export function formatDuration(minutes: number | null): string {
  if (minutes == null || !Number.isFinite(minutes)) return 'n/a';
  const total = Math.round(minutes);
  if (total < 60) return `${total}m`;
  if (total < 24 * 60) return `${Math.floor(total / 60)}h ${total % 60}m`;
  const days = Math.floor(total / (24 * 60));
  return `${days}d ${Math.floor((total % (24 * 60)) / 60)}h`;
}

const EXIT_LABEL: Record<string, string> = {
  TECHNICAL_BREAKDOWN: '📉 Technical breakdown',
  PROFIT_TARGET:       '🎯 Profit target',
  TIME_LIMIT:          '⏰ Time limit',
  STOP_LOSS:           '🛑 Stop loss',
  MANUAL:              '✋ Manual close',
};

// ── Trade lifecycle messages ───────────────────────────────────────────────────

/** Setup alert for a freshly recorded SETUP_READY trade. */
export function formatSetupAlert(trade: TradeRecord): string {
  const s = trade.setupSnapshot;
  const threshold = STYLE_PROFILES[trade.style].rvolThreshold;
  const ma21 = movingAverage(s, 21);
  const vsMa21 = ma21 !== undefined && s.price > ma21 ? 'Above' : 'Below';

  return [
    `🚨 <b>${trade.style.toUpperCase()} SETUP DETECTED</b>`,
    '',
    `<b>${trade.symbol}</b> - $${fmt(s.price)}`,
    `<b>Reason:</b> ${escapeHtml(trade.setupDecision.reason)}`,
    `<b>Confluence:</b> ${trade.confluenceScore}/100`,
    '',
    `<b>Technical Confluence:</b>`,
    `• 9/21 EMA: ${s.trendState['9_21'] ?? 'N/A'}`,
    `• 34/50 EMA: ${s.trendState['34_50'] ?? 'N/A'}`,
    `• RVOL: ${fmt(s.relativeVolume, 1)}x (Threshold: ${fmt(threshold, 1)}x)`,
    `• Price vs 21MA: ${vsMa21}`,
    '',
    `<b>Key Levels:</b>`,
    `• R1 Pivot: $${fmt(s.pivots.r1)}`,
    `• S1 Pivot: $${fmt(s.pivots.s1)}`,
    `• 50 EMA: $${fmt(movingAverage(s, 50))}`,
    '',
    `<b>Estimated Entry:</b> ~$${fmt(trade.estimatedEntry)}`,
    `<b>Trade Style:</b> ${STYLE_PROFILES[trade.style].label}`,
    `<b>Setup ID:</b> <code>${trade.id}</code>`,
    '',
    `#${trade.symbol} #SETUP #${trade.style.toUpperCase()}`,
  ].join('\n');
}

export function formatEntryConfirmation(trade: TradeRecord): string {
  return [
    `✅ <b>ENTRY CONFIRMED: ${trade.symbol} ${trade.style.toUpperCase()}</b>`,
    `Entry: $${fmt(trade.actualEntry)} (est. $${fmt(trade.estimatedEntry)}, slippage ${fmtUsd(trade.slippage)})`,
    `Stop: $${fmt(trade.stopLossPrice)} | Target: $${fmt(trade.targetPrice)}`,
    `Monitoring started — <code>${trade.id}</code>`,
  ].join('\n');
}

export function formatStatusUpdate(trade: TradeRecord, snapshot: IndicatorSnapshot): string {
  return [
    `📊 <b>${trade.symbol} ${trade.style.toUpperCase()} update</b>`,
    `Underlying: $${fmt(snapshot.price)} | Option: $${fmt(trade.lastPrice)}`,
    `P&L: ${fmtSignedUsd(trade.pnl)} (${fmtSignedPct(trade.pnlPercent)})`,
    `Max profit: $${fmt(trade.maxProfit)} | Max drawdown: $${fmt(trade.maxDrawdown)}`,
    `Stop: $${fmt(trade.stopLossPrice)} | Target: $${fmt(trade.targetPrice)}`,
  ].join('\n');
}

export function formatExitNotification(trade: TradeRecord): string {
  const icon = trade.pnl > 0 ? '🟢' : trade.pnl < 0 ? '🔴' : '⚪';
  const label = trade.exitReason ? EXIT_LABEL[trade.exitReason] ?? trade.exitReason : 'n/a';
  return [
    `${icon} <b>EXIT: ${trade.symbol} ${trade.style.toUpperCase()}</b>`,
    `Reason: ${label}`,
    `Detail: ${escapeHtml(trade.exitDetail ?? '')}`,
    `Entry: $${fmt(trade.actualEntry)} | Exit: $${fmt(trade.exitPrice)}`,
    `P&L: ${fmtSignedUsd(trade.pnl)} (${fmtSignedPct(trade.pnlPercent)})`,
    `Max profit: $${fmt(trade.maxProfit)} | Max drawdown: $${fmt(trade.maxDrawdown)}`,
    `Duration: ${formatDuration(trade.durationMinutes)}`,
  ].join('\n');
}

// ── Performance report ─────────────────────────────────────────────────────────

function summaryBlock(title: string, summary: PerformanceSummary): string[] {
  if (!summary.hasData) return [`<b>${title}:</b>`, `• ${summary.message}`];
  return [
    `<b>${title}:</b>`,
    `• Total Trades: ${summary.totalTrades} (${summary.wins}W / ${summary.losses}L)`,
    `• Win Rate: ${fmt(summary.winRate, 1)}%`,
    `• Total P&L: ${fmtUsd(summary.totalPnl)} (${fmtSignedPct(summary.totalPnlPercent)})`,
    `• Avg P&L per Trade: ${fmtUsd(summary.avgPnlPerTrade)}`,
    `• Avg Confluence Score: ${fmt(summary.avgConfluenceScore, 1)}/100`,
  ];
}

export function formatPerformanceReport(weekly: PerformanceSummary, monthly: PerformanceSummary): string {
  const lines = [
    `📊 <b>TRADING PERFORMANCE REPORT</b>`,
    '',
    ...summaryBlock('7-DAY SUMMARY', weekly),
    '',
    ...summaryBlock('30-DAY SUMMARY', monthly),
  ];

  if (monthly.hasData) {
    lines.push('', `<b>TRADE STYLE BREAKDOWN (30d):</b>`);
    for (const [style, row] of Object.entries(monthly.styleBreakdown)) {
      if (!row) continue;
      const winRate = row.count > 0 ? (row.wins / row.count) * 100 : 0;
      lines.push(`• ${style}: ${row.count} trades, ${winRate.toFixed(1)}% win rate, ${fmtUsd(row.pnl)} P&L`);
    }

    const best = monthly.bestTrade;
    lines.push('', `🏆 <b>BEST TRADE (30d):</b> ${best.symbol} ${best.style} ${fmtSignedUsd(best.pnl)} (${fmtSignedPct(best.pnlPercent)})`);
    const worst = monthly.worstTrade;
    lines.push(`💥 <b>WORST TRADE (30d):</b> ${worst.symbol} ${worst.style} ${fmtSignedUsd(worst.pnl)} (${fmtSignedPct(worst.pnlPercent)})`);
  }

  return lines.join('\n');
}

/** System startup notification */
export function formatStartup(info: { symbols: number; activeTrades: number; sweepIntervalMin: number }): string {
  return (
    `🚀 <b>Setup Alert Tracker Started</b>\n` +
    `Sweep: ${info.symbols} symbols every ${info.sweepIntervalMin} min during market hours\n` +
    `Monitoring: ${info.activeTrades} open trade(s)\n` +
    `Commands: <code>/trades</code>, <code>/enter</code>, <code>/close</code>, <code>/summary</code>, <code>/help</code>`
  );
}
