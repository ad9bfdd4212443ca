import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { applyExit } from '../src/pipeline/trade-lifecycle.js';
import {
  TelegramNotifier,
  escapeHtml,
  formatDuration,
  formatExitNotification,
  formatPerformanceReport,
  formatSetupAlert,
} from '../src/telegram/notifier.js';
import type { PerformanceSummary } from '../src/types/stats.js';
import { SETUP_AT, minutesAfter, monitoringTrade, quietConsole, setupTrade } from './helpers.js';

describe('formatSetupAlert', () => {
  it('lays out the setup with its confluence and key levels', () => {
    expect(formatSetupAlert(setupTrade('scalp')).split('\n')).toEqual([
      '🚨 <b>SCALP SETUP DETECTED</b>',
      '',
      '<b>AAPL</b> - $200.00',
      '<b>Reason:</b> Strong bullish confluence - RVOL: 1.6x, All EMAs bullish',
      '<b>Confluence:</b> 95/100',
      '',
      '<b>Technical Confluence:</b>',
      '• 9/21 EMA: Bullish',
      '• 34/50 EMA: Bullish',
      '• RVOL: 1.6x (Threshold: 1.5x)',
      '• Price vs 21MA: Above',
      '',
      '<b>Key Levels:</b>',
      '• R1 Pivot: $202.00',
      '• S1 Pivot: $195.00',
      '• 50 EMA: $196.00',
      '',
      '<b>Estimated Entry:</b> ~$6.00',
      '<b>Trade Style:</b> Scalp',
      '<b>Setup ID:</b> <code>AAPL_scalp_test</code>',
      '',
      '#AAPL #SETUP #SCALP',
    ]);
  });
});

describe('formatExitNotification', () => {
  it('reports the outcome of a closed trade', () => {
    const trade = applyExit(monitoringTrade('scalp', 2), 2.6, 'PROFIT_TARGET', 'a < b & c', minutesAfter(SETUP_AT, 125));
    expect(formatExitNotification(trade).split('\n')).toEqual([
      '🟢 <b>EXIT: AAPL SCALP</b>',
      'Reason: 🎯 Profit target',
      'Detail: a &lt; b &amp; c',
      'Entry: $2.00 | Exit: $2.60',
      'P&L: +$0.60 (+30.0%)',
      'Max profit: $0.60 | Max drawdown: $0.00',
      'Duration: 2h 5m',
    ]);
  });
});

describe('formatDuration', () => {
  it('picks the coarsest useful units', () => {
    expect(formatDuration(45)).toBe('45m');
    expect(formatDuration(125)).toBe('2h 5m');
    expect(formatDuration(1500)).toBe('1d 1h');
    expect(formatDuration(null)).toBe('n/a');
  });
});

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML reserves', () => {
    expect(escapeHtml('<b>P&L</b>')).toBe('&lt;b&gt;P&amp;L&lt;/b&gt;');
  });
});

describe('formatPerformanceReport', () => {
  const empty = (periodDays: number): PerformanceSummary => ({
    hasData: false,
    periodDays,
    message: 'No completed trades in the specified period',
  });

  it('says so when there is nothing to report', () => {
    expect(formatPerformanceReport(empty(7), empty(30)).split('\n')).toEqual([
      '📊 <b>TRADING PERFORMANCE REPORT</b>',
      '',
      '<b>7-DAY SUMMARY:</b>',
      '• No completed trades in the specified period',
      '',
      '<b>30-DAY SUMMARY:</b>',
      '• No completed trades in the specified period',
    ]);
  });

  it('adds the style breakdown and best and worst trades', () => {
    const monthly: PerformanceSummary = {
      hasData: true,
      periodDays: 30,
      totalTrades: 3,
      wins: 2,
      losses: 1,
      winRate: 66.7,
      totalPnl: 0.53,
      avgPnlPerTrade: 0.18,
      totalPnlPercent: 26.5,
      avgPnlPercent: 8.8,
      avgConfluenceScore: 81.7,
      styleBreakdown: {
        scalp: { count: 1, pnl: 0.5, wins: 1 },
        day: { count: 2, pnl: 0.03, wins: 1 },
      },
      bestTrade: { id: 'A', symbol: 'AAPL', style: 'scalp', pnl: 0.5, pnlPercent: 25, exitReason: 'MANUAL' },
      worstTrade: { id: 'B', symbol: 'MSFT', style: 'day', pnl: -0.3, pnlPercent: -15, exitReason: 'STOP_LOSS' },
    };

    const lines = formatPerformanceReport(empty(7), monthly).split('\n');
    expect(lines.slice(5)).toEqual([
      '<b>30-DAY SUMMARY:</b>',
      '• Total Trades: 3 (2W / 1L)',
      '• Win Rate: 66.7%',
      '• Total P&L: $0.53 (+26.5%)',
      '• Avg P&L per Trade: $0.18',
      '• Avg Confluence Score: 81.7/100',
      '',
      '<b>TRADE STYLE BREAKDOWN (30d):</b>',
      '• scalp: 1 trades, 100.0% win rate, $0.50 P&L',
      '• day: 2 trades, 50.0% win rate, $0.03 P&L',
      '',
      '🏆 <b>BEST TRADE (30d):</b> AAPL scalp +$0.50 (+25.0%)',
      '💥 <b>WORST TRADE (30d):</b> MSFT day -$0.30 (-15.0%)',
    ]);
  });
});

describe('TelegramNotifier', () => {
  beforeEach(() => {
    quietConsole();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const notifier = new TelegramNotifier({ token: 'test-token', chatId: '12345', timeoutMs: 1000 });

  it('posts an HTML message to the chat', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response('{"ok":true}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(notifier.notify('<b>hi</b>')).resolves.toBe(true);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '12345',
      text: '<b>hi</b>',
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
  });

  it('resolves false on an API error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('Bad Request', { status: 400 })));
    await expect(notifier.notify('x')).resolves.toBe(false);
  });

  it('resolves false on a network error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => { throw new TypeError('fetch failed'); }));
    await expect(notifier.notify('x')).resolves.toBe(false);
  });
});
