/**
 * Service graph shared by the scheduler, the dashboard and the Telegram bot.
 */

import { AlpacaDataClient } from './lib/alpaca-api.js';
import { errorMessage } from './lib/errors.js';
import { KeyedMutex } from './lib/keyed-mutex.js';
import { MarketCalendar } from './lib/market-calendar.js';
import { JsonFileTradeLogStore } from './db/trade-log.js';
import { TradeLedger } from './ledger/trade-ledger.js';
import { LiveTradeAgent } from './agents/live-trade-agent.js';
import { TradeMonitor } from './agents/trade-monitor.js';
import { ProxyPricingModel } from './pipeline/pricing.js';
import { SetupSweep } from './pipeline/setup-sweep.js';
import { AlpacaSnapshotProvider } from './pipeline/snapshot-builder.js';
import { TelegramNotifier } from './telegram/notifier.js';
import type { Notifier } from './telegram/notifier.js';
import { loadMarketCalendar, loadSymbols } from './utils/config-loader.js';
import type { Config } from './config.js';

export interface AppServices {
  ledger: TradeLedger;
  agent: LiveTradeAgent;
  monitor: TradeMonitor;
  sweep: SetupSweep;
  notifier: Notifier;
  calendar: MarketCalendar;
  clock: () => Date;
}

export async function createServices(config: Config): Promise<AppServices> {
  const clock = (): Date => new Date();
  const timeZone = config.EXCHANGE_TIMEZONE;

  const calendar = new MarketCalendar({ ...loadMarketCalendar(), timezone: timeZone });
  const symbols = loadSymbols(config.SYMBOLS_FILE);

  const ledger = await TradeLedger.open(new JsonFileTradeLogStore(config.TRADE_LOG_PATH), {
    timeZone,
    risk: { stopLossFraction: config.STOP_LOSS_FRACTION },
  });

  const notifier = new TelegramNotifier({
    token: config.TELEGRAM_BOT_TOKEN,
    chatId: config.TELEGRAM_CHAT_ID,
    timeoutMs: config.NOTIFY_TIMEOUT_MS,
  });

  const marketData = new AlpacaSnapshotProvider(
    new AlpacaDataClient({
      apiKey: config.ALPACA_API_KEY,
      secretKey: config.ALPACA_SECRET_KEY,
      dataUrl: config.ALPACA_DATA_URL,
      feed: config.ALPACA_DATA_FEED,
      timeoutMs: config.DATA_TIMEOUT_MS,
    }),
    timeZone,
    config.DATA_TIMEOUT_MS,
    clock,
  );
  const pricing = new ProxyPricingModel(config.ENTRY_PREMIUM_PCT);

  const agent = new LiveTradeAgent({
    ledger,
    notifier,
    timeZone,
    sessions: calendar,
    mutex: new KeyedMutex(),
    statusIntervalMs: config.STATUS_UPDATE_INTERVAL_MS,
    clock,
  });

  const monitor = new TradeMonitor({
    ledger,
    agent,
    marketData,
    pricing,
    marketHours: calendar,
    intervalMs: config.MONITOR_INTERVAL_MS,
    clock,
  });

  const sweep = new SetupSweep({
    ledger,
    notifier,
    marketData,
    pricing,
    marketHours: calendar,
    symbols,
    batchSize: config.SWEEP_BATCH_SIZE,
    batchPauseMs: config.SWEEP_BATCH_PAUSE_MS,
    clock,
  });

  return { ledger, agent, monitor, sweep, notifier, calendar, clock };
}

export type SweepTrigger =
  | { status: 'started' }
  | { status: 'skipped'; reason: string }
  | { status: 'already-running' };

/** Start a sweep in the background unless one is running or the market is closed. */
export function triggerSweep(services: AppServices, force: boolean): SweepTrigger {
  const { sweep, calendar, clock } = services;
  if (sweep.isRunning) return { status: 'already-running' };

  if (!force) {
    const market = calendar.getMarketStatus(clock());
    if (!market.isOpen) return { status: 'skipped', reason: market.reason ?? 'Market closed' };
  }

  void sweep.run({ force }).catch(err => console.error('[Sweep] Background run failed:', errorMessage(err)));
  return { status: 'started' };
}
