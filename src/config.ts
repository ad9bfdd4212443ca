import { z } from 'zod';
import 'dotenv/config';

const bool = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const configSchema = z.object({
  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_CHAT_ID: z.string().min(1),
  TELEGRAM_BOT_ENABLED: bool.default('true'),

  // Alpaca market data
  ALPACA_API_KEY: z.string().min(1),
  ALPACA_SECRET_KEY: z.string().min(1),
  ALPACA_DATA_URL: z.string().url().default('https://data.alpaca.markets'),
  ALPACA_DATA_FEED: z.enum(['iex', 'sip']).default('iex'),

  // App
  PORT: z.coerce.number().int().positive().default(8080),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TRADE_LOG_PATH: z.string().min(1).default('data/trading_performance.json'),
  SYMBOLS_FILE: z.string().min(1).default('symbols.json'),
  EXCHANGE_TIMEZONE: z.string().min(1).default('America/New_York'),

  // Sweep
  SWEEP_ENABLED: bool.default('true'),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  SWEEP_BATCH_SIZE: z.coerce.number().int().positive().default(5),
  SWEEP_BATCH_PAUSE_MS: z.coerce.number().int().nonnegative().default(500),

  // Monitoring
  MONITOR_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  STATUS_UPDATE_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),

  // Collaborator timeouts
  DATA_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Pricing heuristics (with sane defaults)
  ENTRY_PREMIUM_PCT: z.coerce.number().positive().max(1).default(0.03),  // premium ≈ 3% of underlying
  STOP_LOSS_FRACTION: z.coerce.number().positive().lt(1).default(0.5),   // stop at 50% of fill

  // Daily performance report (exchange timezone)
  DAILY_REPORT_CRON: z.string().min(1).default('5 16 * * 1-5'),
});

type Config = z.infer<typeof configSchema>;

function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${missing}`);
  }
  return result.data;
}

export { loadConfig, configSchema };
export type { Config };
