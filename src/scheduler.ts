import cron from 'node-cron';
import { errorMessage } from './lib/errors.js';
import type { MarketHours } from './lib/market-calendar.js';
import type { SetupSweep } from './pipeline/setup-sweep.js';

export interface SchedulerOptions {
  sweep: SetupSweep;
  marketHours: MarketHours;
  sweepIntervalMs: number;
  sweepEnabled: boolean;
  reportCron: string;
  timeZone: string;
  sendDailyReport: () => Promise<unknown>;
  clock?: () => Date;
}

export interface SchedulerHandle {
  stop(): void;
}

/**
 * Milliseconds until the next epoch-aligned boundary of `intervalMs`
 * (a 5-minute interval fires at :00 :05 :10 … of each hour).
 * Adds one full interval when we are <100 ms away to avoid double-firing.
 */
export function msUntilNextBoundary(intervalMs: number, now = Date.now()): number {
  const next  = Math.ceil(now / intervalMs) * intervalMs;
  const delay = next - now;
  return delay < 100 ? delay + intervalMs : delay;
}

/**
 * Start the scheduler.
 *
 * Sweeps: self-correcting setTimeout chain aligned to the sweep interval,
 *   only while the market is open. The next tick is armed before the current
 *   one runs so a slow sweep never delays future ticks; overlapping ticks are
 *   skipped by the sweep itself.
 *
 * Daily report: node-cron in the exchange timezone.
 */
export function startScheduler(opts: SchedulerOptions): SchedulerHandle {
  const clock = opts.clock ?? (() => new Date());
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const scheduleSweepTick = (): void => {
    if (stopped) return;
    timer = setTimeout(() => {
      scheduleSweepTick();            // arm next tick FIRST
      if (!opts.marketHours.isMarketOpen(clock())) return;
      void opts.sweep.run().catch(err => console.error('[Scheduler] Sweep failed:', errorMessage(err)));
    }, msUntilNextBoundary(opts.sweepIntervalMs, clock().getTime()));
  };

  if (opts.sweepEnabled) {
    scheduleSweepTick();
    console.log(`[Scheduler] Sweep interval: every ${opts.sweepIntervalMs / 60_000} min during market hours`);
  } else {
    console.log('[Scheduler] Sweep disabled');
  }

  // Daily report — once a day, cron precision is fine here
  const reportTask = cron.schedule(opts.reportCron, () => {
    console.log('[Scheduler] Daily report triggered');
    opts.sendDailyReport().catch(err => console.error('[Scheduler] Daily report failed:', errorMessage(err)));
  }, { timezone: opts.timeZone });
  console.log(`[Scheduler] Report cron: "${opts.reportCron}" (${opts.timeZone})`);

  return {
    stop(): void {
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
      reportTask.stop();
    },
  };
}
