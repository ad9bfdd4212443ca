/**
 * End-of-day performance report: trailing 7-day and 30-day summaries sent
 * to the chat. Runs from the scheduler's cron and on demand.
 */

import type { TradeLedger } from '../ledger/trade-ledger.js';
import { formatPerformanceReport } from '../telegram/notifier.js';
import type { Notifier } from '../telegram/notifier.js';

export function buildPerformanceReport(ledger: TradeLedger, now: Date): string {
  return formatPerformanceReport(ledger.summary(7, now), ledger.summary(30, now));
}

/** Send the report; resolves with whether the channel accepted it. */
export async function sendPerformanceReport(
  ledger: TradeLedger,
  notifier: Notifier,
  now: Date = new Date(),
): Promise<boolean> {
  const sent = await notifier.notify(buildPerformanceReport(ledger, now));
  if (sent) console.log('[Report] Performance report sent');
  else console.warn('[Report] Performance report could not be delivered');
  return sent;
}
