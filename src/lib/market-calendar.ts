/**
 * Exchange calendar — regular hours, holidays and early closes.
 *
 * Holiday tables live in config/market-calendar.json. Update that file each
 * year when the exchange publishes the next schedule.
 */

import { z } from 'zod';
import { addCalendarDays, exchangeDate, weekdayOf, zonedParts, zonedTime } from './exchange-time.js';

const hhmm = z.string().regex(/^\d{2}:\d{2}$/);
const calendarDay = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  name: z.string(),
});

export const marketCalendarSchema = z.object({
  timezone:     z.string().default('America/New_York'),
  regularOpen:  hhmm.default('09:30'),
  regularClose: hhmm.default('16:00'),
  earlyClose:   hhmm.default('13:00'),
  holidays:     z.array(calendarDay).default([]),
  earlyCloses:  z.array(calendarDay).default([]),
});

export type MarketCalendarDefinition = z.infer<typeof marketCalendarSchema>;

/** Collaborator contract consumed by the sweep and the monitor. */
export interface MarketHours {
  isMarketOpen(now: Date): boolean;
}

/** Per-date session lookup; null on weekends and holidays. */
export interface MarketSessions {
  sessionFor(date: string): Session | null;
}

export interface MarketStatus {
  isOpen: boolean;
  currentTime: string;     // exchange-local "YYYY-MM-DD HH:MM"
  timezone: string;
  nextOpen: string;        // ISO instant
  isWeekend: boolean;
  isHoliday: boolean;
  isEarlyClose: boolean;
  reason?: string;
}

export interface Session {
  date: string;
  open: Date;
  close: Date;
  early: boolean;
}

export class MarketCalendar implements MarketHours, MarketSessions {
  private readonly holidays: Map<string, string>;
  private readonly earlyCloses: Map<string, string>;

  constructor(private readonly def: MarketCalendarDefinition) {
    this.holidays    = new Map(def.holidays.map(h => [h.date, h.name]));
    this.earlyCloses = new Map(def.earlyCloses.map(h => [h.date, h.name]));
  }

  get timeZone(): string {
    return this.def.timezone;
  }

  /** Trading session for an exchange-local date, or null on weekends/holidays. */
  sessionFor(date: string): Session | null {
    const weekday = weekdayOf(date);
    if (weekday === 0 || weekday === 6) return null;
    if (this.holidays.has(date)) return null;

    const early = this.earlyCloses.has(date);
    return {
      date,
      open:  zonedTime(date, this.def.regularOpen, this.def.timezone),
      close: zonedTime(date, early ? this.def.earlyClose : this.def.regularClose, this.def.timezone),
      early,
    };
  }

  isMarketOpen(now: Date): boolean {
    const session = this.sessionFor(exchangeDate(now, this.def.timezone));
    if (!session) return false;
    return now.getTime() >= session.open.getTime() && now.getTime() < session.close.getTime();
  }

  nextMarketOpen(now: Date): Date {
    let date = exchangeDate(now, this.def.timezone);
    // Bounded scan — the longest exchange closure is a few days.
    for (let i = 0; i < 14; i++) {
      const session = this.sessionFor(date);
      if (session && session.open.getTime() > now.getTime()) return session.open;
      date = addCalendarDays(date, 1);
    }
    throw new Error(`No market session found within 14 days of ${now.toISOString()}`);
  }

  getMarketStatus(now: Date): MarketStatus {
    const tz    = this.def.timezone;
    const today = exchangeDate(now, tz);
    const parts = zonedParts(now, tz);
    const clock = `${String(parts.hour).padStart(2, '0')}:${String(parts.minute).padStart(2, '0')}`;

    const isWeekend    = parts.weekday === 0 || parts.weekday === 6;
    const isHoliday    = this.holidays.has(today);
    const isEarlyClose = this.earlyCloses.has(today);
    const isOpen       = this.isMarketOpen(now);

    const status: MarketStatus = {
      isOpen,
      currentTime: `${today} ${clock}`,
      timezone: tz,
      nextOpen: this.nextMarketOpen(now).toISOString(),
      isWeekend,
      isHoliday,
      isEarlyClose,
    };

    if (!isOpen) {
      if (isWeekend) status.reason = 'Weekend';
      else if (isHoliday) status.reason = `Holiday (${this.holidays.get(today)})`;
      else if (clock < this.def.regularOpen) status.reason = `Before market hours (opens at ${this.def.regularOpen})`;
      else if (isEarlyClose) status.reason = `Early close day (market closed at ${this.def.earlyClose})`;
      else status.reason = `After market hours (closed at ${this.def.regularClose})`;
    }

    return status;
  }
}
