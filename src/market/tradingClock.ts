import dayjs, { type Dayjs } from 'dayjs';
import timezone from 'dayjs/plugin/timezone.js';
import utc from 'dayjs/plugin/utc.js';
import type { TradingConfig } from '../config/tradingConfig.js';
import { ClockMisconfiguration } from '../core/errors.js';
import { INTERVALS } from './constants.market.js';

dayjs.extend(utc);
dayjs.extend(timezone);

export type ClockConfig = Pick<
  TradingConfig,
  'tradingStart' | 'tradingEnd' | 'timezone' | 'bufferMinutes' | 'pollIntervalMinutes' | 'holidays'
>;

export interface TradingWindow {
  opensAt: number;
  closesAt: number;
}

const HH_MM = /^(\d{2}):(\d{2})$/;
// Longest run of closed days we ever expect (long weekend + holiday cluster)
const MAX_LOOKAHEAD_DAYS = 14;

function parseMinutes(value: string, label: string): number {
  const match = HH_MM.exec(value);
  const hours = Number(match?.[1]);
  const minutes = Number(match?.[2]);
  if (!match || hours > 23 || minutes > 59) {
    throw new ClockMisconfiguration(`${label} "${value}" is not a HH:mm time`);
  }
  return hours * 60 + minutes;
}

function assertTimezone(tz: string): void {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
  } catch {
    throw new ClockMisconfiguration(`Unknown timezone "${tz}"`);
  }
}

/**
 * Trading-hours arithmetic in the exchange timezone. Time is always passed in;
 * the clock never reads the system time itself.
 */
export class TradingClock {
  private readonly tz: string;
  private readonly openMinute: number;
  private readonly closeMinute: number;
  private readonly pollMs: number;
  private readonly holidays: ReadonlySet<string>;

  constructor(config: ClockConfig) {
    assertTimezone(config.timezone);

    const start = parseMinutes(config.tradingStart, 'trading start');
    const end = parseMinutes(config.tradingEnd, 'trading end');
    if (start >= end) {
      throw new ClockMisconfiguration(
        `Trading start ${config.tradingStart} must be before end ${config.tradingEnd}`
      );
    }
    if (!Number.isInteger(config.bufferMinutes) || config.bufferMinutes < 0) {
      throw new ClockMisconfiguration(`Buffer ${config.bufferMinutes} must be a non-negative integer`);
    }
    if (start + config.bufferMinutes >= end - config.bufferMinutes) {
      throw new ClockMisconfiguration(
        `Buffer of ${config.bufferMinutes}m leaves no window between ${config.tradingStart} and ${config.tradingEnd}`
      );
    }
    if (!(config.pollIntervalMinutes > 0)) {
      throw new ClockMisconfiguration(`Poll interval ${config.pollIntervalMinutes} must be positive`);
    }

    this.tz = config.timezone;
    this.openMinute = start + config.bufferMinutes;
    this.closeMinute = end - config.bufferMinutes;
    this.pollMs = config.pollIntervalMinutes * INTERVALS.ONE_MIN;
    this.holidays = new Set(config.holidays);
  }

  get pollIntervalMs(): number {
    return this.pollMs;
  }

  isTradingDay(now: number): boolean {
    return this.isTradingDate(this.local(now));
  }

  isTradingWindow(now: number): boolean {
    const local = this.local(now);
    if (!this.isTradingDate(local)) return false;
    const { opensAt, closesAt } = this.windowFor(local);
    return now >= opensAt && now <= closesAt;
  }

  /** Window (buffers applied) for the local date containing `now`, or undefined on a closed day. */
  windowOn(now: number): TradingWindow | undefined {
    const local = this.local(now);
    return this.isTradingDate(local) ? this.windowFor(local) : undefined;
  }

  nextWakeTime(now: number): number {
    if (this.isTradingWindow(now)) {
      return now + this.pollMs;
    }

    const today = this.local(now);
    if (this.isTradingDate(today)) {
      const { opensAt } = this.windowFor(today);
      if (now < opensAt) return opensAt;
    }

    let day = today;
    for (let i = 0; i < MAX_LOOKAHEAD_DAYS; i++) {
      day = day.add(1, 'day');
      if (this.isTradingDate(day)) {
        return this.windowFor(day).opensAt;
      }
    }
    throw new ClockMisconfiguration(`No trading day within ${MAX_LOOKAHEAD_DAYS} days of ${today.format()}`);
  }

  private local(now: number): Dayjs {
    return dayjs(now).tz(this.tz);
  }

  private isTradingDate(local: Dayjs): boolean {
    const weekday = local.day();
    if (weekday === 0 || weekday === 6) return false;
    return !this.holidays.has(local.format('YYYY-MM-DD'));
  }

  private windowFor(local: Dayjs): TradingWindow {
    const date = local.format('YYYY-MM-DD');
    const midnight = dayjs.tz(`${date} 00:00`, this.tz);
    return {
      opensAt: midnight.add(this.openMinute, 'minute').valueOf(),
      closesAt: midnight.add(this.closeMinute, 'minute').valueOf(),
    };
  }
}
