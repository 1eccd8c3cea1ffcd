import { DateTime } from 'luxon';
import { ValidationError } from '../shared/errors';
import { parseHourMinute } from '../shared/stateHelpers';
import { DEFAULT_CHECK_INTERVAL_MS, WallClockScheduler, type WallClockSchedulerOptions } from './wallClockScheduler';

export interface DailyResetOptions extends WallClockSchedulerOptions {
  /** Local wall-clock `HH:MM`. */
  time: string;
  onReset: () => Promise<void>;
  /** ISO timestamp of the last completed reset, if any. */
  lastResetAt?: () => string | null;
}

const requireTime = (time: string) => {
  const parsed = parseHourMinute(time);
  if (!parsed) {
    throw new ValidationError('dailyResetTime', 'dailyResetTime must be an HH:MM time');
  }
  return parsed;
};

const atTime = (day: DateTime, time: string): DateTime => {
  const { hour, minute } = requireTime(time);
  return day.set({ hour, minute, second: 0, millisecond: 0 });
};

/** Today's `time` if it is still ahead of `from`, otherwise tomorrow's. */
export const nextOccurrence = (time: string, from: Date): Date => {
  const now = DateTime.fromJSDate(from);
  const candidate = atTime(now, time);
  return (candidate > now ? candidate : atTime(now.plus({ days: 1 }), time)).toJSDate();
};

/** The latest occurrence of `time` at or before `from`. */
export const previousOccurrence = (time: string, from: Date): Date => {
  const now = DateTime.fromJSDate(from);
  const candidate = atTime(now, time);
  return (candidate <= now ? candidate : atTime(now.minus({ days: 1 }), time)).toJSDate();
};

/**
 * Fires `onReset` once a day at a local wall-clock time. A reset missed
 * while the app was closed runs as soon as it starts.
 */
export class DailyResetScheduler extends WallClockScheduler {
  private time: string;

  constructor(private readonly options: DailyResetOptions) {
    super('daily reset', options, DEFAULT_CHECK_INTERVAL_MS);
    requireTime(options.time);
    this.time = options.time;
  }

  get resetTime(): string {
    return this.time;
  }

  /** Drops the pending wait and recomputes it for the new time. */
  setTime(time: string) {
    requireTime(time);
    this.time = time;
    this.replan();
  }

  protected firstRun(now: Date): Date {
    return this.missedReset(now) ? now : nextOccurrence(this.time, now);
  }

  protected followingRun(now: Date): Date {
    return nextOccurrence(this.time, now);
  }

  protected run(): Promise<void> {
    return this.options.onReset();
  }

  private missedReset(now: Date): boolean {
    const last = this.options.lastResetAt?.() ?? null;
    if (last === null) {
      return false;
    }
    const lastReset = DateTime.fromISO(last);
    return !lastReset.isValid || lastReset.toJSDate() < previousOccurrence(this.time, now);
  }
}
