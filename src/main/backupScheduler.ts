import { DateTime } from 'luxon';
import { ValidationError } from '../shared/errors';
import { WallClockScheduler, type WallClockSchedulerOptions } from './wallClockScheduler';

export const DEFAULT_BACKUP_INTERVAL_DAYS = 7;
export const BACKUP_CHECK_INTERVAL_MS = 60 * 60_000;

export interface BackupSchedulerOptions extends WallClockSchedulerOptions {
  onBackup: () => Promise<void>;
  /** ISO timestamp of the last automatic backup, if one was ever taken. */
  lastBackupAt: () => string | null;
  intervalDays?: number;
}

/** `now` when no usable backup time is recorded or the interval has passed. */
export const nextBackupDue = (lastBackupAt: string | null, intervalDays: number, now: Date): Date => {
  if (lastBackupAt === null) {
    return now;
  }
  const last = DateTime.fromISO(lastBackupAt);
  if (!last.isValid) {
    return now;
  }
  const due = last.plus({ days: intervalDays }).toJSDate();
  return due.getTime() <= now.getTime() ? now : due;
};

/**
 * Takes an automatic backup every `intervalDays`. The due time follows the
 * recorded last backup, so a backup missed while the app was closed runs on
 * the first start after it fell due.
 */
export class BackupScheduler extends WallClockScheduler {
  readonly intervalDays: number;

  constructor(private readonly options: BackupSchedulerOptions) {
    super('automatic backup', options, BACKUP_CHECK_INTERVAL_MS);
    const days = options.intervalDays ?? DEFAULT_BACKUP_INTERVAL_DAYS;
    if (!Number.isInteger(days) || days < 1) {
      throw new ValidationError('backupIntervalDays', 'backupIntervalDays must be a whole number of days');
    }
    this.intervalDays = days;
  }

  protected firstRun(now: Date): Date {
    return nextBackupDue(this.options.lastBackupAt(), this.intervalDays, now);
  }

  protected followingRun(now: Date): Date {
    return DateTime.fromJSDate(now).plus({ days: this.intervalDays }).toJSDate();
  }

  protected run(): Promise<void> {
    return this.options.onBackup();
  }
}
