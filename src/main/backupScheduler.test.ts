import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../shared/errors';
import { BackupScheduler, nextBackupDue } from './backupScheduler';

const HOUR = 60 * 60_000;
const at = (day: number, hour = 12) => new Date(2026, 2, day, hour, 0, 0);

describe('nextBackupDue', () => {
  it('is due at once without a usable record and a week after the last one otherwise', () => {
    expect(nextBackupDue(null, 7, at(10))).toEqual(at(10));
    expect(nextBackupDue('not a date', 7, at(10))).toEqual(at(10));
    expect(nextBackupDue(at(8).toISOString(), 7, at(10))).toEqual(at(15));
    expect(nextBackupDue(at(1).toISOString(), 7, at(10))).toEqual(at(10));
  });
});

describe('BackupScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('backs up right away when no backup was ever taken, then weekly', async () => {
    vi.setSystemTime(at(10));
    let last: string | null = null;
    const onBackup = vi.fn(async () => {
      last = new Date().toISOString();
    });
    const scheduler = new BackupScheduler({ onBackup, lastBackupAt: () => last });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(onBackup).toHaveBeenCalledTimes(1);
    expect(scheduler.nextRun).toEqual(at(17));

    await vi.advanceTimersByTimeAsync(7 * 24 * HOUR - HOUR);
    expect(onBackup).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(HOUR);
    expect(onBackup).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it('waits out the rest of the week after a recent backup', async () => {
    vi.setSystemTime(at(10));
    const onBackup = vi.fn(async () => undefined);
    const scheduler = new BackupScheduler({ onBackup, lastBackupAt: () => at(8).toISOString() });
    scheduler.start();

    expect(scheduler.nextRun).toEqual(at(15));
    await vi.advanceTimersByTimeAsync(5 * 24 * HOUR - HOUR);
    expect(onBackup).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(HOUR);
    expect(onBackup).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('catches up on the first hourly check after the machine slept past the due time', async () => {
    vi.setSystemTime(at(10));
    const onBackup = vi.fn(async () => undefined);
    const scheduler = new BackupScheduler({ onBackup, lastBackupAt: () => at(8).toISOString() });
    scheduler.start();

    vi.setSystemTime(at(20));
    await vi.advanceTimersByTimeAsync(HOUR);
    expect(onBackup).toHaveBeenCalledTimes(1);
    expect(scheduler.nextRun).toEqual(at(27, 13));
    scheduler.stop();
  });

  it('retries a failed backup an hour later', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.setSystemTime(at(10));
    const onBackup = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValue(undefined);
    const scheduler = new BackupScheduler({ onBackup, lastBackupAt: () => null });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(onBackup).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(HOUR - 1);
    expect(onBackup).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(onBackup).toHaveBeenCalledTimes(2);
    scheduler.stop();
    expect(scheduler.nextRun).toBeNull();
  });

  it('rejects an interval that is not a whole number of days', () => {
    const options = { onBackup: async () => undefined, lastBackupAt: () => null };
    expect(() => new BackupScheduler({ ...options, intervalDays: 0 })).toThrow(ValidationError);
    expect(() => new BackupScheduler({ ...options, intervalDays: 1.5 })).toThrow(ValidationError);
  });
});
