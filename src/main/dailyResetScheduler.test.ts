import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../shared/errors';
import { DailyResetScheduler, nextOccurrence, previousOccurrence } from './dailyResetScheduler';

const at = (hour: number, minute = 0, second = 0, day = 10) => new Date(2026, 2, day, hour, minute, second);

describe('occurrence helpers', () => {
  it('finds the next reset strictly after a moment', () => {
    expect(nextOccurrence('09:00', at(8))).toEqual(at(9));
    expect(nextOccurrence('09:00', at(9))).toEqual(at(9, 0, 0, 11));
    expect(nextOccurrence('09:00', at(23))).toEqual(at(9, 0, 0, 11));
  });

  it('finds the latest reset at or before a moment', () => {
    expect(previousOccurrence('09:00', at(9))).toEqual(at(9));
    expect(previousOccurrence('09:00', at(8))).toEqual(at(9, 0, 0, 9));
  });
});

describe('DailyResetScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('fires at the configured wall-clock time', async () => {
    vi.setSystemTime(at(8, 59, 30));
    const onReset = vi.fn(async () => undefined);
    const scheduler = new DailyResetScheduler({ time: '09:00', onReset });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(29_000);
    expect(onReset).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(onReset).toHaveBeenCalledTimes(1);
    expect(scheduler.nextRun).toEqual(at(9, 0, 0, 11));
    scheduler.stop();
  });

  it('catches up once after the machine slept through the reset', async () => {
    vi.setSystemTime(at(8));
    const onReset = vi.fn(async () => undefined);
    const scheduler = new DailyResetScheduler({ time: '09:00', onReset });
    scheduler.start();

    vi.setSystemTime(at(11));
    await vi.advanceTimersByTimeAsync(60_000);
    expect(onReset).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(5 * 60_000);
    expect(onReset).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('runs a reset missed while the app was closed as soon as it starts', async () => {
    vi.setSystemTime(at(10));
    const onReset = vi.fn(async () => undefined);
    const scheduler = new DailyResetScheduler({
      time: '09:00',
      onReset,
      lastResetAt: () => at(9, 30, 0, 9).toISOString()
    });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(onReset).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('does not repeat a reset that already ran today', async () => {
    vi.setSystemTime(at(10));
    const onReset = vi.fn(async () => undefined);
    const scheduler = new DailyResetScheduler({
      time: '09:00',
      onReset,
      lastResetAt: () => at(9, 5).toISOString()
    });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(onReset).not.toHaveBeenCalled();
    expect(scheduler.nextRun).toEqual(at(9, 0, 0, 11));
    scheduler.stop();
  });

  it('re-plans when the reset time changes', async () => {
    vi.setSystemTime(at(8));
    const onReset = vi.fn(async () => undefined);
    const scheduler = new DailyResetScheduler({ time: '09:00', onReset });
    scheduler.start();

    scheduler.setTime('08:30');
    expect(scheduler.nextRun).toEqual(at(8, 30));
    await vi.advanceTimersByTimeAsync(30 * 60_000);
    expect(onReset).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(60 * 60_000);
    expect(onReset).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('retries a failed reset on the next check', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.setSystemTime(at(8, 59));
    const onReset = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('locked'))
      .mockResolvedValue(undefined);
    const scheduler = new DailyResetScheduler({ time: '09:00', onReset, checkIntervalMs: 10_000 });
    scheduler.start();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(onReset).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(10_000);
    expect(onReset).toHaveBeenCalledTimes(2);
    expect(scheduler.nextRun).toEqual(at(9, 0, 0, 11));
    scheduler.stop();
  });

  it('stays quiet after stop', async () => {
    vi.setSystemTime(at(8, 59));
    const onReset = vi.fn(async () => undefined);
    const scheduler = new DailyResetScheduler({ time: '09:00', onReset });
    scheduler.start();
    scheduler.stop();

    await vi.advanceTimersByTimeAsync(5 * 60_000);
    expect(onReset).not.toHaveBeenCalled();
    expect(scheduler.nextRun).toBeNull();
  });

  it('rejects a malformed time', () => {
    expect(() => new DailyResetScheduler({ time: '9am', onReset: async () => undefined })).toThrow(ValidationError);
  });
});
