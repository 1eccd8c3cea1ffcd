import { afterEach, describe, expect, it, vi } from 'vitest';
import { createGate } from '../test/helpers';
import { AutoSaveWorker, type Flushable } from './autoSaveWorker';

class FakeDocument implements Flushable {
  isDirty = false;
  writes = 0;
  failNext: Error | null = null;
  gate: Promise<void> | null = null;

  constructor(readonly documentName: string) {}

  async flush(): Promise<boolean> {
    if (this.gate) {
      await this.gate;
    }
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
    if (!this.isDirty) {
      return false;
    }
    this.writes += 1;
    this.isDirty = false;
    return true;
  }
}

describe('AutoSaveWorker', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('does nothing when every document is clean', async () => {
    const tasks = new FakeDocument('tasks');
    const worker = new AutoSaveWorker([tasks], 30);

    await expect(worker.tick()).resolves.toBe('clean');
    expect(tasks.writes).toBe(0);
  });

  it('writes only the dirty documents', async () => {
    const tasks = new FakeDocument('tasks');
    const settings = new FakeDocument('settings');
    tasks.isDirty = true;
    const worker = new AutoSaveWorker([tasks, settings], 30);

    await expect(worker.tick()).resolves.toBe('flushed');
    expect([tasks.writes, settings.writes]).toEqual([1, 0]);
  });

  it('skips a tick while the previous flush is still running', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const tasks = new FakeDocument('tasks');
    const gate = createGate();
    tasks.isDirty = true;
    tasks.gate = gate.promise;
    const worker = new AutoSaveWorker([tasks], 30);

    const first = worker.tick();
    await expect(worker.tick()).resolves.toBe('skipped');
    gate.open();
    await expect(first).resolves.toBe('flushed');
    expect(tasks.writes).toBe(1);
  });

  it('logs a failed write and keeps the document dirty for the next tick', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const tasks = new FakeDocument('tasks');
    tasks.isDirty = true;
    tasks.failNext = new Error('disk full');
    const worker = new AutoSaveWorker([tasks], 30);

    await expect(worker.tick()).resolves.toBe('failed');
    expect(logged).toHaveBeenCalledTimes(1);
    expect(tasks.isDirty).toBe(true);
    await expect(worker.tick()).resolves.toBe('flushed');
  });

  it('surfaces failures from an explicit flush', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const tasks = new FakeDocument('tasks');
    tasks.failNext = new Error('disk full');
    const worker = new AutoSaveWorker([tasks], 30);

    await expect(worker.flushNow()).rejects.toThrow('disk full');
  });

  it('waits for a running tick before an explicit flush', async () => {
    const tasks = new FakeDocument('tasks');
    const gate = createGate();
    tasks.isDirty = true;
    tasks.gate = gate.promise;
    const worker = new AutoSaveWorker([tasks], 30);

    const tick = worker.tick();
    const flush = worker.flushNow();
    tasks.gate = null;
    gate.open();
    await Promise.all([tick, flush]);
    expect(tasks.writes).toBe(1);
  });

  it('runs on its interval and picks up a new interval', async () => {
    vi.useFakeTimers();
    const tasks = new FakeDocument('tasks');
    const worker = new AutoSaveWorker([tasks], 5);
    worker.start();

    tasks.isDirty = true;
    await vi.advanceTimersByTimeAsync(5_000);
    expect(tasks.writes).toBe(1);

    worker.setInterval(10);
    expect(worker.interval).toBe(10_000);
    tasks.isDirty = true;
    await vi.advanceTimersByTimeAsync(5_000);
    expect(tasks.writes).toBe(1);
    await vi.advanceTimersByTimeAsync(5_000);
    expect(tasks.writes).toBe(2);

    worker.stop();
    tasks.isDirty = true;
    await vi.advanceTimersByTimeAsync(20_000);
    expect(tasks.writes).toBe(2);
    expect(worker.isRunning).toBe(false);
  });
});
