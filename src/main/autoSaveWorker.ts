export interface Flushable {
  readonly documentName: string;
  readonly isDirty: boolean;
  flush(): Promise<boolean>;
}

export type TickResult = 'flushed' | 'clean' | 'skipped' | 'failed';

export const DEFAULT_AUTOSAVE_SECONDS = 30;

/**
 * Periodically writes dirty documents. Never runs two flushes at once: a tick
 * that finds the previous flush still running is skipped.
 */
export class AutoSaveWorker {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<unknown> | null = null;
  private intervalMs: number;

  constructor(private readonly documents: Flushable[], intervalSeconds = DEFAULT_AUTOSAVE_SECONDS) {
    this.intervalMs = intervalSeconds * 1000;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get interval(): number {
    return this.intervalMs;
  }

  start() {
    this.stop();
    this.timer = setInterval(() => {
      this.tick().catch((error) => {
        console.error('Failed to run autosave tick', error);
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  setInterval(seconds: number) {
    this.intervalMs = seconds * 1000;
    if (this.isRunning) {
      this.start();
    }
  }

  async tick(): Promise<TickResult> {
    if (this.inFlight) {
      console.warn('Autosave skipped: previous flush still running');
      return 'skipped';
    }
    const dirty = this.documents.filter((document) => document.isDirty);
    if (dirty.length === 0) {
      return 'clean';
    }
    const run = this.flushEach(dirty, false);
    this.inFlight = run;
    try {
      const { flushed, failed } = await run;
      if (failed > 0) {
        return 'failed';
      }
      return flushed > 0 ? 'flushed' : 'clean';
    } finally {
      this.inFlight = null;
    }
  }

  /** Waits for a running flush, then writes everything dirty. Failures reject. */
  async flushNow(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
    const run = this.flushEach(this.documents, true);
    this.inFlight = run;
    try {
      await run;
    } finally {
      this.inFlight = null;
    }
  }

  private async flushEach(documents: Flushable[], rethrow: boolean): Promise<{ flushed: number; failed: number }> {
    let flushed = 0;
    let failed = 0;
    let firstError: unknown = null;
    for (const document of documents) {
      try {
        if (await document.flush()) {
          flushed += 1;
        }
      } catch (error) {
        console.error(`Failed to autosave "${document.documentName}"; will retry`, error);
        failed += 1;
        firstError ??= error;
      }
    }
    if (rethrow && failed > 0) {
      throw firstError;
    }
    return { flushed, failed };
  }
}
