export const DEFAULT_CHECK_INTERVAL_MS = 60_000;

export interface WallClockSchedulerOptions {
  now?: () => Date;
  /** Longest single wait between two looks at the wall clock. */
  checkIntervalMs?: number;
}

/**
 * Runs a job at wall-clock moments. The wait is split into checks of at most
 * `checkIntervalMs` against the wall clock, so a machine that slept through a
 * due moment runs the job on its first check after waking instead of skipping
 * it. A failed run is retried one check interval later.
 */
export abstract class WallClockScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextRunAt: Date | null = null;
  protected readonly now: () => Date;
  protected readonly checkIntervalMs: number;

  constructor(private readonly label: string, options: WallClockSchedulerOptions, defaultCheckIntervalMs: number) {
    this.now = options.now ?? (() => new Date());
    this.checkIntervalMs = options.checkIntervalMs ?? defaultCheckIntervalMs;
  }

  get nextRun(): Date | null {
    return this.nextRunAt;
  }

  start() {
    this.cancel();
    this.nextRunAt = this.firstRun(this.now());
    this.arm();
  }

  stop() {
    this.cancel();
    this.nextRunAt = null;
  }

  /** First due moment after `start`; `now` or earlier runs at once. */
  protected abstract firstRun(now: Date): Date;

  /** Due moment after a completed run, or after `replan`. */
  protected abstract followingRun(now: Date): Date;

  protected abstract run(): Promise<void>;

  /** Drops the pending wait and plans again; a stopped scheduler stays stopped. */
  protected replan() {
    if (this.nextRunAt !== null) {
      this.cancel();
      this.nextRunAt = this.followingRun(this.now());
      this.arm();
    }
  }

  private cancel() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private arm() {
    if (this.nextRunAt === null) {
      return;
    }
    const untilDue = this.nextRunAt.getTime() - this.now().getTime();
    this.wait(Math.max(0, Math.min(untilDue, this.checkIntervalMs)));
  }

  private wait(delay: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.check().catch((error) => {
        console.error(`Failed to run ${this.label} check`, error);
      });
    }, delay);
    this.timer.unref();
  }

  private async check() {
    const due = this.nextRunAt;
    if (due === null) {
      return;
    }
    if (this.now().getTime() >= due.getTime()) {
      try {
        await this.run();
        console.info(`Ran ${this.label} (scheduled ${due.toISOString()})`);
        // stop() or replan() during the run already re-planned.
        if (this.nextRunAt !== due) {
          return;
        }
        this.nextRunAt = this.followingRun(this.now());
      } catch (error) {
        console.error(`Failed to run ${this.label}; retrying in ${this.checkIntervalMs} ms`, error);
        if (this.timer === null && this.nextRunAt === due) {
          this.wait(this.checkIntervalMs);
        }
        return;
      }
    }
    if (this.timer === null) {
      this.arm();
    }
  }
}
