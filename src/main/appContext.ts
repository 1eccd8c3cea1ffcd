import type { VaultApi } from '../shared/ipc';
import { DEFAULT_SETTINGS } from '../shared/stateHelpers';
import type { BackupInfo, ImportResult, SessionInfo, Settings, Task, TaskQuery } from '../shared/types';
import { parseBackupType } from '../shared/validation';
import { AtomicFile } from './atomicFile';
import { AutoSaveWorker } from './autoSaveWorker';
import { BackupManager } from './backupManager';
import { BackupScheduler } from './backupScheduler';
import { DailyResetScheduler } from './dailyResetScheduler';
import { EncryptedStore } from './encryptedStore';
import { KeyManager } from './keyManager';
import { LockManager, Mutex } from './locks';
import { PathResolver, defaultCandidates, type ResolvedStorage, type StorageCandidate } from './pathResolver';
import { SettingsRepository } from './settingsRepository';
import { TaskRepository } from './taskRepository';

export interface AppContextOptions {
  /** Overrides the default storage candidates. */
  candidates?: StorageCandidate[];
  installDir?: string;
  dataDir?: string | null;
  iterations?: number;
  backupKeep?: number;
  lockTimeoutMs?: number;
  appVersion?: string;
  resetCheckIntervalMs?: number;
  /** Days between automatic backups while unlocked; unset or 0 turns them off. */
  backupIntervalDays?: number;
  backupCheckIntervalMs?: number;
  now?: () => Date;
}

/**
 * Owns every component for one storage root, plus the timers that run while
 * a session is unlocked. Nothing here is global; tests open as many contexts
 * as they need.
 */
export class AppContext implements VaultApi {
  readonly keys: KeyManager;
  readonly store: EncryptedStore;
  readonly tasks: TaskRepository;
  readonly settings: SettingsRepository;
  readonly backups: BackupManager;
  readonly autosave: AutoSaveWorker;
  private scheduler: DailyResetScheduler | null = null;
  private backupScheduler: BackupScheduler | null = null;
  private unsubscribeSettings: (() => void) | null = null;
  private readonly now: () => Date;
  private readonly session = new Mutex('session');

  private constructor(readonly storage: ResolvedStorage, private readonly options: AppContextOptions) {
    this.now = options.now ?? (() => new Date());
    const files = new AtomicFile();
    this.keys = new KeyManager(storage.root, { iterations: options.iterations, files, now: this.now });
    this.store = new EncryptedStore(storage.root, this.keys, {
      files,
      locks: new LockManager(options.lockTimeoutMs)
    });
    this.tasks = new TaskRepository(this.store, this.now);
    this.settings = new SettingsRepository(this.store, this.now);
    this.autosave = new AutoSaveWorker(this.documents);
    this.backups = new BackupManager(this.store, this.keys, {
      keep: options.backupKeep,
      appVersion: options.appVersion,
      now: this.now,
      flushAll: async () => {
        for (const document of this.documents) {
          await document.flush();
        }
      },
      reloadAll: async () => {
        for (const document of this.documents) {
          await document.reload();
        }
      }
    });
  }

  /** Resolves a writable storage root and finishes any interrupted write. */
  static async open(options: AppContextOptions = {}): Promise<AppContext> {
    const candidates =
      options.candidates ?? defaultCandidates(options.installDir ?? process.cwd(), options.dataDir ?? null);
    const storage = await new PathResolver(candidates).resolve();
    console.info(`Storage root: ${storage.root} (${storage.label})`);
    const context = new AppContext(storage, options);
    await context.store.recover();
    await context.backups.removeStaleStaging();
    return context;
  }

  private get documents(): Array<TaskRepository | SettingsRepository> {
    return [this.tasks, this.settings];
  }

  /** Due time of the next automatic backup, or null while none is planned. */
  get nextAutomaticBackup(): Date | null {
    return this.backupScheduler?.nextRun ?? null;
  }

  async isInitialized(): Promise<boolean> {
    return this.keys.hasEnvelope();
  }

  isUnlocked(): boolean {
    return this.keys.currentSession !== null;
  }

  async initialize(password: string): Promise<SessionInfo> {
    return this.serialize(async () => {
      await this.keys.initialize(password);
      return this.startSession();
    });
  }

  /** The password is checked before an open session is closed. */
  async login(password: string): Promise<SessionInfo> {
    return this.serialize(async () => {
      const session = await this.keys.authenticate(password);
      if (this.isUnlocked()) {
        await this.endSession();
      }
      this.keys.adopt(session);
      return this.startSession();
    });
  }

  /**
   * Re-encrypts everything under a key derived from `newPassword`. Until the
   * envelope is rewritten the old password stays valid; documents whose new
   * copy could not be moved into place are rewritten by the next autosave.
   */
  async changePassword(oldPassword: string, newPassword: string): Promise<void> {
    await this.serialize(async () => {
      this.keys.requireSession();
      const prepared = await this.keys.prepareRotation(oldPassword, newPassword);
      const { pending } = await this.store.rotateKey(prepared);
      for (const document of this.documents) {
        if (pending.includes(document.documentName)) {
          document.markDirty();
        }
      }
      console.info('Password changed');
    });
  }

  /** Writes pending changes, stops the session timers and forgets the key. */
  async logout(): Promise<void> {
    await this.serialize(async () => {
      if (this.isUnlocked()) {
        await this.endSession();
      }
    });
  }

  /** Best-effort final write before the process exits. */
  async shutdown(): Promise<void> {
    if (this.isUnlocked()) {
      try {
        await this.autosave.flushNow();
      } catch (error) {
        console.error('Failed to write pending changes during shutdown', error);
      }
    }
    this.stopWorkers();
    this.keys.lock();
  }

  listTasks(query?: TaskQuery): Task[] {
    this.keys.requireSession();
    return this.tasks.list(query);
  }

  getTask(id: string): Task {
    this.keys.requireSession();
    return this.tasks.get(id);
  }

  plannerFor(date: string): Task[] {
    this.keys.requireSession();
    return this.tasks.planner(date);
  }

  async createTask(input: unknown): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.create(input);
  }

  async importTasks(content: unknown, format: unknown): Promise<ImportResult> {
    this.keys.requireSession();
    return this.tasks.importTasks(content, format);
  }

  async updateTask(id: string, patch: unknown): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.update(id, patch);
  }

  async deleteTask(id: string): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.delete(id);
  }

  async strikeTask(id: string, mode: unknown, report: unknown): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.strike(id, mode, report);
  }

  async undoStrike(id: string): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.undoStrike(id);
  }

  async completeTask(id: string): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.complete(id);
  }

  async uncompleteTask(id: string): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.uncomplete(id);
  }

  async scheduleTask(id: string, hour: unknown, date?: unknown, duration?: unknown): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.schedule(id, hour, date, duration);
  }

  async unscheduleTask(id: string): Promise<Task> {
    this.keys.requireSession();
    return this.tasks.unschedule(id);
  }

  getSettings(): Settings {
    this.keys.requireSession();
    return this.settings.get();
  }

  async updateSettings(patch: unknown): Promise<Settings> {
    this.keys.requireSession();
    return this.settings.update(patch);
  }

  async listBackups(): Promise<BackupInfo[]> {
    this.keys.requireSession();
    return this.backups.list();
  }

  async createBackup(type?: unknown): Promise<string> {
    this.keys.requireSession();
    return this.backups.create(parseBackupType(type));
  }

  async restoreBackup(name: string): Promise<void> {
    this.keys.requireSession();
    await this.backups.restore(name);
    // Timers are re-armed here, outside the root lock's async context.
    this.applySettings();
  }

  /** Session changes run one at a time and see each other's envelope writes. */
  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    return this.session.runExclusive(fn, this.store.locks.timeoutMs);
  }

  private async endSession(): Promise<void> {
    await this.autosave.flushNow();
    this.stopWorkers();
    for (const document of this.documents) {
      document.reset();
    }
    this.keys.lock();
  }

  private async startSession(): Promise<SessionInfo> {
    const session = this.keys.requireSession();
    try {
      for (const document of this.documents) {
        await document.reload();
      }
    } catch (error) {
      for (const document of this.documents) {
        document.reset();
      }
      this.keys.lock();
      throw error;
    }
    this.stopWorkers();
    this.unsubscribeSettings = this.settings.onChange(() => this.applySettings());
    this.scheduler = new DailyResetScheduler({
      time: this.currentSettings().dailyResetTime,
      now: this.now,
      checkIntervalMs: this.options.resetCheckIntervalMs,
      lastResetAt: () => this.tasks.lastDailyResetAt,
      onReset: async () => {
        if (!this.tasks.isAvailable) {
          console.warn('Daily reset skipped: tasks could not be loaded');
          return;
        }
        const cleared = await this.tasks.clearStruckToday();
        console.info(`Daily reset cleared ${cleared} struck-today flag(s)`);
      }
    });
    const intervalDays = this.options.backupIntervalDays ?? 0;
    if (intervalDays > 0) {
      this.backupScheduler = new BackupScheduler({
        intervalDays,
        now: this.now,
        checkIntervalMs: this.options.backupCheckIntervalMs,
        lastBackupAt: () => this.currentSettings().lastAutomaticBackupAt,
        onBackup: async () => {
          const name = await this.backups.create('automatic');
          console.info(`Automatic backup "${name}" created`);
          if (this.settings.isAvailable) {
            await this.settings.recordAutomaticBackup(this.now());
          }
        }
      });
    }
    this.autosave.setInterval(this.currentSettings().autosaveIntervalSeconds);
    this.autosave.start();
    this.scheduler.start();
    this.backupScheduler?.start();
    return { keyId: session.keyId, storageRoot: this.storage.root };
  }

  private currentSettings(): Settings {
    return this.settings.isAvailable ? this.settings.get() : DEFAULT_SETTINGS;
  }

  private applySettings() {
    const settings = this.currentSettings();
    if (this.autosave.interval !== settings.autosaveIntervalSeconds * 1000) {
      this.autosave.setInterval(settings.autosaveIntervalSeconds);
    }
    if (this.scheduler && this.scheduler.resetTime !== settings.dailyResetTime) {
      this.scheduler.setTime(settings.dailyResetTime);
    }
  }

  private stopWorkers() {
    this.autosave.stop();
    this.scheduler?.stop();
    this.scheduler = null;
    this.backupScheduler?.stop();
    this.backupScheduler = null;
    this.unsubscribeSettings?.();
    this.unsubscribeSettings = null;
  }
}
