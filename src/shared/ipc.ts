import type { BackupInfo, ImportResult, SessionInfo, Settings, Task, TaskQuery } from './types';

/**
 * Operations the UI layer may call. Arguments typed `unknown` arrive as parsed
 * JSON and are validated field by field before use.
 */
export interface VaultApi {
  isInitialized(): Promise<boolean>;
  isUnlocked(): boolean;
  initialize(password: string): Promise<SessionInfo>;
  login(password: string): Promise<SessionInfo>;
  changePassword(oldPassword: string, newPassword: string): Promise<void>;
  logout(): Promise<void>;

  listTasks(query?: TaskQuery): Task[];
  getTask(id: string): Task;
  plannerFor(date: string): Task[];
  createTask(input: unknown): Promise<Task>;
  /** `format` is `csv` or `txt`; invalid rows are reported, not fatal. */
  importTasks(content: unknown, format: unknown): Promise<ImportResult>;
  updateTask(id: string, patch: unknown): Promise<Task>;
  deleteTask(id: string): Promise<Task>;
  strikeTask(id: string, mode: unknown, report: unknown): Promise<Task>;
  undoStrike(id: string): Promise<Task>;
  completeTask(id: string): Promise<Task>;
  uncompleteTask(id: string): Promise<Task>;
  scheduleTask(id: string, hour: unknown, date?: unknown, duration?: unknown): Promise<Task>;
  unscheduleTask(id: string): Promise<Task>;

  getSettings(): Settings;
  updateSettings(patch: unknown): Promise<Settings>;

  listBackups(): Promise<BackupInfo[]>;
  createBackup(type?: unknown): Promise<string>;
  restoreBackup(name: string): Promise<void>;
}
