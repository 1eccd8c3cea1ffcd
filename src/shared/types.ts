export type StrikeMode = 'today' | 'forever';

export type TaskHistoryType =
  | 'strike_today'
  | 'strike_forever'
  | 'undo_strike'
  | 'complete'
  | 'uncomplete'
  | 'schedule'
  | 'unschedule';

export interface TaskHistoryEntry {
  type: TaskHistoryType;
  at: string;
  report?: string;
}

export interface Task {
  id: string;
  title: string;
  description: string;
  project: string;
  /** Calendar date, `YYYY-MM-DD`. */
  dueDate: string | null;
  /** Minutes. */
  estimatedDuration: number;
  /** `HH:MM`; set together with `scheduledDate` and `scheduledDuration`. */
  scheduledHour: string | null;
  scheduledDate: string | null;
  scheduledDuration: number | null;
  completed: boolean;
  completedAt: string | null;
  struckToday: boolean;
  struckDate: string | null;
  strikeCount: number;
  /** Strikes per calendar date; only today's entry survives a daily reset. */
  dailyStrikes: Record<string, number>;
  strikeReport: string | null;
  createdAt: string;
  updatedAt: string;
  history: TaskHistoryEntry[];
}

export interface NewTaskInput {
  title: string;
  description?: string;
  project?: string;
  dueDate?: string | null;
  estimatedDuration?: number;
}

/** Fields `update` may touch; scheduling and lifecycle have their own operations. */
export interface TaskPatch {
  title?: string;
  description?: string;
  project?: string;
  dueDate?: string | null;
  estimatedDuration?: number;
}

export type ImportFormat = 'csv' | 'txt';

export interface ImportRowError {
  /** 1-based line in the imported text where the row starts. */
  line: number;
  field: string;
  message: string;
}

export interface ImportResult {
  imported: Task[];
  errors: ImportRowError[];
}

export interface TaskQuery {
  project?: string;
  completed?: boolean;
  struckToday?: boolean;
  scheduledDate?: string;
}

export interface TasksDocument {
  version: number;
  tasks: Task[];
  lastDailyResetAt: string | null;
}

export type Theme = 'orange' | 'blue' | 'green' | 'purple' | 'dark';
export type UpdateChannel = 'stable' | 'beta';

export interface UpdateSettings {
  channel: UpdateChannel;
  checkOnStartup: boolean;
}

export interface Settings {
  theme: Theme;
  /** Percent. */
  displayScale: number;
  autosaveIntervalSeconds: number;
  /** Local wall-clock `HH:MM`. */
  dailyResetTime: string;
  autostart: boolean;
  updates: UpdateSettings;
  /** Set by the weekly backup timer; not writable through a patch. */
  lastAutomaticBackupAt: string | null;
}

export interface SettingsPatch {
  theme?: Theme;
  displayScale?: number;
  autosaveIntervalSeconds?: number;
  dailyResetTime?: string;
  autostart?: boolean;
  updates?: Partial<UpdateSettings>;
}

export type BackupType = 'manual' | 'automatic' | 'pre-update';

export interface BackupManifest {
  formatVersion: number;
  type: BackupType;
  createdAt: string;
  appVersion: string;
  files: string[];
}

export interface BackupInfo {
  name: string;
  type: BackupType;
  version: number;
  appVersion: string;
  createdAt: string;
}

export interface SessionInfo {
  keyId: string;
  storageRoot: string;
}
