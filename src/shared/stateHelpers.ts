import { DateTime } from 'luxon';
import type {
  BackupType,
  ImportFormat,
  Settings,
  Task,
  TaskHistoryEntry,
  TaskHistoryType,
  TasksDocument,
  Theme,
  UpdateChannel
} from './types';

export const TASKS_DOCUMENT_VERSION = 1;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const HOUR_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const HISTORY_TYPES: readonly TaskHistoryType[] = [
  'strike_today',
  'strike_forever',
  'undo_strike',
  'complete',
  'uncomplete',
  'schedule',
  'unschedule'
];
export const THEMES: readonly Theme[] = ['orange', 'blue', 'green', 'purple', 'dark'];
export const UPDATE_CHANNELS: readonly UpdateChannel[] = ['stable', 'beta'];
export const BACKUP_TYPES: readonly BackupType[] = ['manual', 'automatic', 'pre-update'];
export const IMPORT_FORMATS: readonly ImportFormat[] = ['csv', 'txt'];

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Local calendar date of `value`. */
export const toISODateKey = (value: Date): string => DateTime.fromJSDate(value).toFormat('yyyy-LL-dd');

export const isISODate = (value: string): boolean =>
  DATE_PATTERN.test(value) && DateTime.fromISO(value).isValid;

export const parseHourMinute = (value: string): { hour: number; minute: number } | null => {
  const match = HOUR_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
};

export const minutesSinceMidnight = (value: string): number | null => {
  const parsed = parseHourMinute(value);
  return parsed ? parsed.hour * 60 + parsed.minute : null;
};

export const DEFAULT_SETTINGS: Settings = {
  theme: 'orange',
  displayScale: 100,
  autosaveIntervalSeconds: 30,
  dailyResetTime: '09:00',
  autostart: false,
  updates: {
    channel: 'stable',
    checkOnStartup: true
  },
  lastAutomaticBackupAt: null
};

export const createEmptyTasksDocument = (): TasksDocument => ({
  version: TASKS_DOCUMENT_VERSION,
  tasks: [],
  lastDailyResetAt: null
});

const text = (value: unknown, fallback = ''): string => (typeof value === 'string' ? value : fallback);

const nullableText = (value: unknown): string | null =>
  typeof value === 'string' && value.length > 0 ? value : null;

const count = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? Math.floor(value) : fallback;

const flag = (value: unknown): boolean => value === true;

const oneOf = <T extends string>(value: unknown, options: readonly T[], fallback: T): T =>
  options.find((option) => option === value) ?? fallback;

const readDailyStrikes = (value: unknown): Record<string, number> => {
  const result: Record<string, number> = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [date, strikes] of Object.entries(value)) {
    if (isISODate(date) && typeof strikes === 'number' && strikes > 0) {
      result[date] = Math.floor(strikes);
    }
  }
  return result;
};

const readHistory = (value: unknown): TaskHistoryEntry[] => {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.flatMap((entry: unknown): TaskHistoryEntry[] => {
    if (!isRecord(entry) || typeof entry.at !== 'string') {
      return [];
    }
    const entryType = entry.type;
    const type = HISTORY_TYPES.find((candidate) => candidate === entryType);
    if (!type) {
      return [];
    }
    return [typeof entry.report === 'string' ? { type, at: entry.at, report: entry.report } : { type, at: entry.at }];
  });
};

/** Rebuilds a task from stored JSON, filling defaults; `null` when it has no usable id or title. */
export const ensureTaskDefaults = (raw: unknown): Task | null => {
  if (!isRecord(raw) || typeof raw.id !== 'string' || raw.id.length === 0 || typeof raw.title !== 'string') {
    return null;
  }
  const createdAt = text(raw.createdAt, new Date(0).toISOString());
  const estimatedDuration = count(raw.estimatedDuration, 60);
  const completed = flag(raw.completed);
  const scheduledHour = nullableText(raw.scheduledHour);
  const scheduledDate = nullableText(raw.scheduledDate);
  // A half-set slot is dropped rather than guessed at.
  const hasSlot = scheduledHour !== null && scheduledDate !== null;
  return {
    id: raw.id,
    title: raw.title,
    description: text(raw.description),
    project: text(raw.project),
    dueDate: nullableText(raw.dueDate),
    estimatedDuration,
    scheduledHour: hasSlot ? scheduledHour : null,
    scheduledDate: hasSlot ? scheduledDate : null,
    scheduledDuration: hasSlot ? count(raw.scheduledDuration, estimatedDuration) : null,
    completed,
    completedAt: completed ? nullableText(raw.completedAt) : null,
    struckToday: flag(raw.struckToday),
    struckDate: nullableText(raw.struckDate),
    strikeCount: count(raw.strikeCount, 0),
    dailyStrikes: readDailyStrikes(raw.dailyStrikes),
    strikeReport: nullableText(raw.strikeReport),
    createdAt,
    updatedAt: text(raw.updatedAt, createdAt),
    history: readHistory(raw.history)
  };
};

export const rehydrateTasksDocument = (raw: unknown): TasksDocument => {
  if (!isRecord(raw)) {
    return createEmptyTasksDocument();
  }
  const seen = new Set<string>();
  const tasks = (Array.isArray(raw.tasks) ? raw.tasks : []).flatMap((entry: unknown): Task[] => {
    const task = ensureTaskDefaults(entry);
    if (!task || seen.has(task.id)) {
      return [];
    }
    seen.add(task.id);
    return [task];
  });
  return {
    version: TASKS_DOCUMENT_VERSION,
    tasks,
    lastDailyResetAt: nullableText(raw.lastDailyResetAt)
  };
};

const inRange = (value: unknown, min: number, max: number, fallback: number): number =>
  typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max ? value : fallback;

export const rehydrateSettings = (raw: unknown): Settings => {
  if (!isRecord(raw)) {
    return { ...DEFAULT_SETTINGS, updates: { ...DEFAULT_SETTINGS.updates } };
  }
  const updates: Record<string, unknown> = isRecord(raw.updates) ? raw.updates : {};
  const resetTime = typeof raw.dailyResetTime === 'string' && parseHourMinute(raw.dailyResetTime) ? raw.dailyResetTime : null;
  return {
    theme: oneOf(raw.theme, THEMES, DEFAULT_SETTINGS.theme),
    displayScale: inRange(raw.displayScale, 50, 200, DEFAULT_SETTINGS.displayScale),
    autosaveIntervalSeconds: inRange(raw.autosaveIntervalSeconds, 5, 3600, DEFAULT_SETTINGS.autosaveIntervalSeconds),
    dailyResetTime: resetTime ?? DEFAULT_SETTINGS.dailyResetTime,
    autostart: flag(raw.autostart),
    updates: {
      channel: oneOf(updates.channel, UPDATE_CHANNELS, DEFAULT_SETTINGS.updates.channel),
      checkOnStartup:
        typeof updates.checkOnStartup === 'boolean' ? updates.checkOnStartup : DEFAULT_SETTINGS.updates.checkOnStartup
    },
    lastAutomaticBackupAt:
      typeof raw.lastAutomaticBackupAt === 'string' && DateTime.fromISO(raw.lastAutomaticBackupAt).isValid
        ? raw.lastAutomaticBackupAt
        : null
  };
};
