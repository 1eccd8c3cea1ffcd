import { ValidationError } from './errors';
import { BACKUP_TYPES, IMPORT_FORMATS, THEMES, UPDATE_CHANNELS, isISODate, isRecord, parseHourMinute } from './stateHelpers';
import type { BackupType, ImportFormat, NewTaskInput, SettingsPatch, TaskPatch } from './types';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 1000;
export const PROJECT_MAX_LENGTH = 100;
export const MIN_DURATION_MINUTES = 5;
export const MAX_DURATION_MINUTES = 480;
export const DEFAULT_DURATION_MINUTES = 60;

const rejectUnknownFields = (input: Record<string, unknown>, allowed: readonly string[], scope: string) => {
  for (const key of Object.keys(input)) {
    if (!allowed.includes(key)) {
      throw new ValidationError(key, `Unknown ${scope} field "${key}"`);
    }
  }
};

export const requireObject = (input: unknown, field: string): Record<string, unknown> => {
  if (!isRecord(input)) {
    throw new ValidationError(field, `${field} must be an object`);
  }
  return input;
};

const readText = (value: unknown, field: string, maxLength: number, required: boolean): string => {
  if (typeof value !== 'string') {
    throw new ValidationError(field, `${field} must be a string`);
  }
  const trimmed = value.trim();
  if (required && trimmed.length === 0) {
    throw new ValidationError(field, `${field} is required`);
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(field, `${field} must be at most ${maxLength} characters`);
  }
  return trimmed;
};

export const readDuration = (value: unknown, field: string): number => {
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < MIN_DURATION_MINUTES ||
    value > MAX_DURATION_MINUTES
  ) {
    throw new ValidationError(
      field,
      `${field} must be a whole number of minutes between ${MIN_DURATION_MINUTES} and ${MAX_DURATION_MINUTES}`
    );
  }
  return value;
};

export const readDate = (value: unknown, field: string): string => {
  if (typeof value !== 'string' || !isISODate(value)) {
    throw new ValidationError(field, `${field} must be a YYYY-MM-DD date`);
  }
  return value;
};

export const readHour = (value: unknown, field: string): string => {
  if (typeof value !== 'string' || !parseHourMinute(value)) {
    throw new ValidationError(field, `${field} must be an HH:MM time`);
  }
  return value;
};

const readOptionalDate = (value: unknown, field: string): string | null =>
  value === null || value === '' ? null : readDate(value, field);

const readBoolean = (value: unknown, field: string): boolean => {
  if (typeof value !== 'boolean') {
    throw new ValidationError(field, `${field} must be true or false`);
  }
  return value;
};

const readIntegerInRange = (value: unknown, field: string, min: number, max: number): number => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(field, `${field} must be a whole number between ${min} and ${max}`);
  }
  return value;
};

const readOneOf = <T extends string>(value: unknown, field: string, options: readonly T[]): T => {
  const match = options.find((option) => option === value);
  if (match === undefined) {
    throw new ValidationError(field, `${field} must be one of ${options.join(', ')}`);
  }
  return match;
};

export type NormalizedNewTask = Required<NewTaskInput>;

const NEW_TASK_FIELDS = ['title', 'description', 'project', 'dueDate', 'estimatedDuration'] as const;

export const parseNewTask = (input: unknown): NormalizedNewTask => {
  const record = requireObject(input, 'task');
  rejectUnknownFields(record, NEW_TASK_FIELDS, 'task');
  return {
    title: readText(record.title, 'title', TITLE_MAX_LENGTH, true),
    description:
      record.description === undefined ? '' : readText(record.description, 'description', DESCRIPTION_MAX_LENGTH, false),
    project: record.project === undefined ? '' : readText(record.project, 'project', PROJECT_MAX_LENGTH, false),
    dueDate: record.dueDate === undefined ? null : readOptionalDate(record.dueDate, 'dueDate'),
    estimatedDuration:
      record.estimatedDuration === undefined
        ? DEFAULT_DURATION_MINUTES
        : readDuration(record.estimatedDuration, 'estimatedDuration')
  };
};

export const parseTaskPatch = (input: unknown): TaskPatch => {
  const record = requireObject(input, 'patch');
  rejectUnknownFields(record, NEW_TASK_FIELDS, 'task');
  const patch: TaskPatch = {};
  if (record.title !== undefined) {
    patch.title = readText(record.title, 'title', TITLE_MAX_LENGTH, true);
  }
  if (record.description !== undefined) {
    patch.description = readText(record.description, 'description', DESCRIPTION_MAX_LENGTH, false);
  }
  if (record.project !== undefined) {
    patch.project = readText(record.project, 'project', PROJECT_MAX_LENGTH, false);
  }
  if (record.dueDate !== undefined) {
    patch.dueDate = readOptionalDate(record.dueDate, 'dueDate');
  }
  if (record.estimatedDuration !== undefined) {
    patch.estimatedDuration = readDuration(record.estimatedDuration, 'estimatedDuration');
  }
  return patch;
};

export const parseStrikeReport = (value: unknown): string => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError('report', 'A strike needs a short report of what was done');
  }
  return readText(value, 'report', DESCRIPTION_MAX_LENGTH, true);
};

const SETTINGS_FIELDS = [
  'theme',
  'displayScale',
  'autosaveIntervalSeconds',
  'dailyResetTime',
  'autostart',
  'updates'
] as const;
const UPDATE_FIELDS = ['channel', 'checkOnStartup'] as const;

export const parseSettingsPatch = (input: unknown): SettingsPatch => {
  const record = requireObject(input, 'settings');
  rejectUnknownFields(record, SETTINGS_FIELDS, 'settings');
  const patch: SettingsPatch = {};
  if (record.theme !== undefined) {
    patch.theme = readOneOf(record.theme, 'theme', THEMES);
  }
  if (record.displayScale !== undefined) {
    patch.displayScale = readIntegerInRange(record.displayScale, 'displayScale', 50, 200);
  }
  if (record.autosaveIntervalSeconds !== undefined) {
    patch.autosaveIntervalSeconds = readIntegerInRange(
      record.autosaveIntervalSeconds,
      'autosaveIntervalSeconds',
      5,
      3600
    );
  }
  if (record.dailyResetTime !== undefined) {
    patch.dailyResetTime = readHour(record.dailyResetTime, 'dailyResetTime');
  }
  if (record.autostart !== undefined) {
    patch.autostart = readBoolean(record.autostart, 'autostart');
  }
  if (record.updates !== undefined) {
    const updates = requireObject(record.updates, 'updates');
    rejectUnknownFields(updates, UPDATE_FIELDS, 'updates');
    patch.updates = {};
    if (updates.channel !== undefined) {
      patch.updates.channel = readOneOf(updates.channel, 'updates.channel', UPDATE_CHANNELS);
    }
    if (updates.checkOnStartup !== undefined) {
      patch.updates.checkOnStartup = readBoolean(updates.checkOnStartup, 'updates.checkOnStartup');
    }
  }
  return patch;
};

export const parseBackupType = (value: unknown): BackupType =>
  value === undefined ? 'manual' : readOneOf(value, 'type', BACKUP_TYPES);

export const parseImportFormat = (value: unknown): ImportFormat => readOneOf(value, 'format', IMPORT_FORMATS);

export const parseImportContent = (value: unknown): string => {
  if (typeof value !== 'string') {
    throw new ValidationError('content', 'content must be a string');
  }
  return value;
};
