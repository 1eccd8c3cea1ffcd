import { LimitExceededError, NotFoundError, SlotConflictError, ValidationError } from './errors';
import { minutesSinceMidnight, toISODateKey } from './stateHelpers';
import type { StrikeMode, Task, TaskHistoryEntry, TaskPatch, TasksDocument } from './types';

export const MAX_DAILY_STRIKES = 2;

const MINUTES_PER_DAY = 24 * 60;

export type TaskAction =
  | { type: 'create'; task: Task }
  | { type: 'import'; tasks: Task[] }
  | { type: 'update'; taskId: string; patch: TaskPatch }
  | { type: 'delete'; taskId: string }
  | { type: 'strike'; taskId: string; mode: StrikeMode; report: string }
  | { type: 'undoStrike'; taskId: string }
  | { type: 'complete'; taskId: string }
  | { type: 'uncomplete'; taskId: string }
  | { type: 'schedule'; taskId: string; hour: string; date: string; duration: number }
  | { type: 'unschedule'; taskId: string }
  | { type: 'clearStruckToday' };

const findTask = (state: TasksDocument, taskId: string): Task => {
  const task = state.tasks.find((candidate) => candidate.id === taskId);
  if (!task) {
    throw new NotFoundError('task', taskId);
  }
  return task;
};

const replaceTask = (state: TasksDocument, next: Task): TasksDocument => ({
  ...state,
  tasks: state.tasks.map((task) => (task.id === next.id ? next : task))
});

const withHistory = (task: Task, entry: TaskHistoryEntry): TaskHistoryEntry[] => [...task.history, entry];

const strikeToday = (state: TasksDocument, task: Task, report: string, now: Date): TasksDocument => {
  if (task.completed) {
    throw new ValidationError('completed', `Task "${task.title}" is already completed`);
  }
  const today = toISODateKey(now);
  const strikesToday = task.dailyStrikes[today] ?? 0;
  if (strikesToday >= MAX_DAILY_STRIKES) {
    throw new LimitExceededError(task.id, MAX_DAILY_STRIKES, today);
  }
  const at = now.toISOString();
  return replaceTask(state, {
    ...task,
    dailyStrikes: { ...task.dailyStrikes, [today]: strikesToday + 1 },
    struckToday: true,
    struckDate: today,
    strikeReport: report,
    strikeCount: task.strikeCount + 1,
    updatedAt: at,
    history: withHistory(task, { type: 'strike_today', at, report })
  });
};

const strikeForever = (state: TasksDocument, task: Task, report: string, now: Date): TasksDocument => {
  if (task.completed) {
    return state;
  }
  const at = now.toISOString();
  return replaceTask(state, {
    ...task,
    completed: true,
    completedAt: at,
    struckToday: false,
    struckDate: null,
    strikeReport: report,
    strikeCount: task.strikeCount + 1,
    updatedAt: at,
    history: withHistory(task, { type: 'strike_forever', at, report })
  });
};

const undoStrike = (state: TasksDocument, task: Task, now: Date): TasksDocument => {
  const today = toISODateKey(now);
  const strikesToday = task.dailyStrikes[today] ?? 0;
  if (!task.struckToday || strikesToday === 0) {
    throw new ValidationError('struckToday', `Task "${task.title}" has no strike to undo today`);
  }
  const remaining = strikesToday - 1;
  const dailyStrikes = { ...task.dailyStrikes, [today]: remaining };
  const at = now.toISOString();
  // strikeCount is a running total and is left as is.
  return replaceTask(state, {
    ...task,
    dailyStrikes,
    struckToday: remaining > 0,
    struckDate: remaining > 0 ? task.struckDate : null,
    strikeReport: remaining > 0 ? task.strikeReport : null,
    updatedAt: at,
    history: withHistory(task, { type: 'undo_strike', at })
  });
};

const findSlotConflict = (
  state: TasksDocument,
  taskId: string,
  date: string,
  start: number,
  duration: number
): Task | undefined =>
  state.tasks.find((other) => {
    if (other.id === taskId || other.completed || other.scheduledDate !== date || !other.scheduledHour) {
      return false;
    }
    const otherStart = minutesSinceMidnight(other.scheduledHour);
    if (otherStart === null) {
      return false;
    }
    const otherEnd = otherStart + (other.scheduledDuration ?? other.estimatedDuration);
    return start < otherEnd && otherStart < start + duration;
  });

const schedule = (
  state: TasksDocument,
  task: Task,
  hour: string,
  date: string,
  duration: number,
  now: Date
): TasksDocument => {
  const start = minutesSinceMidnight(hour);
  if (start === null) {
    throw new ValidationError('hour', 'hour must be an HH:MM time');
  }
  if (start + duration > MINUTES_PER_DAY) {
    throw new ValidationError('duration', `A ${duration} minute slot at ${hour} runs past midnight`);
  }
  const conflict = findSlotConflict(state, task.id, date, start, duration);
  if (conflict) {
    throw new SlotConflictError(conflict.id, conflict.title, date, conflict.scheduledHour ?? hour);
  }
  const at = now.toISOString();
  return replaceTask(state, {
    ...task,
    scheduledHour: hour,
    scheduledDate: date,
    scheduledDuration: duration,
    updatedAt: at,
    history: withHistory(task, { type: 'schedule', at })
  });
};

const clearStruckToday = (state: TasksDocument, now: Date): TasksDocument => {
  const today = toISODateKey(now);
  return {
    ...state,
    lastDailyResetAt: now.toISOString(),
    tasks: state.tasks.map((task) => {
      const todayCount = task.dailyStrikes[today];
      return {
        ...task,
        struckToday: false,
        struckDate: null,
        dailyStrikes: todayCount === undefined ? {} : { [today]: todayCount }
      };
    })
  };
};

/**
 * Applies one task action. Rule violations throw and leave `state` untouched;
 * an action that changes nothing returns `state` itself.
 */
export const applyTaskAction = (state: TasksDocument, action: TaskAction, now: Date): TasksDocument => {
  switch (action.type) {
    case 'create': {
      return { ...state, tasks: [...state.tasks, action.task] };
    }
    case 'import': {
      return { ...state, tasks: [...state.tasks, ...action.tasks] };
    }
    case 'update': {
      const task = findTask(state, action.taskId);
      return replaceTask(state, { ...task, ...action.patch, updatedAt: now.toISOString() });
    }
    case 'delete': {
      findTask(state, action.taskId);
      return { ...state, tasks: state.tasks.filter((task) => task.id !== action.taskId) };
    }
    case 'strike': {
      const task = findTask(state, action.taskId);
      return action.mode === 'today'
        ? strikeToday(state, task, action.report, now)
        : strikeForever(state, task, action.report, now);
    }
    case 'undoStrike': {
      return undoStrike(state, findTask(state, action.taskId), now);
    }
    case 'complete': {
      const task = findTask(state, action.taskId);
      if (task.completed) {
        return state;
      }
      const at = now.toISOString();
      return replaceTask(state, {
        ...task,
        completed: true,
        completedAt: at,
        struckToday: false,
        updatedAt: at,
        history: withHistory(task, { type: 'complete', at })
      });
    }
    case 'uncomplete': {
      const task = findTask(state, action.taskId);
      if (!task.completed) {
        return state;
      }
      const at = now.toISOString();
      return replaceTask(state, {
        ...task,
        completed: false,
        completedAt: null,
        updatedAt: at,
        history: withHistory(task, { type: 'uncomplete', at })
      });
    }
    case 'schedule': {
      const task = findTask(state, action.taskId);
      return schedule(state, task, action.hour, action.date, action.duration, now);
    }
    case 'unschedule': {
      const task = findTask(state, action.taskId);
      if (!task.scheduledHour) {
        return state;
      }
      const at = now.toISOString();
      return replaceTask(state, {
        ...task,
        scheduledHour: null,
        scheduledDate: null,
        scheduledDuration: null,
        updatedAt: at,
        history: withHistory(task, { type: 'unschedule', at })
      });
    }
    case 'clearStruckToday': {
      return clearStruckToday(state, now);
    }
    default:
      return state;
  }
};
