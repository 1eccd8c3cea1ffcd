import { v4 as uuid } from 'uuid';
import { NotFoundError, ValidationError } from '../shared/errors';
import { createEmptyTasksDocument, rehydrateTasksDocument, toISODateKey } from '../shared/stateHelpers';
import { applyTaskAction, type TaskAction } from '../shared/taskTransitions';
import { readImportRows } from '../shared/taskImport';
import type { ImportResult, ImportRowError, StrikeMode, Task, TaskQuery, TasksDocument } from '../shared/types';
import {
  parseImportContent,
  parseImportFormat,
  parseNewTask,
  parseStrikeReport,
  parseTaskPatch,
  readDate,
  readDuration,
  readHour
} from '../shared/validation';
import type { EncryptedStore } from './encryptedStore';
import { PersistedDocument, type Persistence } from './persistedDocument';

export const TASKS_DOCUMENT = 'tasks';

const STRIKE_MODES: readonly StrikeMode[] = ['today', 'forever'];

// Lifecycle transitions are durable before they return; edits and planner
// moves are batched for the autosave worker.
const PERSISTENCE: Record<TaskAction['type'], Persistence> = {
  create: 'write-through',
  import: 'write-through',
  delete: 'write-through',
  strike: 'write-through',
  undoStrike: 'write-through',
  complete: 'write-through',
  uncomplete: 'write-through',
  update: 'deferred',
  schedule: 'deferred',
  unschedule: 'deferred',
  clearStruckToday: 'deferred'
};

const matchesQuery = (task: Task, query: TaskQuery): boolean =>
  (query.project === undefined || task.project === query.project) &&
  (query.completed === undefined || task.completed === query.completed) &&
  (query.struckToday === undefined || task.struckToday === query.struckToday) &&
  (query.scheduledDate === undefined || task.scheduledDate === query.scheduledDate);

export class TaskRepository extends PersistedDocument<TasksDocument> {
  constructor(store: EncryptedStore, now: () => Date = () => new Date()) {
    super(store, TASKS_DOCUMENT, now);
  }

  protected empty(): TasksDocument {
    return createEmptyTasksDocument();
  }

  protected hydrate(raw: unknown): TasksDocument {
    return rehydrateTasksDocument(raw);
  }

  get lastDailyResetAt(): string | null {
    return this.state.lastDailyResetAt;
  }

  list(query: TaskQuery = {}): Task[] {
    this.assertAvailable();
    return this.state.tasks.filter((task) => matchesQuery(task, query));
  }

  get(id: string): Task {
    this.assertAvailable();
    const task = this.state.tasks.find((candidate) => candidate.id === id);
    if (!task) {
      throw new NotFoundError('task', id);
    }
    return task;
  }

  /** Tasks on the day planner for `date`, earliest slot first. */
  planner(date: string): Task[] {
    const day = readDate(date, 'date');
    return this.list({ scheduledDate: day }).sort((a, b) =>
      (a.scheduledHour ?? '').localeCompare(b.scheduledHour ?? '')
    );
  }

  async create(input: unknown): Promise<Task> {
    const task = this.buildTask(input);
    await this.dispatch({ type: 'create', task });
    return task;
  }

  /**
   * Adds every row of `content` that passes the same checks as `create`, in
   * one write. Rows that fail are reported by line and skipped.
   */
  async importTasks(content: unknown, format: unknown): Promise<ImportResult> {
    this.assertAvailable();
    const rows = readImportRows(parseImportContent(content), parseImportFormat(format));
    const imported: Task[] = [];
    const errors: ImportRowError[] = [];
    for (const row of rows) {
      try {
        imported.push(this.buildTask(row.fields));
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        errors.push({ line: row.line, field: error.field, message: error.message });
      }
    }
    if (imported.length > 0) {
      await this.dispatch({ type: 'import', tasks: imported });
    }
    return { imported, errors };
  }

  async update(id: string, patch: unknown): Promise<Task> {
    const parsed = parseTaskPatch(patch);
    return this.dispatchFor(id, { type: 'update', taskId: id, patch: parsed });
  }

  async delete(id: string): Promise<Task> {
    const existing = this.get(id);
    await this.dispatch({ type: 'delete', taskId: id });
    return existing;
  }

  async strike(id: string, mode: unknown, report: unknown): Promise<Task> {
    const strikeMode = STRIKE_MODES.find((candidate) => candidate === mode);
    if (!strikeMode) {
      throw new ValidationError('mode', 'Strike mode must be "today" or "forever"');
    }
    return this.dispatchFor(id, { type: 'strike', taskId: id, mode: strikeMode, report: parseStrikeReport(report) });
  }

  async undoStrike(id: string): Promise<Task> {
    return this.dispatchFor(id, { type: 'undoStrike', taskId: id });
  }

  async complete(id: string): Promise<Task> {
    return this.dispatchFor(id, { type: 'complete', taskId: id });
  }

  async uncomplete(id: string): Promise<Task> {
    return this.dispatchFor(id, { type: 'uncomplete', taskId: id });
  }

  /** `date` defaults to today; `duration` to the task's estimate. */
  async schedule(id: string, hour: unknown, date?: unknown, duration?: unknown): Promise<Task> {
    const slotHour = readHour(hour, 'hour');
    const slotDate = date === undefined ? toISODateKey(this.now()) : readDate(date, 'date');
    const minutes = readDuration(duration ?? this.get(id).estimatedDuration, 'duration');
    return this.dispatchFor(id, { type: 'schedule', taskId: id, hour: slotHour, date: slotDate, duration: minutes });
  }

  async unschedule(id: string): Promise<Task> {
    return this.dispatchFor(id, { type: 'unschedule', taskId: id });
  }

  /** Daily reset: clears every struck-today flag; strike totals are kept. */
  async clearStruckToday(): Promise<number> {
    let cleared = 0;
    await this.dispatch({ type: 'clearStruckToday' }, (current) => {
      cleared = current.tasks.filter((task) => task.struckToday).length;
    });
    return cleared;
  }

  private buildTask(input: unknown): Task {
    const fields = parseNewTask(input);
    const at = this.now().toISOString();
    return {
      id: uuid(),
      ...fields,
      scheduledHour: null,
      scheduledDate: null,
      scheduledDuration: null,
      completed: false,
      completedAt: null,
      struckToday: false,
      struckDate: null,
      strikeCount: 0,
      dailyStrikes: {},
      strikeReport: null,
      createdAt: at,
      updatedAt: at,
      history: []
    };
  }

  private dispatch(action: TaskAction, observe?: (current: TasksDocument) => void): Promise<TasksDocument> {
    return this.mutate((current) => {
      observe?.(current);
      return applyTaskAction(current, action, this.now());
    }, PERSISTENCE[action.type]);
  }

  private async dispatchFor(id: string, action: TaskAction): Promise<Task> {
    const next = await this.dispatch(action);
    const task = next.tasks.find((candidate) => candidate.id === id);
    if (!task) {
      throw new NotFoundError('task', id);
    }
    return task;
  }
}
