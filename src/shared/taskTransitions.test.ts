import { describe, expect, it } from 'vitest';
import { LimitExceededError, NotFoundError, SlotConflictError, ValidationError } from './errors';
import { createEmptyTasksDocument } from './stateHelpers';
import { applyTaskAction } from './taskTransitions';
import type { Task, TasksDocument } from './types';

const MORNING = new Date(2026, 2, 10, 10, 0);
const NEXT_MORNING = new Date(2026, 2, 11, 10, 0);
const TODAY = '2026-03-10';

const makeTask = (overrides: Partial<Task> = {}): Task => ({
  id: 'task-1',
  title: 'Write report',
  description: '',
  project: '',
  dueDate: null,
  estimatedDuration: 60,
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
  createdAt: '2026-03-01T00:00:00.000Z',
  updatedAt: '2026-03-01T00:00:00.000Z',
  history: [],
  ...overrides
});

const stateWith = (...tasks: Task[]): TasksDocument => ({ ...createEmptyTasksDocument(), tasks });

const taskIn = (state: TasksDocument, id = 'task-1'): Task | undefined => state.tasks.find((task) => task.id === id);

const strikeToday = (state: TasksDocument, now = MORNING) =>
  applyTaskAction(state, { type: 'strike', taskId: 'task-1', mode: 'today', report: 'drafted outline' }, now);

describe('applyTaskAction', () => {
  describe('strike', () => {
    it('accepts two today strikes per day and rejects the third unchanged', () => {
      const twice = strikeToday(strikeToday(stateWith(makeTask())));

      expect(taskIn(twice)).toMatchObject({
        struckToday: true,
        struckDate: TODAY,
        strikeCount: 2,
        dailyStrikes: { [TODAY]: 2 },
        strikeReport: 'drafted outline'
      });
      const error = (() => {
        try {
          strikeToday(twice);
        } catch (reason) {
          return reason;
        }
        return null;
      })();
      expect(error).toBeInstanceOf(LimitExceededError);
      expect(error).toMatchObject({ taskId: 'task-1', limit: 2, date: TODAY });
      expect(taskIn(twice)?.strikeCount).toBe(2);
    });

    it('starts a fresh allowance on the next calendar day', () => {
      const twice = strikeToday(strikeToday(stateWith(makeTask())));
      const nextDay = strikeToday(twice, NEXT_MORNING);

      expect(taskIn(nextDay)?.strikeCount).toBe(3);
      expect(taskIn(nextDay)?.dailyStrikes).toEqual({ [TODAY]: 2, '2026-03-11': 1 });
    });

    it('completes the task on a forever strike and records the report', () => {
      const state = applyTaskAction(
        stateWith(makeTask()),
        { type: 'strike', taskId: 'task-1', mode: 'forever', report: 'shipped' },
        MORNING
      );

      expect(taskIn(state)).toMatchObject({
        completed: true,
        completedAt: MORNING.toISOString(),
        strikeCount: 1,
        strikeReport: 'shipped'
      });
      expect(taskIn(state)?.history).toEqual([{ type: 'strike_forever', at: MORNING.toISOString(), report: 'shipped' }]);
    });

    it('treats a forever strike on a completed task as a no-op', () => {
      const state = stateWith(makeTask({ completed: true, completedAt: '2026-03-09T10:00:00.000Z' }));
      const next = applyTaskAction(state, { type: 'strike', taskId: 'task-1', mode: 'forever', report: 'again' }, MORNING);
      expect(next).toBe(state);
    });

    it('refuses a today strike on a completed task', () => {
      const state = stateWith(makeTask({ completed: true }));
      expect(() => strikeToday(state)).toThrow(ValidationError);
    });

    it('reports unknown tasks', () => {
      expect(() => strikeToday(createEmptyTasksDocument())).toThrow(NotFoundError);
    });
  });

  describe('undoStrike', () => {
    it('clears the flag but keeps the running strike total', () => {
      const undone = applyTaskAction(strikeToday(stateWith(makeTask())), { type: 'undoStrike', taskId: 'task-1' }, MORNING);

      expect(taskIn(undone)).toMatchObject({
        struckToday: false,
        struckDate: null,
        strikeReport: null,
        strikeCount: 1,
        dailyStrikes: { [TODAY]: 0 }
      });
      expect(taskIn(undone)?.history.map((entry) => entry.type)).toEqual(['strike_today', 'undo_strike']);
    });

    it('leaves the task struck while another strike from today remains', () => {
      const undone = applyTaskAction(
        strikeToday(strikeToday(stateWith(makeTask()))),
        { type: 'undoStrike', taskId: 'task-1' },
        MORNING
      );
      expect(taskIn(undone)).toMatchObject({ struckToday: true, dailyStrikes: { [TODAY]: 1 }, strikeCount: 2 });
    });

    it('rejects an undo with nothing struck today', () => {
      expect(() => applyTaskAction(stateWith(makeTask()), { type: 'undoStrike', taskId: 'task-1' }, MORNING)).toThrow(
        ValidationError
      );
    });
  });

  describe('schedule', () => {
    const scheduled = makeTask({ scheduledHour: '14:00', scheduledDate: TODAY, scheduledDuration: 60 });

    it('names the occupying task when slots overlap', () => {
      const state = stateWith(scheduled, makeTask({ id: 'task-2', title: 'Review budget' }));
      const error = (() => {
        try {
          applyTaskAction(state, { type: 'schedule', taskId: 'task-2', hour: '14:30', date: TODAY, duration: 30 }, MORNING);
        } catch (reason) {
          return reason;
        }
        return null;
      })();

      expect(error).toBeInstanceOf(SlotConflictError);
      expect(error).toMatchObject({ conflictingTaskId: 'task-1', conflictingTitle: 'Write report', hour: '14:00' });
    });

    it('allows back-to-back slots and the same hour on another day', () => {
      const state = stateWith(scheduled, makeTask({ id: 'task-2', title: 'Review budget' }));

      const adjacent = applyTaskAction(
        state,
        { type: 'schedule', taskId: 'task-2', hour: '15:00', date: TODAY, duration: 30 },
        MORNING
      );
      expect(taskIn(adjacent, 'task-2')).toMatchObject({ scheduledHour: '15:00', scheduledDuration: 30 });

      const otherDay = applyTaskAction(
        state,
        { type: 'schedule', taskId: 'task-2', hour: '14:00', date: '2026-03-11', duration: 60 },
        MORNING
      );
      expect(taskIn(otherDay, 'task-2')?.scheduledDate).toBe('2026-03-11');
    });

    it('does not let completed tasks hold a slot', () => {
      const state = stateWith({ ...scheduled, completed: true }, makeTask({ id: 'task-2' }));
      const next = applyTaskAction(
        state,
        { type: 'schedule', taskId: 'task-2', hour: '14:00', date: TODAY, duration: 60 },
        MORNING
      );
      expect(taskIn(next, 'task-2')?.scheduledHour).toBe('14:00');
    });

    it('rejects slots that run past midnight', () => {
      expect(() =>
        applyTaskAction(
          stateWith(makeTask()),
          { type: 'schedule', taskId: 'task-1', hour: '23:30', date: TODAY, duration: 60 },
          MORNING
        )
      ).toThrow(ValidationError);
    });

    it('unschedules and ignores tasks that hold no slot', () => {
      const state = stateWith(scheduled);
      const next = applyTaskAction(state, { type: 'unschedule', taskId: 'task-1' }, MORNING);
      expect(taskIn(next)).toMatchObject({ scheduledHour: null, scheduledDate: null, scheduledDuration: null });
      expect(applyTaskAction(next, { type: 'unschedule', taskId: 'task-1' }, MORNING)).toBe(next);
    });
  });

  describe('complete and uncomplete', () => {
    it('are idempotent', () => {
      const done = applyTaskAction(stateWith(makeTask()), { type: 'complete', taskId: 'task-1' }, MORNING);
      expect(taskIn(done)?.completed).toBe(true);
      expect(applyTaskAction(done, { type: 'complete', taskId: 'task-1' }, MORNING)).toBe(done);

      const reopened = applyTaskAction(done, { type: 'uncomplete', taskId: 'task-1' }, MORNING);
      expect(taskIn(reopened)).toMatchObject({ completed: false, completedAt: null });
      expect(applyTaskAction(reopened, { type: 'uncomplete', taskId: 'task-1' }, MORNING)).toBe(reopened);
    });
  });

  describe('clearStruckToday', () => {
    it('clears flags, keeps totals and forgets earlier days', () => {
      const state = stateWith(
        makeTask({
          struckToday: true,
          struckDate: '2026-03-09',
          strikeCount: 5,
          dailyStrikes: { '2026-03-09': 2, [TODAY]: 1 }
        })
      );
      const next = applyTaskAction(state, { type: 'clearStruckToday' }, MORNING);

      expect(next.lastDailyResetAt).toBe(MORNING.toISOString());
      expect(taskIn(next)).toMatchObject({
        struckToday: false,
        struckDate: null,
        strikeCount: 5,
        dailyStrikes: { [TODAY]: 1 }
      });
    });
  });

  it('applies edits and keeps other tasks untouched', () => {
    const other = makeTask({ id: 'task-2', title: 'Other' });
    const next = applyTaskAction(
      stateWith(makeTask(), other),
      { type: 'update', taskId: 'task-1', patch: { title: 'Final report' } },
      MORNING
    );
    expect(taskIn(next)).toMatchObject({ title: 'Final report', updatedAt: MORNING.toISOString() });
    expect(taskIn(next, 'task-2')).toBe(other);
  });
});
