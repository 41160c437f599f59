import { describe, it, expect } from 'vitest';
import { formatSummaryText, markSummaryCompleted, scoreTask, selectTopTasks } from './taskScoring';
import type { TaskRecord } from './types';

const AS_OF = '2026-10-18';
const AS_OF_MS = Date.parse('2026-10-18T09:00:00.000Z');

const task = (overrides: Partial<TaskRecord> & Pick<TaskRecord, 'id'>): TaskRecord => ({
  projectId: 'p1',
  title: `Task ${overrides.id}`,
  description: null,
  status: 'todo',
  priority: 'medium',
  estimatedHours: null,
  dueDate: null,
  assigneeId: 'u1',
  createdAt: AS_OF_MS,
  completedAt: null,
  updatedAt: AS_OF_MS,
  ...overrides,
});

describe('scoreTask', () => {
  it('scores the urgent in-progress task due today at 95 and the low task due in 10 days at 20', () => {
    const t1 = task({ id: 't1', priority: 'urgent', status: 'in_progress', dueDate: '2026-10-18' });
    const t2 = task({ id: 't2', priority: 'low', status: 'todo', dueDate: '2026-10-28' });

    expect(scoreTask(t1, AS_OF)).toBe(95);
    expect(scoreTask(t2, AS_OF)).toBe(20);
  });

  it('ranks overdue above due today above due in two days', () => {
    const overdue = scoreTask(task({ id: 'a', dueDate: '2026-10-17' }), AS_OF);
    const today = scoreTask(task({ id: 'b', dueDate: '2026-10-18' }), AS_OF);
    const soon = scoreTask(task({ id: 'c', dueDate: '2026-10-20' }), AS_OF);

    expect(overdue).toBeGreaterThan(today);
    expect(today).toBeGreaterThan(soon);
  });

  it('applies the due-date bands by whole days', () => {
    const scoreDue = (dueDate: string) => scoreTask(task({ id: 'x', priority: 'low', dueDate }), AS_OF);

    expect(scoreDue('2026-10-21')).toBe(40);
    expect(scoreDue('2026-10-22')).toBe(30);
    expect(scoreDue('2026-10-25')).toBe(30);
    expect(scoreDue('2026-10-26')).toBe(20);
    expect(scoreDue('2026-11-01')).toBe(20);
    expect(scoreDue('2026-11-02')).toBe(10);
  });

  it('adds the age bonus from thirty days on', () => {
    const created = (date: string) => Date.parse(`${date}T12:00:00.000Z`);

    expect(scoreTask(task({ id: 'old', createdAt: created('2026-09-18') }), AS_OF)).toBe(25);
    expect(scoreTask(task({ id: 'new', createdAt: created('2026-09-19') }), AS_OF)).toBe(20);
  });

  it('is deterministic for identical inputs', () => {
    const input = task({ id: 'same', priority: 'high', status: 'in_progress', dueDate: '2026-10-19' });
    expect(scoreTask(input, AS_OF)).toBe(scoreTask({ ...input }, AS_OF));
  });
});

describe('selectTopTasks', () => {
  it('returns at most three open tasks in score order', () => {
    const pool = [
      task({ id: 'low', priority: 'low' }),
      task({ id: 'done', priority: 'urgent', status: 'completed' }),
      task({ id: 'blocked', priority: 'urgent', status: 'blocked' }),
      task({ id: 'high', priority: 'high' }),
      task({ id: 'urgent', priority: 'urgent' }),
      task({ id: 'medium', priority: 'medium' }),
    ];

    const selected = selectTopTasks(pool, AS_OF);

    expect(selected.map((item) => item.task.id)).toEqual(['urgent', 'high', 'medium']);
    expect(selected.map((item) => item.score)).toEqual([40, 30, 20]);
  });

  it('breaks ties on due date and then id', () => {
    const pool = [
      task({ id: 'b', priority: 'high' }),
      task({ id: 'a', priority: 'high' }),
      task({ id: 'z', priority: 'medium', dueDate: '2026-11-20' }),
      task({ id: 'y', priority: 'medium', dueDate: '2026-11-10' }),
    ];
    // a and b tie at 30, y and z tie at 20
    const selected = selectTopTasks(pool, AS_OF, 4);

    expect(selected.map((item) => item.task.id)).toEqual(['a', 'b', 'y', 'z']);
  });

  it('orders equal scores by earlier due date ahead of undated tasks', () => {
    const pool = [
      task({ id: 'undated', priority: 'high' }),
      task({ id: 'dated', priority: 'high', dueDate: '2026-12-31' }),
    ];

    expect(selectTopTasks(pool, AS_OF).map((item) => item.task.id)).toEqual(['dated', 'undated']);
  });
});

describe('formatSummaryText', () => {
  it('marks priority and due state', () => {
    expect(formatSummaryText(task({ id: '1', title: 'Ship', priority: 'urgent', dueDate: '2026-10-18' }), 1, AS_OF)).toBe(
      '#1 🔥 Ship (DUE TODAY)'
    );
    expect(formatSummaryText(task({ id: '2', title: 'Fix', priority: 'high', dueDate: '2026-10-15' }), 2, AS_OF)).toBe(
      '#2 ⚡ Fix (OVERDUE by 3 days)'
    );
    expect(formatSummaryText(task({ id: '3', title: 'Plan', priority: 'low', dueDate: '2026-10-20' }), 3, AS_OF)).toBe(
      '#3 💡 Plan (Due in 2 days)'
    );
    expect(formatSummaryText(task({ id: '4', title: 'Later', dueDate: '2026-10-28' }), 1, AS_OF)).toBe('#1 📌 Later');
  });

  it('appends the completion marker once', () => {
    const done = markSummaryCompleted('#1 🔥 Ship (DUE TODAY)');
    expect(done).toBe('#1 🔥 Ship (DUE TODAY) - ✅ COMPLETED');
    expect(markSummaryCompleted(done)).toBe(done);
  });

  it('keeps hyphenated titles whole when marking completion', () => {
    expect(markSummaryCompleted('#1 🔥 Fix login - mobile (DUE TODAY)')).toBe(
      '#1 🔥 Fix login - mobile (DUE TODAY) - ✅ COMPLETED'
    );
  });
});
