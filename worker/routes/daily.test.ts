import { describe, it, expect } from 'vitest';
import { buildTestApp, TEST_NOW } from '../testing/app';

const setup = () => {
  const ctx = buildTestApp('{}');
  ctx.repo.seedProject({ id: 'p', name: 'P' });
  ctx.repo.seedTask({
    id: 't1',
    projectId: 'p',
    title: 'Release notes',
    priority: 'urgent',
    status: 'in_progress',
    dueDate: '2026-10-18',
    assigneeId: 'u',
    createdAt: TEST_NOW,
  });
  ctx.repo.seedTask({
    id: 't2',
    projectId: 'p',
    title: 'Refactor',
    priority: 'low',
    dueDate: '2026-10-28',
    assigneeId: 'u',
    createdAt: TEST_NOW,
  });
  return ctx;
};

describe('dailyRoute', () => {
  it("builds today's plan on first read", async () => {
    const { app } = setup();

    const res = await app.request('/api/daily/today/u');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        user_id: 'u',
        date: '2026-10-18',
        summaries: [
          { rank: 1, task_id: 't1', summary_text: '#1 🔥 Release notes (DUE TODAY)', completed: false },
          { rank: 2, task_id: 't2', summary_text: '#2 💡 Refactor', completed: false },
        ],
      },
    });
  });

  it('completes a task and reports it in the summary', async () => {
    const { app, post } = setup();
    await post('/api/daily/generate', { user_id: 'u', date: '2026-10-18' });

    const done = await post('/api/daily/tasks/complete', { task_id: 't1', user_id: 'u', hours_worked: 3 });
    expect(done.status).toBe(200);
    expect(await done.json()).toMatchObject({
      data: { task: { id: 't1', status: 'completed' }, summary: { completed: true, hours_worked: 3 } },
    });

    const summary = await app.request('/api/daily/summary/u?date=2026-10-18');
    expect(await summary.json()).toEqual({
      success: true,
      data: {
        date: '2026-10-18',
        total_tasks: 2,
        completed_tasks: 1,
        completion_rate: 50,
        total_hours_worked: 3,
        summaries: [
          {
            rank: 1,
            task_id: 't1',
            summary_text: '#1 🔥 Release notes (DUE TODAY) - ✅ COMPLETED',
            completed: true,
            hours_worked: 3,
          },
          { rank: 2, task_id: 't2', summary_text: '#2 💡 Refactor', completed: false, hours_worked: null },
        ],
      },
    });
  });

  it('summarises a day without a plan as empty', async () => {
    const { app } = setup();

    const res = await app.request('/api/daily/summary/nobody?date=2026-10-18');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      data: {
        date: '2026-10-18',
        total_tasks: 0,
        completed_tasks: 0,
        completion_rate: 0,
        total_hours_worked: 0,
        summaries: [],
      },
    });
  });

  it('rejects negative hours and bad dates', async () => {
    const { app, post } = setup();

    expect((await post('/api/daily/tasks/complete', { task_id: 't1', user_id: 'u', hours_worked: -1 })).status).toBe(
      400
    );
    expect((await post('/api/daily/generate', { user_id: 'u', date: '18/10/2026' })).status).toBe(400);
    expect((await app.request('/api/daily/summary/u?date=2026-13-01')).status).toBe(400);
  });

  it('regenerates on request', async () => {
    const { repo, post } = setup();
    await post('/api/daily/generate', { user_id: 'u' });
    repo.seedTask({ id: 't3', projectId: 'p', title: 'Hotfix', priority: 'high', assigneeId: 'u', createdAt: TEST_NOW });

    const res = await post('/api/daily/generate', { user_id: 'u', regenerate: true });

    expect(await res.json()).toMatchObject({
      data: { summaries: [{ task_id: 't1' }, { task_id: 't3' }, { task_id: 't2' }] },
    });
  });
});
