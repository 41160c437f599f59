import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../testing/app';

const PLAN = JSON.stringify({
  summary: 'Two-phase rollout',
  goals: ['Pilot', 'General availability'],
  roadmap_steps: [
    { step_number: 1, title: 'Pilot', description: 'Ten users', estimated_duration: '2 weeks', dependencies: [] },
    { step_number: 2, title: 'GA', description: 'Everyone', estimated_duration: '1 month', dependencies: [1] },
  ],
  milestones: [{ title: 'Pilot done', target_date: 'week 2', deliverables: ['Pilot report'] }],
  risks: ['Low adoption'],
  next_steps: ['Pick pilot users'],
});

const setup = () => {
  const ctx = buildTestApp(PLAN);
  ctx.repo.seedProject({ id: 'p1', name: 'Rollout' });
  return ctx;
};

describe('plansRoute', () => {
  it('generates a plan with the stable content schema', async () => {
    const { post } = setup();

    const res = await post('/api/plans/generate', { project_id: 'p1', user_id: 'u1' });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      success: true,
      data: {
        project_id: 'p1',
        version_number: 1,
        created_by: 'u1',
        cached: false,
        content: JSON.parse(PLAN),
      },
    });
  });

  it('serves the cached version and then increments on force', async () => {
    const { app, post, requests } = setup();
    await post('/api/plans/generate', { project_id: 'p1' });

    const cached = await post('/api/plans/generate', { project_id: 'p1', force_regenerate: false });
    expect(cached.status).toBe(200);
    expect(await cached.json()).toMatchObject({ data: { version_number: 1, cached: true } });
    expect(requests).toHaveLength(1);

    const forced = await post('/api/plans/generate', { project_id: 'p1', force_regenerate: true });
    expect(await forced.json()).toMatchObject({ data: { version_number: 2, cached: false } });

    const latest = await app.request('/api/plans/projects/p1/latest');
    expect(await latest.json()).toMatchObject({ data: { version_number: 2 } });

    const versions = await app.request('/api/plans/projects/p1/versions');
    expect(await versions.json()).toMatchObject({ data: [{ version_number: 1 }, { version_number: 2 }] });
  });

  it('returns 404 for unknown projects', async () => {
    const { post, app } = setup();

    expect((await post('/api/plans/generate', { project_id: 'nope' })).status).toBe(404);
    expect((await app.request('/api/plans/projects/nope/versions')).status).toBe(404);
    expect((await app.request('/api/plans/projects/p1/latest')).status).toBe(404);
  });
});
