import { describe, it, expect } from 'vitest';
import { createMemoryRepository } from '../db/memoryRepository';
import { createServices } from '../container';
import { createSilentLogger } from '../logger';
import { createScriptedClient, noSleep, testConfig } from '../testing/fakes';

const PLAN = JSON.stringify({
  summary: 'Launch the portal',
  goals: ['Ship login'],
  roadmap_steps: [
    { step_number: 1, title: 'Auth', description: 'Build auth', estimated_duration: '1 week', dependencies: [] },
  ],
  milestones: [{ title: 'Beta', target_date: 'end of month 1', deliverables: ['Login'] }],
  risks: ['Scope creep'],
  next_steps: ['Draft login requirements'],
});

const setup = (...steps: Parameters<typeof createScriptedClient>) => {
  const repo = createMemoryRepository();
  repo.seedProject({ id: 'p1', name: 'Portal', description: 'Customer portal' });
  repo.seedTask({ id: 't1', projectId: 'p1', title: 'Login page', priority: 'high' });
  const { client, requests } = createScriptedClient(...steps);
  const services = createServices({ config: testConfig, repo, client, logger: createSilentLogger(), sleep: noSleep });
  return { repo, services, requests };
};

describe('planningService', () => {
  it('creates version 1 from the model output', async () => {
    const { services, requests } = setup(PLAN);

    const { plan, cached } = await services.planning.generatePlan('p1', { userId: 'u1' });

    expect(cached).toBe(false);
    expect(plan.versionNumber).toBe(1);
    expect(plan.createdBy).toBe('u1');
    expect(plan.content.summary).toBe('Launch the portal');
    expect(plan.content.milestones).toEqual([{ title: 'Beta', target_date: 'end of month 1', deliverables: ['Login'] }]);
    expect(requests[0].temperature).toBe(0.7);
    expect(requests[0].prompt).toContain('- Login page (priority: high, status: todo)');
  });

  it('returns the cached version without calling the model again', async () => {
    const { services, requests } = setup(PLAN);

    const first = await services.planning.generatePlan('p1');
    const second = await services.planning.generatePlan('p1');

    expect(second.cached).toBe(true);
    expect(second.plan.versionNumber).toBe(first.plan.versionNumber);
    expect(requests).toHaveLength(1);
  });

  it('shares one generation between concurrent cache-eligible calls', async () => {
    const { services, requests } = setup(PLAN);

    const [a, b] = await Promise.all([services.planning.generatePlan('p1'), services.planning.generatePlan('p1')]);

    expect(a.plan.versionNumber).toBe(1);
    expect(b.plan.versionNumber).toBe(1);
    expect(requests).toHaveLength(1);
  });

  it('appends N then N+1 on forced regeneration', async () => {
    const { services } = setup(PLAN);
    await services.planning.generatePlan('p1');

    const next = await services.planning.generatePlan('p1', { forceRegenerate: true });
    const after = await services.planning.generatePlan('p1', { forceRegenerate: true });

    expect([next.plan.versionNumber, after.plan.versionNumber]).toEqual([2, 3]);
    expect((await services.planning.listPlanVersions('p1')).map((item) => item.versionNumber)).toEqual([1, 2, 3]);
    expect((await services.planning.getLatestPlan('p1')).versionNumber).toBe(3);
  });

  it('keeps prose output as the plan summary', async () => {
    const { services } = setup('Start with authentication, then billing.');

    const { plan } = await services.planning.generatePlan('p1');

    expect(plan.content).toEqual({
      summary: 'Start with authentication, then billing.',
      goals: [],
      roadmap_steps: [],
      milestones: [],
      risks: [],
      next_steps: [],
    });
  });

  it('reports missing projects and plans', async () => {
    const { services, requests } = setup(PLAN);

    await expect(services.planning.generatePlan('missing')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(services.planning.getLatestPlan('p1')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(services.planning.listPlanVersions('missing')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    expect(requests).toHaveLength(0);
  });
});
