import { describe, it, expect } from 'vitest';
import { createMemoryRepository } from '../db/memoryRepository';
import { createServices, type ServiceConfig } from '../container';
import { createSilentLogger } from '../logger';
import { createScriptedClient, noSleep, testConfig } from '../testing/fakes';
import type { ModelRequest } from '../llm/types';

const PLAN = '{"summary": "Plan", "goals": [], "roadmap_steps": [], "milestones": [], "risks": [], "next_steps": []}';

/** Classification replies for inbox prompts, plan replies for everything else. */
const byPurpose = (classification: string) => (request: ModelRequest) =>
  request.prompt.startsWith('Analyze the following inbox item') ? classification : PLAN;

const setup = (classification: string, config: ServiceConfig = testConfig) => {
  const repo = createMemoryRepository();
  const { client, requests } = createScriptedClient(byPurpose(classification));
  const services = createServices({ config, repo, client, logger: createSilentLogger(), sleep: noSleep });
  return { repo, services, requests };
};

describe('inboxService', () => {
  it('fails the captured item when the queue no longer accepts work', async () => {
    const { services, requests } = setup('{"action": "no_action"}');
    await services.queue.close();

    await expect(services.inbox.captureItem({ userId: 'u1', content: 'Call the plumber' })).rejects.toMatchObject({
      code: 'UNAVAILABLE',
      status: 503,
    });
    expect(requests).toHaveLength(0);
  });

  it('creates a project and queues its first plan', async () => {
    const { repo, services } = setup(
      '{"action": "create_project", "project_name": "Garden", "project_description": "Spring planting", "reasoning": "Big goal"}'
    );

    const item = await services.inbox.captureItem({ userId: 'u1', content: 'Plan the spring garden', tags: ['home'] });
    expect(item.status).toBe('unprocessed');
    await services.queue.onIdle();

    const processed = await services.inbox.getInboxItem(item.id);
    expect(processed.status).toBe('processed');
    expect(processed.classification?.action).toBe('create_project');
    expect(processed.taskId).toBeNull();
    const projectId = processed.projectId;
    expect(projectId).not.toBeNull();
    if (!projectId) return;

    expect(await repo.getProject(projectId)).toMatchObject({ name: 'Garden', ownerId: 'u1' });
    expect((await repo.getLatestPlanVersion(projectId))?.versionNumber).toBe(1);
  });

  it('skips plan generation when auto-planning is off', async () => {
    const { repo, services, requests } = setup('{"action": "create_project", "project_name": "Garden"}', {
      ...testConfig,
      autoPlanOnProjectCreate: false,
    });

    const item = await services.inbox.captureItem({ userId: 'u1', content: 'Garden' });
    await services.queue.onIdle();

    const processed = await services.inbox.getInboxItem(item.id);
    expect(requests).toHaveLength(1);
    expect(processed.projectId && (await repo.listPlanVersions(processed.projectId))).toEqual([]);
  });

  it('creates a task assigned to the user under a new project', async () => {
    const { repo, services } = setup(
      '{"action": "create_task", "project_name": "Home", "task_title": "Fix sink", "task_priority": 9}'
    );

    const item = await services.inbox.captureItem({ userId: 'u1', content: 'Sink is leaking' });
    await services.queue.onIdle();

    const processed = await services.inbox.getInboxItem(item.id);
    expect(processed.taskId).not.toBeNull();
    const task = processed.taskId ? await repo.getTask(processed.taskId) : null;
    expect(task).toMatchObject({ title: 'Fix sink', priority: 'urgent', assigneeId: 'u1', projectId: processed.projectId });
  });

  it('records no_action for plain notes', async () => {
    const { services } = setup('This is just a note to self.');

    const item = await services.inbox.captureItem({ userId: 'u1', content: 'Remember the milk' });
    await services.queue.onIdle();

    const processed = await services.inbox.getInboxItem(item.id);
    expect(processed.status).toBe('processed');
    expect(processed.classification?.action).toBe('no_action');
    expect(processed.projectId).toBeNull();
  });

  it('marks the item failed when the model never answers', async () => {
    const repo = createMemoryRepository();
    const { client } = createScriptedClient(new Error('connection reset'));
    const services = createServices({ config: testConfig, repo, client, logger: createSilentLogger(), sleep: noSleep });

    const item = await services.inbox.captureItem({ userId: 'u1', content: 'Anything' });
    await services.queue.onIdle();

    expect((await services.inbox.getInboxItem(item.id)).status).toBe('failed');
    expect(await services.inbox.processInboxItem(item.id)).toEqual({ status: 'skipped', inboxItemId: item.id });
  });

  it('rejects empty content and unknown ids', async () => {
    const { services } = setup('{}');

    await expect(services.inbox.captureItem({ userId: 'u1', content: '  ' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
    });
    await expect(services.inbox.getInboxItem('missing')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});
