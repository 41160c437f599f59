import { describe, it, expect } from 'vitest';
import { createMemoryRepository } from '../db/memoryRepository';
import { createServices } from '../container';
import { createSilentLogger } from '../logger';
import { createScriptedClient, noSleep, testConfig } from '../testing/fakes';
import { ServiceError } from './errors';

const setup = () => {
  const repo = createMemoryRepository();
  repo.seedProject({ id: 'p1', name: 'Portal' });
  repo.seedProject({ id: 'p2', name: 'Billing' });
  repo.seedTask({ id: 't1', projectId: 'p1', title: 'Login page' });
  repo.seedTask({ id: 't2', projectId: 'p2', title: 'Invoices' });
  const { client, requests } = createScriptedClient('{"summary": "Noted", "adjustments": []}');
  const services = createServices({ config: testConfig, repo, client, logger: createSilentLogger(), sleep: noSleep });
  return { repo, services, requests };
};

describe('feedbackService', () => {
  it('stores pending feedback and processes it in the background', async () => {
    const { services } = setup();

    const record = await services.feedback.submitFeedback({
      projectId: 'p1',
      taskId: 't1',
      userName: 'Ana',
      feedbackText: '  The login flow is confusing  ',
    });

    expect(record.status).toBe('pending');
    expect(record.feedbackText).toBe('The login flow is confusing');

    await services.queue.onIdle();
    const result = await services.feedback.getFeedback(record.id);
    expect(result.status).toBe('completed');
    expect(result.summary).toBe('Noted');
    expect(result.adjustments).toEqual([]);
  });

  it('fails the stored item when the queue no longer accepts work', async () => {
    const { services } = setup();
    await services.queue.close();

    await expect(
      services.feedback.submitFeedback({ projectId: 'p1', feedbackText: 'Late submission' })
    ).rejects.toMatchObject({ code: 'UNAVAILABLE', status: 503 });

    const [stored] = await services.feedback.listFeedback({});
    expect(stored).toMatchObject({ feedbackText: 'Late submission', status: 'failed' });
  });

  it('rejects a task from another project before any model work', async () => {
    const { services, requests } = setup();

    await expect(
      services.feedback.submitFeedback({ projectId: 'p1', taskId: 't2', feedbackText: 'Wrong project' })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', status: 400 });
    await services.queue.onIdle();
    expect(requests).toHaveLength(0);
    expect(await services.feedback.listFeedback({})).toEqual([]);
  });

  it('rejects unknown projects and blank text', async () => {
    const { services } = setup();

    await expect(services.feedback.submitFeedback({ projectId: 'nope', feedbackText: 'Hi' })).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
    await expect(services.feedback.submitFeedback({ projectId: 'p1', feedbackText: '   ' })).rejects.toBeInstanceOf(
      ServiceError
    );
  });

  it('hides adjustments until the item has completed', async () => {
    const { repo, services } = setup();
    const record = await repo.createFeedback({
      projectId: 'p1',
      taskId: null,
      userName: null,
      feedbackText: 'Queued',
      createdAt: 1,
    });
    await repo.claimFeedback(record.id);
    await repo.completeFeedback(
      record.id,
      {
        summary: 's',
        adjustments: [
          {
            adjustmentType: 'general',
            taskId: null,
            description: 'd',
            originalValue: null,
            newValue: null,
            reasoning: null,
          },
        ],
      },
      2
    );

    expect((await services.feedback.getFeedback(record.id)).adjustments).toHaveLength(1);

    const other = await repo.createFeedback({
      projectId: 'p1',
      taskId: null,
      userName: null,
      feedbackText: 'Still pending',
      createdAt: 3,
    });
    expect((await services.feedback.getFeedback(other.id)).adjustments).toEqual([]);
  });

  it('lists feedback newest first with filters', async () => {
    const { repo, services } = setup();
    await repo.createFeedback({ projectId: 'p1', taskId: null, userName: null, feedbackText: 'a', createdAt: 1 });
    await repo.createFeedback({ projectId: 'p1', taskId: null, userName: null, feedbackText: 'b', createdAt: 2 });
    await repo.createFeedback({ projectId: 'p2', taskId: null, userName: null, feedbackText: 'c', createdAt: 3 });

    const listed = await services.feedback.listFeedback({ projectId: 'p1', status: 'pending' });

    expect(listed.map((item) => item.feedbackText)).toEqual(['b', 'a']);
  });
});
