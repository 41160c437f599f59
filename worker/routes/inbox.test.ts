import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../testing/app';

const captured = z.object({ data: z.object({ id: z.string() }) });

describe('inboxRoute', () => {
  it('captures an item and exposes its classification', async () => {
    const { app, post, services } = buildTestApp('{"action": "no_action", "reasoning": "Just a thought"}');

    const res = await post('/api/inbox', { user_id: 'u1', content: 'Maybe learn Go someday', tags: ['ideas'] });
    const body = await res.json();

    expect(res.status).toBe(201);
    expect(body).toMatchObject({ data: { status: 'unprocessed', tags: ['ideas'], classification: null } });
    const { id } = captured.parse(body).data;

    await services.queue.onIdle();
    const item = await app.request(`/api/inbox/${id}`);

    expect(await item.json()).toMatchObject({
      data: {
        status: 'processed',
        classification: { action: 'no_action', reasoning: 'Just a thought' },
        project_id: null,
      },
    });
  });

  it('validates input', async () => {
    const { post } = buildTestApp('{}');

    expect((await post('/api/inbox', { user_id: 'u1' })).status).toBe(400);
  });

  it('answers unknown routes with the error envelope', async () => {
    const { app } = buildTestApp('{}');

    const res = await app.request('/api/nowhere');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: { code: 'NOT_FOUND', message: 'Route not found.' } });
  });
});
