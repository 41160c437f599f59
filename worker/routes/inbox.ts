import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { jsonOk, onInvalid } from './helpers';
import { presentInboxItem } from './presenters';
import type { AppEnv } from '../types';

export const inboxRoute = new Hono<AppEnv>();

const captureSchema = z.object({
  user_id: z.string().min(1),
  content: z.string().min(1).max(10000),
  tags: z.array(z.string().min(1).max(50)).max(20).optional(),
});

inboxRoute.post('/', zValidator('json', captureSchema, onInvalid), async (c) => {
  const data = c.req.valid('json');
  const item = await c.get('services').inbox.captureItem({
    userId: data.user_id,
    content: data.content,
    tags: data.tags,
  });
  return jsonOk(c, presentInboxItem(item), 201);
});

inboxRoute.get('/:id', async (c) => {
  const item = await c.get('services').inbox.getInboxItem(c.req.param('id'));
  return jsonOk(c, presentInboxItem(item));
});
