import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { jsonOk, onInvalid } from './helpers';
import { presentFeedback, presentFeedbackResult } from './presenters';
import { FEEDBACK_STATUSES } from '../services/types';
import type { AppEnv } from '../types';

export const feedbackRoute = new Hono<AppEnv>();

const submitSchema = z.object({
  project_id: z.string().min(1),
  task_id: z.string().min(1).nullish(),
  user_name: z.string().max(200).nullish(),
  feedback_text: z.string().min(1).max(10000),
});

const listQuerySchema = z.object({
  projectId: z.string().min(1).optional(),
  taskId: z.string().min(1).optional(),
  status: z.enum(FEEDBACK_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

feedbackRoute.post('/', zValidator('json', submitSchema, onInvalid), async (c) => {
  const data = c.req.valid('json');
  const record = await c.get('services').feedback.submitFeedback({
    projectId: data.project_id,
    taskId: data.task_id ?? null,
    userName: data.user_name ?? null,
    feedbackText: data.feedback_text,
  });
  return jsonOk(c, { feedback_id: record.id, status: record.status }, 201);
});

feedbackRoute.get('/', zValidator('query', listQuerySchema, onInvalid), async (c) => {
  const filters = c.req.valid('query');
  const items = await c.get('services').feedback.listFeedback(filters);
  return jsonOk(c, items.map(presentFeedback));
});

feedbackRoute.get('/:id', async (c) => {
  const result = await c.get('services').feedback.getFeedback(c.req.param('id'));
  return jsonOk(c, presentFeedbackResult(result));
});
