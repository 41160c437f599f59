import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { jsonOk, onInvalid } from './helpers';
import { presentDailyPlan, presentDailySummary, presentTask } from './presenters';
import type { AppEnv } from '../types';

export const dailyRoute = new Hono<AppEnv>();

const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const generateSchema = z.object({
  user_id: z.string().min(1),
  date: dateKey.optional(),
  regenerate: z.boolean().default(false),
});

const completeSchema = z.object({
  task_id: z.string().min(1),
  user_id: z.string().min(1),
  hours_worked: z.number().min(0).max(24).nullish(),
  date: dateKey.optional(),
});

const summaryQuerySchema = z.object({
  date: dateKey.optional(),
});

const userParamSchema = z.object({
  userId: z.string().min(1),
});

dailyRoute.get('/today/:userId', async (c) => {
  const plan = await c.get('services').daily.getTodayPlan(c.req.param('userId'));
  return jsonOk(c, presentDailyPlan(plan));
});

dailyRoute.post('/generate', zValidator('json', generateSchema, onInvalid), async (c) => {
  const data = c.req.valid('json');
  const plan = await c.get('services').daily.generateDailyPlan(data.user_id, data.date, {
    regenerate: data.regenerate,
  });
  return jsonOk(c, presentDailyPlan(plan));
});

dailyRoute.post('/tasks/complete', zValidator('json', completeSchema, onInvalid), async (c) => {
  const data = c.req.valid('json');
  const { task, summary } = await c.get('services').daily.markTaskComplete(
    data.task_id,
    data.user_id,
    data.hours_worked,
    data.date
  );
  return jsonOk(c, { task: presentTask(task), summary: summary && presentDailySummary(summary) });
});

dailyRoute.get(
  '/summary/:userId',
  zValidator('param', userParamSchema, onInvalid),
  zValidator('query', summaryQuerySchema, onInvalid),
  async (c) => {
    const { userId } = c.req.valid('param');
    const { date } = c.req.valid('query');
    const summary = await c.get('services').daily.getPlanSummary(userId, date);
    return jsonOk(c, summary);
  }
);
