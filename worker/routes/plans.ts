import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { jsonOk, onInvalid } from './helpers';
import { presentPlanVersion } from './presenters';
import type { AppEnv } from '../types';

export const plansRoute = new Hono<AppEnv>();

const generateSchema = z.object({
  project_id: z.string().min(1),
  user_id: z.string().min(1).nullish(),
  force_regenerate: z.boolean().default(false),
});

plansRoute.post('/generate', zValidator('json', generateSchema, onInvalid), async (c) => {
  const data = c.req.valid('json');
  const { plan, cached } = await c.get('services').planning.generatePlan(data.project_id, {
    forceRegenerate: data.force_regenerate,
    userId: data.user_id ?? null,
  });
  return jsonOk(c, { ...presentPlanVersion(plan), cached }, cached ? 200 : 201);
});

plansRoute.get('/projects/:id/latest', async (c) => {
  const plan = await c.get('services').planning.getLatestPlan(c.req.param('id'));
  return jsonOk(c, presentPlanVersion(plan));
});

plansRoute.get('/projects/:id/versions', async (c) => {
  const versions = await c.get('services').planning.listPlanVersions(c.req.param('id'));
  return jsonOk(c, versions.map(presentPlanVersion));
});
