import { Hono } from 'hono';
import type { AppEnv, Variables } from './types';
import type { Services } from './container';
import type { Logger } from './logger';
import { feedbackRoute } from './routes/feedback';
import { plansRoute } from './routes/plans';
import { dailyRoute } from './routes/daily';
import { inboxRoute } from './routes/inbox';
import { jsonError, jsonOk } from './routes/helpers';
import { isServiceError } from './services/errors';

export type { Variables };

export const createApp = (services: Services, logger: Logger) => {
  const app = new Hono<AppEnv>();

  // Middleware to inject services - must be before routes
  app.use('*', async (c, next) => {
    c.set('services', services);
    c.set('logger', logger);
    await next();
  });

  app.get('/health', (c) => jsonOk(c, { status: 'ok', queue: services.queue.stats() }));
  app.route('/api/feedback', feedbackRoute);
  app.route('/api/plans', plansRoute);
  app.route('/api/daily', dailyRoute);
  app.route('/api/inbox', inboxRoute);

  app.notFound((c) => jsonError(c, 'NOT_FOUND', 'Route not found.', 404));

  app.onError((err, c) => {
    if (isServiceError(err)) {
      return jsonError(c, err.code, err.message, err.status);
    }
    logger.error('Server error', { method: c.req.method, path: c.req.path, error: err.message, stack: err.stack });
    return jsonError(c, 'INTERNAL_ERROR', 'Internal server error.', 500);
  });

  return app;
};
