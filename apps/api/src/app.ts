import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { RecyclingSystem } from '@recycler/core';
import { logger } from '@recycler/observability';
import { toErrorResponse } from './lib/error-response.js';
import { attachActor } from './middleware/actor-context.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { adminRoute } from './routes/v1/admin/index.js';
import { classesRoute } from './routes/v1/classes/index.js';
import { healthRoute } from './routes/v1/health.js';
import { historyRoute } from './routes/v1/history.js';
import { recyclingRoute } from './routes/v1/recycle/index.js';
import { statsRoute } from './routes/v1/stats.js';
import type { AppBindings } from './types/context.js';

/**
 * Build the HTTP app around one recycling system
 */
export function createApp(system: RecyclingSystem) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    c.set('recycler', system);
    await next();
  });

  app.use('*', attachActor);

  app.onError((err, c) => {
    const requestId = c.get('requestId');

    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }

    const mapped = toErrorResponse(err);
    if (mapped) {
      logger.debug({ requestId, code: mapped.body.code }, 'Request rejected by recycler');
      return c.json(mapped.body, mapped.status);
    }

    logger.error({ err, requestId }, 'Unhandled API error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();

  v1.route('/classes', classesRoute);
  v1.route('/recycle', recyclingRoute);
  v1.route('/history', historyRoute);
  v1.route('/stats', statsRoute);
  v1.route('/admin', adminRoute);

  app.route('/v1', v1);

  return app;
}
