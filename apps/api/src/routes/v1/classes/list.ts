/**
 * GET /v1/classes - List registered asset classes
 * GET /v1/classes/:classId - Get one class configuration
 * GET /v1/classes/:classId/points - Quote points for a quantity of units
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { PointsQuerySchema } from '@recycler/types';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const listClassesRoute = new Hono<AppBindings>();

listClassesRoute.get('/', (c) => {
  const { registry } = c.get('recycler');
  return c.json({ classes: registry.listClasses() });
});

listClassesRoute.get('/:classId', (c) => {
  const { queries } = c.get('recycler');
  const config = queries.getClassConfig(c.req.param('classId'));

  if (!config) {
    return c.json({ error: 'Asset class not found' }, 404);
  }

  return c.json({ class: config });
});

listClassesRoute.get(
  '/:classId/points',
  zValidator('query', PointsQuerySchema, validationHook),
  (c) => {
    const { queries } = c.get('recycler');
    const classId = c.req.param('classId');
    const { quantity } = c.req.valid('query');

    const points = queries.calculatePoints(classId, quantity);
    return c.json({ classId, quantity, points });
  }
);

export { listClassesRoute };
