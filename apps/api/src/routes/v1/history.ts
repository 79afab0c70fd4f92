/**
 * GET /v1/history/actors/:actor - Records created by an actor
 * GET /v1/history/classes/:classId - Records for one asset class
 *
 * Both accept offset/limit paging; total is the unpaged count.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { HistoryQuerySchema } from '@recycler/types';
import { validationHook } from '../../lib/validation.js';
import type { AppBindings } from '../../types/context.js';

const historyRoute = new Hono<AppBindings>();

historyRoute.get(
  '/actors/:actor',
  zValidator('query', HistoryQuerySchema, validationHook),
  (c) => {
    const { queries } = c.get('recycler');
    const actor = c.req.param('actor');
    const page = c.req.valid('query');

    return c.json({
      actor,
      total: queries.getActorRecyclingCount(actor),
      records: queries.getHistoryForActor(actor, page),
    });
  }
);

historyRoute.get(
  '/classes/:classId',
  zValidator('query', HistoryQuerySchema, validationHook),
  (c) => {
    const { queries } = c.get('recycler');
    const classId = c.req.param('classId');
    const page = c.req.valid('query');

    return c.json({
      classId,
      total: queries.getClassRecyclingCount(classId),
      records: queries.getHistoryForClass(classId, page),
    });
  }
);

export { historyRoute };
