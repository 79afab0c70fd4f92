/**
 * POST /v1/recycle/batch - Exchange several units in one call
 *
 * Item failures are reported per item; the response is 200 whenever the
 * batch itself was accepted.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { BatchRecycleRequestSchema } from '@recycler/types';
import { requireActor } from '../../../middleware/actor-context.js';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const batchRecycleRoute = new Hono<AppBindings>();

batchRecycleRoute.post(
  '/batch',
  zValidator('json', BatchRecycleRequestSchema, validationHook),
  async (c) => {
    const actor = requireActor(c);
    const { batch } = c.get('recycler');
    const { items } = c.req.valid('json');

    const outcome = await batch.recycleBatch({
      actor,
      classIds: items.map((item) => item.classId),
      unitIds: items.map((item) => item.unitId),
      useDestruction: items.map((item) => item.method === 'destruction'),
    });

    return c.json(outcome);
  }
);

export { batchRecycleRoute };
