/**
 * POST /v1/recycle - Exchange one unit for points
 *
 * method 'destruction' burns the unit; 'transfer' moves it into custody.
 * Returns the ledger record that was appended.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { RecycleRequestSchema } from '@recycler/types';
import { requireActor } from '../../../middleware/actor-context.js';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const recycleRoute = new Hono<AppBindings>();

recycleRoute.post('/', zValidator('json', RecycleRequestSchema, validationHook), async (c) => {
  const actor = requireActor(c);
  const { processor } = c.get('recycler');
  const { classId, unitId, method } = c.req.valid('json');

  const record =
    method === 'destruction'
      ? await processor.recycleByDestruction({ actor, classId, unitId })
      : await processor.recycleByTransfer({ actor, classId, unitId });

  return c.json({ record }, 201);
});

export { recycleRoute };
