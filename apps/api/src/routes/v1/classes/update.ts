/**
 * PATCH /v1/classes/:classId/rate - Change the points rate
 * PATCH /v1/classes/:classId/status - Accept or stop accepting a class
 * DELETE /v1/classes/:classId - Stop accepting a class
 *
 * Rate changes never touch records already in the ledger.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { SetClassStatusRequestSchema, UpdateRateRequestSchema } from '@recycler/types';
import { requireActor } from '../../../middleware/actor-context.js';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const updateClassRoute = new Hono<AppBindings>();

updateClassRoute.patch(
  '/:classId/rate',
  zValidator('json', UpdateRateRequestSchema, validationHook),
  async (c) => {
    const actor = requireActor(c);
    const { registry } = c.get('recycler');
    const { pointsPerUnit } = c.req.valid('json');

    const config = await registry.updateRate({
      actor,
      classId: c.req.param('classId'),
      pointsPerUnit,
    });
    return c.json({ class: config });
  }
);

updateClassRoute.patch(
  '/:classId/status',
  zValidator('json', SetClassStatusRequestSchema, validationHook),
  async (c) => {
    const actor = requireActor(c);
    const { registry } = c.get('recycler');
    const { active } = c.req.valid('json');

    const config = await registry.setActive({ actor, classId: c.req.param('classId'), active });
    return c.json({ class: config });
  }
);

updateClassRoute.delete('/:classId', async (c) => {
  const actor = requireActor(c);
  const { registry } = c.get('recycler');

  const config = await registry.deactivate({ actor, classId: c.req.param('classId') });
  return c.json({ class: config });
});

export { updateClassRoute };
