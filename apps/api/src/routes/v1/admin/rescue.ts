/**
 * POST /v1/admin/rescue - Move a unit out of custody
 *
 * Works whether or not recycling is paused.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { RescueRequestSchema } from '@recycler/types';
import { requireActor } from '../../../middleware/actor-context.js';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const rescueRoute = new Hono<AppBindings>();

rescueRoute.post('/rescue', zValidator('json', RescueRequestSchema, validationHook), async (c) => {
  const actor = requireActor(c);
  const { control } = c.get('recycler');
  const { classId, unitId, to } = c.req.valid('json');

  await control.emergencyRescue({ actor, classId, unitId, to });
  return c.json({ rescued: { classId, unitId, to } });
});

export { rescueRoute };
