/**
 * POST /v1/classes - Register (or reactivate) an asset class
 *
 * Admin only. Domain errors are mapped by the app error handler.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { RegisterClassRequestSchema } from '@recycler/types';
import { requireActor } from '../../../middleware/actor-context.js';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const registerClassRoute = new Hono<AppBindings>();

registerClassRoute.post(
  '/',
  zValidator('json', RegisterClassRequestSchema, validationHook),
  async (c) => {
    const actor = requireActor(c);
    const { registry } = c.get('recycler');
    const { classId, pointsPerUnit } = c.req.valid('json');

    const config = await registry.register({ actor, classId, pointsPerUnit });
    return c.json({ class: config }, 201);
  }
);

export { registerClassRoute };
