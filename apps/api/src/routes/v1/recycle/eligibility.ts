/**
 * GET /v1/recycle/eligibility - Whether the caller could recycle a unit now
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { EligibilityQuerySchema } from '@recycler/types';
import { requireActor } from '../../../middleware/actor-context.js';
import { validationHook } from '../../../lib/validation.js';
import type { AppBindings } from '../../../types/context.js';

const eligibilityRoute = new Hono<AppBindings>();

eligibilityRoute.get(
  '/eligibility',
  zValidator('query', EligibilityQuerySchema, validationHook),
  async (c) => {
    const actor = requireActor(c);
    const { queries } = c.get('recycler');
    const { classId, unitId } = c.req.valid('query');

    const eligibility = await queries.canRecycle(actor, classId, unitId);
    return c.json(eligibility);
  }
);

export { eligibilityRoute };
