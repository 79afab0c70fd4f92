/**
 * GET /v1/admin/status - Current pause state and when it last changed
 * POST /v1/admin/pause - Halt all recycling
 * POST /v1/admin/unpause - Resume recycling
 *
 * Registry administration and queries stay available while paused.
 */

import { Hono } from 'hono';
import { requireActor } from '../../../middleware/actor-context.js';
import type { AppBindings } from '../../../types/context.js';

const pauseRoute = new Hono<AppBindings>();

pauseRoute.get('/status', (c) => {
  const { control } = c.get('recycler');
  return c.json(control.getStatus());
});

pauseRoute.post('/pause', async (c) => {
  const actor = requireActor(c);
  const { control } = c.get('recycler');

  await control.pause(actor);
  return c.json({ paused: control.isPaused() });
});

pauseRoute.post('/unpause', async (c) => {
  const actor = requireActor(c);
  const { control } = c.get('recycler');

  await control.unpause(actor);
  return c.json({ paused: control.isPaused() });
});

export { pauseRoute };
