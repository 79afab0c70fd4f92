import type { Context, Next } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppBindings } from '../types/context.js';

export const ACTOR_HEADER = 'x-actor-id';

/**
 * Attach the calling actor from the x-actor-id header.
 * Identity is opaque here; authentication happens upstream.
 */
export async function attachActor(c: Context<AppBindings>, next: Next) {
  const actor = c.req.header(ACTOR_HEADER)?.trim();
  c.set('actor', actor ? actor : null);
  await next();
}

/**
 * Actor for routes that act on someone's behalf
 *
 * @throws {HTTPException} 401 when the header is missing
 */
export function requireActor(c: Context<AppBindings>): string {
  const actor = c.get('actor');
  if (!actor) {
    throw new HTTPException(401, { message: `${ACTOR_HEADER} header is required` });
  }
  return actor;
}
