import type { Context } from 'hono';
import type { ZodError } from 'zod';

/**
 * zValidator hook returning 400 with the zod issues
 */
export function validationHook(
  result: { success: true } | { success: false; error: ZodError },
  c: Context
) {
  if (!result.success) {
    return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
  }
}
