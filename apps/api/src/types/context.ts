import type { RecyclingSystem } from '@recycler/core';

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  /** Value of the x-actor-id header, null when absent */
  actor: string | null;
  recycler: RecyclingSystem;
};

export type AppBindings = {
  Variables: ContextVariables;
};
