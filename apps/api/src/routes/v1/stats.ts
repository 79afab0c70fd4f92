import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const statsRoute = new Hono<AppBindings>();

statsRoute.get('/', (c) => {
  const { queries } = c.get('recycler');
  return c.json({ ...queries.getStats(), historySize: queries.getHistorySize() });
});

export { statsRoute };
