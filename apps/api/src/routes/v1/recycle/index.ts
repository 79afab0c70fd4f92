/**
 * Recycling routes
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { batchRecycleRoute } from './batch.js';
import { eligibilityRoute } from './eligibility.js';
import { recycleRoute } from './single.js';

const recyclingRoute = new Hono<AppBindings>();

recyclingRoute.route('/', recycleRoute);
recyclingRoute.route('/', batchRecycleRoute);
recyclingRoute.route('/', eligibilityRoute);

export { recyclingRoute };
