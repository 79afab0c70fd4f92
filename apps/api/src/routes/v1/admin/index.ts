/**
 * Emergency controls
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { pauseRoute } from './pause.js';
import { rescueRoute } from './rescue.js';

const adminRoute = new Hono<AppBindings>();

adminRoute.route('/', pauseRoute);
adminRoute.route('/', rescueRoute);

export { adminRoute };
