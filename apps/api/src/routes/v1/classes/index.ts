/**
 * Asset class routes
 * Registry administration plus read-only class lookups
 */

import { Hono } from 'hono';
import type { AppBindings } from '../../../types/context.js';
import { listClassesRoute } from './list.js';
import { registerClassRoute } from './register.js';
import { updateClassRoute } from './update.js';

const classesRoute = new Hono<AppBindings>();

classesRoute.route('/', listClassesRoute);
classesRoute.route('/', registerClassRoute);
classesRoute.route('/', updateClassRoute);

export { classesRoute };
