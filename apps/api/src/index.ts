import { serve } from '@hono/node-server';
import { logger } from '@recycler/observability';
import { createApp } from './app.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { recyclerConfig, recyclingSystem } from './services/index.js';

const port = Number(process.env.PORT) || 3000;

// Initialize audit logging for recycler events
initializeAuditLogging();

logger.info(
  {
    port,
    adminId: recyclerConfig.adminId,
    custodyId: recyclerConfig.custodyId,
    maxPointsPerUnit: recyclerConfig.maxPointsPerUnit,
    seededClasses: recyclerConfig.classes.map((seed) => seed.classId),
  },
  'Starting server'
);

serve({
  fetch: createApp(recyclingSystem).fetch,
  port,
});

logger.info({ port }, 'Server running');
