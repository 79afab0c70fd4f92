import { recyclerEvents, type RecyclerEvent, type RecyclerEventEmitter } from '@recycler/core';
import { logger } from '@recycler/observability';

/**
 * Initialize audit logging for recycler events
 * Every registry change, exchange, pause toggle and rescue produces one log line
 *
 * @returns Unsubscribe function
 */
export function initializeAuditLogging(emitter: RecyclerEventEmitter = recyclerEvents) {
  const unsubscribe = emitter.on(handleRecyclerEvent);
  logger.info('Audit logging initialized for recycler events');
  return unsubscribe;
}

function handleRecyclerEvent(event: RecyclerEvent) {
  const { type, actor, timestamp, ...details } = event;

  const logEntry = {
    event: type,
    actor: actor || 'unknown',
    timestamp: timestamp.toISOString(),
    ...details,
  };

  switch (event.type) {
    case 'class.registered':
      logger.info(
        logEntry,
        event.reactivated ? 'Asset class reactivated' : 'Asset class registered'
      );
      break;

    case 'class.rate_updated':
      logger.info(logEntry, 'Asset class rate updated');
      break;

    case 'class.status_changed':
      logger.info(logEntry, 'Asset class status changed');
      break;

    case 'class.removed':
      logger.info(logEntry, 'Asset class removed');
      break;

    case 'recycling.completed':
      logger.info(logEntry, 'Unit recycled');
      break;

    case 'recycling.failed':
      logger.warn(logEntry, 'Batch item failed');
      break;

    case 'recycler.paused':
      logger.warn(logEntry, 'Recycling paused');
      break;

    case 'recycler.unpaused':
      logger.info(logEntry, 'Recycling resumed');
      break;

    case 'rescue.performed':
      logger.warn(logEntry, 'Emergency rescue performed');
      break;
  }
}
