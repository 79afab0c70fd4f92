/**
 * Recycler event emitter for audit logging and monitoring
 * Events are fire-and-forget so handlers never block or fail an exchange
 */

import { logger } from '@recycler/observability';
import type { RecyclingMethod } from '../ledger/ledger-types.js';

export type RecyclerEventType =
  | 'class.registered'
  | 'class.rate_updated'
  | 'class.status_changed'
  | 'class.removed'
  | 'recycling.completed'
  | 'recycling.failed'
  | 'recycler.paused'
  | 'recycler.unpaused'
  | 'rescue.performed';

interface BaseRecyclerEvent {
  type: RecyclerEventType;
  actor: string;
  timestamp: Date;
}

export interface ClassRegisteredEvent extends BaseRecyclerEvent {
  type: 'class.registered';
  classId: string;
  pointsPerUnit: number;
  reactivated: boolean;
}

export interface ClassRateUpdatedEvent extends BaseRecyclerEvent {
  type: 'class.rate_updated';
  classId: string;
  previousPointsPerUnit: number;
  pointsPerUnit: number;
}

export interface ClassStatusChangedEvent extends BaseRecyclerEvent {
  type: 'class.status_changed';
  classId: string;
  active: boolean;
}

export interface ClassRemovedEvent extends BaseRecyclerEvent {
  type: 'class.removed';
  classId: string;
}

/**
 * Emitted once per committed ledger record
 */
export interface RecyclingCompletedEvent extends BaseRecyclerEvent {
  type: 'recycling.completed';
  classId: string;
  unitId: string;
  points: number;
  method: RecyclingMethod;
  sequenceNumber: number;
}

/**
 * Emitted for each batch item that did not complete
 */
export interface RecyclingFailedEvent extends BaseRecyclerEvent {
  type: 'recycling.failed';
  classId: string;
  unitId: string;
  reason: string;
  code: string;
}

export interface PauseChangedEvent extends BaseRecyclerEvent {
  type: 'recycler.paused' | 'recycler.unpaused';
}

export interface RescuePerformedEvent extends BaseRecyclerEvent {
  type: 'rescue.performed';
  classId: string;
  unitId: string;
  to: string;
}

export type RecyclerEvent =
  | ClassRegisteredEvent
  | ClassRateUpdatedEvent
  | ClassStatusChangedEvent
  | ClassRemovedEvent
  | RecyclingCompletedEvent
  | RecyclingFailedEvent
  | PauseChangedEvent
  | RescuePerformedEvent;

/** Event payload as passed to emit(); the emitter stamps the timestamp */
type WithoutTimestamp<E> = E extends RecyclerEvent ? Omit<E, 'timestamp'> : never;

export type RecyclerEventInput = WithoutTimestamp<RecyclerEvent>;

export type RecyclerEventHandler = (event: RecyclerEvent) => void | Promise<void>;

/**
 * Sink the services publish to
 */
export interface RecyclerEvents {
  emit(event: RecyclerEventInput): void;
}

export class RecyclerEventEmitter implements RecyclerEvents {
  private handlers: RecyclerEventHandler[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  on(handler: RecyclerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  emit(event: RecyclerEventInput): void {
    const fullEvent: RecyclerEvent = { ...event, timestamp: this.now() };

    // Fire and forget - a failing handler must not affect the operation
    for (const handler of this.handlers) {
      try {
        const pending = handler(fullEvent);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => this.reportHandlerError(err, fullEvent));
        }
      } catch (err) {
        this.reportHandlerError(err, fullEvent);
      }
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }

  private reportHandlerError(err: unknown, event: RecyclerEvent): void {
    logger.error({ err, event: event.type }, 'Recycler event handler failed');
  }
}

export const recyclerEvents = new RecyclerEventEmitter();
