export { RecyclerEventEmitter, recyclerEvents } from './recycler-events.js';
export type {
  RecyclerEvent,
  RecyclerEventInput,
  RecyclerEventHandler,
  RecyclerEventType,
  RecyclerEvents,
  ClassRegisteredEvent,
  ClassRateUpdatedEvent,
  ClassStatusChangedEvent,
  ClassRemovedEvent,
  RecyclingCompletedEvent,
  RecyclingFailedEvent,
  PauseChangedEvent,
  RescuePerformedEvent,
} from './recycler-events.js';
