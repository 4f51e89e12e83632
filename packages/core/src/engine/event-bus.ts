// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

/**
 * Typed event bus for workflow runner events.
 * Wraps eventemitter3 with typed EngineEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed engine event, filling in the timestamp when it is empty. */
  emitEvent(event: EngineEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }

  /** Subscribe to one event type. Returns an unsubscribe function. */
  onEvent<T extends EngineEvent['type']>(
    type: T,
    listener: (event: Extract<EngineEvent, { type: T }>) => void,
  ): () => void {
    const handler = (event: EngineEvent): void => {
      if (isEventOfType(event, type)) listener(event);
    };
    this.on('event', handler);
    return () => {
      this.off('event', handler);
    };
  }
}

function isEventOfType<T extends EngineEvent['type']>(
  event: EngineEvent,
  type: T,
): event is Extract<EngineEvent, { type: T }> {
  return event.type === type;
}
