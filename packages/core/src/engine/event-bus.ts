// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

/**
 * Typed event bus for executor events.
 * Wraps eventemitter3; a listener that throws never breaks a run.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed event, filling in the timestamp when empty. */
  emitEvent(event: EngineEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    try {
      this.emit('event', timestamped);
    } catch {
      // rendering problems are not build problems
    }
  }
}
