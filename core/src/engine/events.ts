/**
 * Append-only event log. Observers may read or subscribe; nothing in the
 * market depends on events for correctness.
 */

import type { Clock } from "../types/state.js";
import type { EventRecord, MarketEvent, MarketEventType } from "../types/events.js";

export type EventListener = (record: EventRecord) => void;

/**
 * Read side of the log, handed to observers. Only the market emits.
 */
export interface EventView {
  list(): readonly EventRecord[];
  ofType<T extends MarketEventType>(type: T): Extract<MarketEvent, { type: T }>[];
  subscribe(listener: EventListener): () => void;
}

export class EventLog {
  private records: EventRecord[] = [];
  private listeners = new Set<EventListener>();
  private clock: Clock;

  constructor(clock: Clock) {
    this.clock = clock;
  }

  emit(event: MarketEvent): EventRecord {
    const record: EventRecord = Object.freeze({
      seq: this.records.length + 1,
      emittedAt: this.clock(),
      event: Object.freeze({ ...event }),
    });
    this.records.push(record);
    for (const listener of this.listeners) listener(record);
    return record;
  }

  list(): readonly EventRecord[] {
    return [...this.records];
  }

  ofType<T extends MarketEventType>(
    type: T
  ): Extract<MarketEvent, { type: T }>[] {
    const out: Extract<MarketEvent, { type: T }>[] = [];
    for (const { event } of this.records) {
      if (isEventOfType(event, type)) out.push(event);
    }
    return out;
  }

  view(): EventView {
    return {
      list: () => this.list(),
      ofType: <T extends MarketEventType>(type: T) => this.ofType(type),
      subscribe: (listener) => this.subscribe(listener),
    };
  }

  /**
   * Returns a function that removes the listener.
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

function isEventOfType<T extends MarketEventType>(
  event: MarketEvent,
  type: T
): event is Extract<MarketEvent, { type: T }> {
  return event.type === type;
}
