import { Logger } from "./types/common";
import { EngineEvent, EngineEventOf, EngineEventType } from "./types/events";

export type EventListener<E extends EngineEvent = EngineEvent> = (event: E) => void;

/**
 * Narrow an engine event to one type.
 */
export function isEventType<T extends EngineEventType>(
  event: EngineEvent,
  type: T,
): event is EngineEventOf<T> {
  return event.type === type;
}

/**
 * Best-effort broadcast of engine events to observers.
 *
 * Listeners run synchronously in subscription order. A throwing listener
 * is logged and skipped; it never fails the operation that emitted.
 */
export class EventBus {
  private listeners = new Set<EventListener>();
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Receive every event. Returns an unsubscribe function.
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Receive events of a single type. Returns an unsubscribe function.
   *
   * @example
   * bus.on('fee_adjusted', (e) => console.log(e.previousFee, e.newFee));
   */
  on<T extends EngineEventType>(
    type: T,
    listener: EventListener<EngineEventOf<T>>,
  ): () => void {
    return this.subscribe((event) => {
      if (isEventType(event, type)) listener(event);
    });
  }

  emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger?.error(`event listener failed for ${event.type}`, err);
      }
    }
  }
}
