import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

export type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type Listener = (event: DomainEvent) => void;

function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly listeners = new Map<EventType, Map<unknown, Listener>>();

  /** Subscribe to events of the given type. Subscribing the same handler twice has no effect. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.listeners.get(type) ?? new Map<unknown, Listener>();
    if (!existing.has(handler)) {
      existing.set(handler, (event) => {
        if (isEventOfType(event, type)) handler(event);
      });
    }
    this.listeners.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.listeners.get(type)?.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    const listeners = this.listeners.get(event.type);
    if (!listeners) return;

    for (const listener of [...listeners.values()]) {
      try {
        listener(event);
      } catch {
        // Handler errors never reach the report stream.
      }
    }
  }
}
