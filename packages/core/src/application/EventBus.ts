import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import type { Logger } from '../domain/ports/Logger.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Registered handler, keyed by the function the caller passed so `off()` can find it. */
type HandlerKey = (event: never) => void;

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/**
 * Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`.
 *
 * A throwing subscriber is logged and does not prevent the others from
 * running, nor does it reach the code that emitted the event.
 */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<HandlerKey, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly logger?: Logger) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<HandlerKey, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        this.invoke(event, handler);
      }
    }
    for (const handler of this.wildcardHandlers) {
      this.invoke(event, handler);
    }
  }

  private invoke(event: DomainEvent, handler: WildcardHandler): void {
    try {
      handler(event);
    } catch (error) {
      this.logger?.warn('Event handler threw', { event: event.type, jobId: event.jobId, error });
    }
  }
}
