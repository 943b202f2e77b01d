import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Receives errors thrown by event handlers. */
export type HandlerErrorListener = (error: unknown, event: DomainEvent) => void;

/**
 * Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`.
 *
 * A throwing handler does not prevent others from executing, and never fails the
 * construction that emitted the event; its error goes to `onHandlerError` when set.
 */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly onHandlerError?: HandlerErrorListener) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
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

  /** Whether anything listens; lets callers skip building events nobody reads. */
  get hasListeners(): boolean {
    if (this.wildcardHandlers.size > 0) return true;
    for (const handlers of this.handlers.values()) {
      if (handlers.size > 0) return true;
    }
    return false;
  }

  /** Emit a domain event to all registered handlers. */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        this.dispatch(handler, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.dispatch(handler, event);
    }
  }

  private dispatch(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.onHandlerError?.(error, event);
    }
  }
}

function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
