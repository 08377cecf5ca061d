import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import type { MaybePromise } from '../domain/ports/MaybePromise.js';

/** A handler may be async; a rejected promise is reported like a thrown error. */
export type EventHandler<T extends EventType> = (event: EventPayload<T>) => MaybePromise<void>;

export type WildcardHandler = (event: DomainEvent) => MaybePromise<void>;

/** Receives errors thrown by subscribers. */
export type HandlerErrorReporter = (error: unknown, event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  private readonly handlers: { [K in EventType]?: Set<EventHandler<K>> } = {};
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly reportHandlerError: HandlerErrorReporter) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing: Set<EventHandler<T>> = this.handlers[type] ?? new Set<EventHandler<T>>();
    existing.add(handler);
    this.handlers[type] = existing;
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers[type]?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Emit a domain event to all registered handlers. A throwing handler is
   * reported and does not prevent others from executing. Async handlers are
   * not awaited.
   */
  emit(event: DomainEvent): void {
    switch (event.type) {
      case 'job:status-changed':
        this.dispatch(this.handlers['job:status-changed'], event);
        break;
      case 'job:record-processed':
        this.dispatch(this.handlers['job:record-processed'], event);
        break;
    }

    this.dispatch(this.wildcardHandlers, event);
  }

  private dispatch<E extends DomainEvent>(
    handlers: ReadonlySet<(event: E) => MaybePromise<void>> | undefined,
    event: E,
  ): void {
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(error, event));
        }
      } catch (error) {
        this.reportHandlerError(error, event);
      }
    }
  }
}
