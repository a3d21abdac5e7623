import type { EventType, EventPayload, CampaignEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void | Promise<void>;

type WildcardHandler = (event: CampaignEvent) => void | Promise<void>;

/** Receives errors thrown or rejected by a handler, together with the event being delivered. */
export type HandlerErrorListener = (error: unknown, event: CampaignEvent) => void;

function isEventOfType<T extends EventType>(event: CampaignEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/**
 * Typed event bus for campaign events. Subscribe with `on()`, publish with `emit()`.
 *
 * Handlers may be async. Their promises are tracked, and `drain()` resolves
 * once every pending handler has settled. A failing handler never prevents
 * the others from running; its error goes to the `HandlerErrorListener`.
 */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly onHandlerError: HandlerErrorListener) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => (isEventOfType(event, type) ? handler(event) : undefined));
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

  emit(event: CampaignEvent): void {
    const typed = this.handlers.get(event.type);
    if (typed) {
      for (const handler of typed.values()) {
        this.invoke(handler, event);
      }
    }
    for (const handler of this.wildcardHandlers) {
      this.invoke(handler, event);
    }
  }

  /** Wait for every async handler started so far, including ones started while waiting. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private invoke(handler: WildcardHandler, event: CampaignEvent): void {
    let result: void | Promise<void>;
    try {
      result = handler(event);
    } catch (error) {
      this.onHandlerError(error, event);
      return;
    }
    if (result instanceof Promise) {
      const tracked: Promise<void> = result
        .catch((error: unknown) => {
          this.onHandlerError(error, event);
        })
        .finally(() => {
          this.pending.delete(tracked);
        });
      this.pending.add(tracked);
    }
  }
}
