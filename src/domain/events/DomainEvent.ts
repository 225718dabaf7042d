/**
 * courier-bus - Domain Event
 *
 * A domain event records a fact that occurred while a command was handled.
 * Events are raised by command handlers or listeners, held by the bus until
 * the command completes, then published to every registered listener.
 *
 * @module domain/events/DomainEvent
 */

import { Message, MessageOptions } from '../messages/Message';

/**
 * Abstract base class for domain events.
 *
 * Unlike commands and queries, two events are equal only when they were
 * raised within the same microsecond: {@link Message.raisedAt} is part of
 * event identity.
 *
 * @template TFields - Shape of the event's fields
 *
 * @example
 * ```typescript
 * class CustomerRegistered extends DomainEvent<{ id: number }> {}
 *
 * const event = new CustomerRegistered({ id: 1 });
 * event.get('id'); // 1
 * ```
 */
export abstract class DomainEvent<TFields extends object = Record<string, unknown>> extends Message<TFields> {
  declare readonly kind: 'event';

  constructor(fields: TFields, options?: MessageOptions) {
    super('event', fields, options);
  }

  protected override comparesRaisedAt(): boolean {
    return true;
  }
}

/**
 * Type guard for domain events.
 */
export function isDomainEvent(value: unknown): value is DomainEvent<object> {
  return value instanceof DomainEvent;
}

/**
 * Something that accumulates events and hands them over once.
 *
 * The bus drains a command handler's buffer through this interface after
 * every dispatch, so the buffer lives exactly as long as one dispatch.
 */
export interface IEventRaiser {
  /**
   * Return the events raised since the last call and empty the buffer.
   */
  releaseEvents(): DomainEvent<object>[];
}

/**
 * Structural check for {@link IEventRaiser}.
 */
export function isEventRaiser(value: unknown): value is IEventRaiser {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'releaseEvents') === 'function'
  );
}

/**
 * Event buffer for objects that raise events.
 *
 * @example
 * ```typescript
 * const buffer = new EventBuffer();
 * buffer.raise(new CustomerRegistered({ id: 1 }));
 * buffer.releaseEvents(); // [CustomerRegistered]
 * buffer.releaseEvents(); // []
 * ```
 */
export class EventBuffer implements IEventRaiser {
  private events: DomainEvent<object>[] = [];

  /**
   * Events raised and not yet released.
   */
  get pending(): readonly DomainEvent<object>[] {
    return this.events;
  }

  raise(event: DomainEvent<object>): void {
    this.events.push(event);
  }

  releaseEvents(): DomainEvent<object>[] {
    const released = this.events;
    this.events = [];
    return released;
  }
}
