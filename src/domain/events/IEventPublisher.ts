/**
 * courier-bus - Event Publisher Interface
 *
 * The bus only needs to hand an event to "whoever listens". How listeners
 * are found (a closure registry, a broadcast group, a naming convention) is
 * up to the implementation behind these interfaces.
 *
 * @module domain/events/IEventPublisher
 */

import type { DomainEvent } from './DomainEvent';

/**
 * What a listener may hand back: nothing, or further events to publish.
 */
export type ListenerResult = void | DomainEvent<object> | DomainEvent<object>[];

/**
 * Function listener.
 */
export type EventListenerFunction<TEvent extends DomainEvent<object> = DomainEvent<object>> = (
  event: TEvent,
) => ListenerResult | Promise<ListenerResult>;

/**
 * A listener is either a function, or an object exposing a method named
 * after the listener event name (e.g. `onCustomerRegistered`).
 */
export type EventListener = EventListenerFunction | object;

/**
 * IEventPublisher - Fan-out of one event to its listeners.
 *
 * @example
 * ```typescript
 * class LoggingPublisher implements IEventPublisher {
 *   constructor(private readonly inner: IEventPublisher) {}
 *
 *   async publish(event: DomainEvent<object>): Promise<DomainEvent<object>[]> {
 *     console.log(`Publishing ${event.typeName}`);
 *     return this.inner.publish(event);
 *   }
 * }
 * ```
 */
export interface IEventPublisher {
  /**
   * Deliver an event to every listener registered for it.
   *
   * @returns Events the listeners raised in response, to be published next
   */
  publish(event: DomainEvent<object>): Promise<DomainEvent<object>[]>;
}

/**
 * IListenerRegistry - Registration side of a publisher.
 */
export interface IListenerRegistry {
  /**
   * Register a listener under an event name such as `onCustomerRegistered`.
   */
  register(eventName: string, listener: EventListener): void;
}

/**
 * Listener event name for an event: its short type name prefixed with `on`.
 *
 * @example
 * ```typescript
 * listenerEventName(new CustomerRegistered({ id: 1 })); // 'onCustomerRegistered'
 * ```
 */
export function listenerEventName(event: DomainEvent<object>): string {
  return `on${event.typeName}`;
}
