/**
 * courier-bus - In-Memory Event Publisher
 *
 * Closure registry of listeners keyed by listener event name
 * (`on<EventType>`), publishing in registration order.
 *
 * @module infrastructure/events/InMemoryEventPublisher
 */

import { describeType } from '../../application/resolution/HandlerResolver';
import { DomainEvent, isDomainEvent } from '../../domain/events/DomainEvent';
import {
  EventListener,
  IEventPublisher,
  IListenerRegistry,
  listenerEventName,
} from '../../domain/events/IEventPublisher';
import { ContractViolation, MethodNotFoundError } from '../../domain/exceptions';

/**
 * InMemoryEventPublisher - Registry and publisher in one.
 *
 * A function listener is called with the event. An object listener has its
 * method named after the listener event name called. Either may return
 * further events, which the caller publishes next.
 *
 * @example
 * ```typescript
 * const publisher = new InMemoryEventPublisher()
 *   .register('onCustomerRegistered', (event: CustomerRegistered) => {
 *     mailer.welcome(event.get('id'));
 *   })
 *   .register('onCustomerRegistered', {
 *     onCustomerRegistered: (event: CustomerRegistered) => new AccountOpened({ id: event.get('id') }),
 *   });
 * ```
 */
export class InMemoryEventPublisher implements IEventPublisher, IListenerRegistry {
  private readonly listeners = new Map<string, EventListener[]>();

  register(eventName: string, listener: EventListener): this {
    const registered = this.listeners.get(eventName) ?? [];
    registered.push(listener);
    this.listeners.set(eventName, registered);
    return this;
  }

  /**
   * @returns Whether the listener was registered
   */
  unregister(eventName: string, listener: EventListener): boolean {
    const registered = this.listeners.get(eventName);
    const index = registered?.indexOf(listener) ?? -1;
    if (!registered || index === -1) {
      return false;
    }

    registered.splice(index, 1);
    if (registered.length === 0) {
      this.listeners.delete(eventName);
    }
    return true;
  }

  hasListeners(eventName: string): boolean {
    return this.listeners.has(eventName);
  }

  listenersFor(eventName: string): readonly EventListener[] {
    return [...(this.listeners.get(eventName) ?? [])];
  }

  clear(): void {
    this.listeners.clear();
  }

  async publish(event: DomainEvent<object>): Promise<DomainEvent<object>[]> {
    const eventName = listenerEventName(event);
    const raised: DomainEvent<object>[] = [];

    for (const listener of this.listenersFor(eventName)) {
      const result = await this.notify(listener, eventName, event);
      raised.push(...listenerEvents(result, eventName, listener));
    }
    return raised;
  }

  private notify(listener: EventListener, eventName: string, event: DomainEvent<object>): unknown {
    const target: unknown = listener;
    if (typeof target === 'function') {
      return Reflect.apply(target, undefined, [event]);
    }

    const method: unknown = Reflect.get(listener, eventName);
    if (typeof method !== 'function') {
      throw new MethodNotFoundError(event.typeName, eventName, describeType(listener));
    }
    return Reflect.apply(method, listener, [event]);
  }
}

function listenerEvents(result: unknown, eventName: string, listener: EventListener): DomainEvent<object>[] {
  if (result === undefined) {
    return [];
  }
  if (isDomainEvent(result)) {
    return [result];
  }
  if (Array.isArray(result) && result.every(isDomainEvent)) {
    return result;
  }
  throw new ContractViolation(
    `Listener ${describeType(listener)} for ${eventName} returned a value that is not a domain event`,
    { eventName },
  );
}
