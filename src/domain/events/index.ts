/**
 * @module courier-bus/domain/events
 * @description Domain events, event buffers and the publisher contract
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  IEventPublisher,
  IListenerRegistry,
  EventListener,
  EventListenerFunction,
  ListenerResult,
} from './IEventPublisher';

export type { IEventRaiser } from './DomainEvent';

// ============================================================================
// Base Classes & Helpers
// ============================================================================

export { DomainEvent, EventBuffer, isDomainEvent, isEventRaiser } from './DomainEvent';
export { listenerEventName } from './IEventPublisher';
