/**
 * courier-bus - Built-in Middleware
 */

export { LockingMiddleware } from './LockingMiddleware';
export { DomainEventMiddleware, DEFAULT_MAX_CASCADE_DEPTH } from './DomainEventMiddleware';
export type { DomainEventMiddlewareOptions } from './DomainEventMiddleware';
export { LoggingMiddleware } from './LoggingMiddleware';
export type { LoggingMiddlewareOptions } from './LoggingMiddleware';
