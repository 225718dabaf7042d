/**
 * courier-bus - Middleware Interface
 *
 * Every dispatch runs through an ordered chain of middleware. Each one
 * receives the dispatch context and a `next` continuation; whatever it does
 * before `next` runs on the way in, whatever it does after runs on the way
 * out.
 */

import type { DomainEvent } from '../../domain/events/DomainEvent';
import type { Message } from '../../domain/messages/Message';

/**
 * Next function type for middleware chain
 */
export type NextFunction = () => Promise<unknown>;

/**
 * Per-dispatch state shared by the middleware of one chain
 */
export interface DispatchContext {
  /** Message being dispatched */
  readonly message: Message<object>;

  /** Whether the message is a command or a query */
  readonly kind: 'command' | 'query';

  /** Events raised while handling a command, in the order they were raised */
  readonly events: DomainEvent<object>[];

  /** Items bag for passing data between middlewares */
  readonly items: Map<string, unknown>;
}

/**
 * Create the context for one dispatch
 */
export function createDispatchContext(
  message: Message<object>,
  kind: DispatchContext['kind'],
): DispatchContext {
  return { message, kind, events: [], items: new Map() };
}

/**
 * IBusMiddleware - Core middleware interface
 *
 * @example
 * ```typescript
 * class TimingMiddleware implements IBusMiddleware {
 *   async handle(ctx: DispatchContext, next: NextFunction): Promise<unknown> {
 *     const start = Date.now();
 *     const result = await next();
 *     ctx.items.set('duration', Date.now() - start);
 *     return result;
 *   }
 * }
 * ```
 */
export interface IBusMiddleware {
  /**
   * Middleware execution method
   *
   * @param ctx - Dispatch context
   * @param next - Function to invoke the next middleware in the pipeline
   * @returns The handler's result, as returned by `next`
   */
  handle(ctx: DispatchContext, next: NextFunction): Promise<unknown>;
}

/**
 * Middleware function type for inline middleware
 */
export type MiddlewareFunction = (ctx: DispatchContext, next: NextFunction) => Promise<unknown>;

/**
 * Type guard to check if something is a middleware
 */
export function isMiddleware(obj: unknown): obj is IBusMiddleware {
  return (
    typeof obj === 'object' && obj !== null && typeof Reflect.get(obj, 'handle') === 'function'
  );
}

/**
 * Convert a function to middleware object
 */
export function createMiddleware(fn: MiddlewareFunction): IBusMiddleware {
  return {
    handle: fn,
  };
}

/**
 * Abstract base class for middleware that only applies to one message kind.
 * Messages of the other kind pass straight through.
 */
export abstract class KindScopedMiddleware implements IBusMiddleware {
  protected abstract readonly appliesTo: DispatchContext['kind'];

  handle(ctx: DispatchContext, next: NextFunction): Promise<unknown> {
    if (ctx.kind !== this.appliesTo) {
      return next();
    }
    return this.intercept(ctx, next);
  }

  /**
   * Implement this method in derived classes
   */
  protected abstract intercept(ctx: DispatchContext, next: NextFunction): Promise<unknown>;
}
