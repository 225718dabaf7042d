/**
 * @fileoverview Middleware Pipeline Builder
 * @description
 * Fluent builder for the ordered middleware list of a bus, and `compose()`
 * to fold a list into a single middleware.
 *
 * ## Ordering
 *
 * The first middleware added is the outermost one:
 *
 * ```
 * MW1 before → MW2 before → handler → MW2 after → MW1 after
 * ```
 *
 * Typical bus order: locking first (so everything inside runs under the
 * command lock), event publishing second (so events go out before the lock
 * is released), then application middleware such as logging.
 *
 * @module infrastructure/pipeline/builder
 */

import {
  DispatchContext,
  IBusMiddleware,
  MiddlewareFunction,
  NextFunction,
  createMiddleware,
} from './middleware';

/**
 * PipelineBuilder - Ordered middleware list with a fluent API.
 *
 * @example
 * ```typescript
 * const pipeline = new PipelineBuilder()
 *   .use(new LockingMiddleware())
 *   .use(new DomainEventMiddleware(publisher))
 *   .use(async (ctx, next) => {
 *     console.log(`→ ${ctx.message.typeName}`);
 *     return next();
 *   })
 *   .compose();
 *
 * await pipeline.handle(ctx, () => invokeHandler(ctx));
 * ```
 */
export class PipelineBuilder {
  private middlewares: IBusMiddleware[] = [];

  /**
   * Append a middleware (innermost so far).
   */
  use(middleware: IBusMiddleware | MiddlewareFunction): this {
    this.middlewares.push(toMiddleware(middleware));
    return this;
  }

  /**
   * Insert a middleware at the front (outermost).
   */
  prepend(middleware: IBusMiddleware | MiddlewareFunction): this {
    this.middlewares.unshift(toMiddleware(middleware));
    return this;
  }

  /**
   * Insert a middleware at a position; indexes past the end append.
   */
  insertAt(index: number, middleware: IBusMiddleware | MiddlewareFunction): this {
    if (index < 0) {
      throw new RangeError(`Middleware index must not be negative, got ${index}`);
    }
    this.middlewares.splice(index, 0, toMiddleware(middleware));
    return this;
  }

  /**
   * Snapshot of the middleware list, outermost first.
   */
  build(): IBusMiddleware[] {
    return [...this.middlewares];
  }

  /**
   * Fold the list into one middleware.
   */
  compose(): IBusMiddleware {
    return composeMiddleware(this.build());
  }

  get length(): number {
    return this.middlewares.length;
  }

  clear(): this {
    this.middlewares = [];
    return this;
  }
}

/**
 * Create an empty pipeline builder
 */
export function createPipeline(): PipelineBuilder {
  return new PipelineBuilder();
}

/**
 * Compose middlewares into one, outermost first.
 *
 * @example
 * ```typescript
 * const chain = compose(outer, inner);
 * await chain.handle(ctx, final);
 * ```
 */
export function compose(...middlewares: Array<IBusMiddleware | MiddlewareFunction>): IBusMiddleware {
  const pipeline = createPipeline();
  for (const middleware of middlewares) {
    pipeline.use(middleware);
  }
  return pipeline.compose();
}

function toMiddleware(middleware: IBusMiddleware | MiddlewareFunction): IBusMiddleware {
  return typeof middleware === 'function' ? createMiddleware(middleware) : middleware;
}

function composeMiddleware(middlewares: readonly IBusMiddleware[]): IBusMiddleware {
  return createMiddleware((ctx: DispatchContext, next: NextFunction) => {
    let index = -1;

    const dispatch = (position: number): Promise<unknown> => {
      if (position <= index) {
        return Promise.reject(new Error('next() called multiple times in middleware'));
      }
      index = position;

      const middleware = middlewares[position];
      if (!middleware) {
        return next();
      }
      return middleware.handle(ctx, () => dispatch(position + 1));
    };

    return dispatch(0);
  });
}
