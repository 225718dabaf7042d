/**
 * courier-bus - Pipeline Module
 *
 * Middleware contract and composition
 */

export { PipelineBuilder, createPipeline, compose } from './builder';

export {
  KindScopedMiddleware,
  createDispatchContext,
  createMiddleware,
  isMiddleware,
} from './middleware';

export type {
  DispatchContext,
  IBusMiddleware,
  MiddlewareFunction,
  NextFunction,
} from './middleware';
