/**
 * @module courier-bus/application/resolution
 * @description Name extraction, handler location and method inflection
 */

export {
  ClassNameExtractor,
  NamedMessageExtractor,
  MESSAGE_SUFFIXES,
  isNamedMessage,
  messageSuffixOf,
  splitLogicalName,
} from './NameExtractor';
export type { INameExtractor, INamedMessage } from './NameExtractor';

export {
  ConventionHandlerLocator,
  MapHandlerLocator,
  CallbackHandlerLocator,
} from './HandlerLocator';
export type { IHandlerLocator, HandlerFactory, HandlerType } from './HandlerLocator';

export {
  HandleInflector,
  HandleClassNameInflector,
  HandleClassNameWithoutSuffixInflector,
  InvokeInflector,
} from './MethodInflector';
export type { IMethodInflector, MethodReference } from './MethodInflector';

export { HandlerResolver, describeType } from './HandlerResolver';
export type { ResolvedHandler } from './HandlerResolver';
