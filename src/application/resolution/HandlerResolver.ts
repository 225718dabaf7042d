/**
 * courier-bus - Handler Resolution Pipeline
 *
 * Composes the three resolution strategies:
 *
 * ```
 * message ──NameExtractor──▶ logical name ──HandlerLocator──▶ handler
 *                                                  │
 *                                 MethodInflector ─┘──▶ bound method
 * ```
 *
 * @module application/resolution/HandlerResolver
 */

import { HandlerNotFoundError, MethodNotFoundError } from '../../domain/exceptions';
import type { Message } from '../../domain/messages/Message';
import type { ICommandBus } from '../cqrs/ICommandBus';
import type { IHandlerLocator } from './HandlerLocator';
import type { IMethodInflector, MethodReference } from './MethodInflector';
import type { INameExtractor } from './NameExtractor';

/**
 * A handler ready to be invoked for one message.
 */
export interface ResolvedHandler {
  /** Logical name of the message */
  readonly name: string;

  /** Located handler */
  readonly handler: object;

  /** What will be invoked */
  readonly method: MethodReference;

  /** Call the handler with the message */
  invoke(message: Message<object>): unknown;
}

/**
 * HandlerResolver - Runs name extraction, handler location and method
 * inflection for a message.
 *
 * @example
 * ```typescript
 * const resolver = new HandlerResolver(
 *   new ClassNameExtractor(),
 *   new MapHandlerLocator({ RegisterCustomer: () => handler }),
 *   new HandleInflector(),
 * );
 *
 * const resolved = resolver.resolve(new RegisterCustomer({ customerName: 'Ada' }), bus);
 * await resolved.invoke(message);
 * ```
 */
export class HandlerResolver {
  constructor(
    readonly nameExtractor: INameExtractor,
    readonly handlerLocator: IHandlerLocator,
    readonly methodInflector: IMethodInflector,
  ) {}

  /**
   * @throws {HandlerNotFoundError} If no handler can be located
   * @throws {MethodNotFoundError} If the inflected method is not callable
   */
  resolve(message: Message<object>, bus: ICommandBus): ResolvedHandler {
    const name = this.nameExtractor.extract(message);
    const handler = this.locate(name, bus);
    const method = this.methodInflector.inflect(handler, name);

    return { name, handler, method, invoke: bindMethod(name, handler, method) };
  }

  private locate(name: string, bus: ICommandBus): object {
    try {
      return this.handlerLocator.locate(name, bus);
    } catch (error) {
      if (error instanceof HandlerNotFoundError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new HandlerNotFoundError(name, reason, { cause: error });
    }
  }
}

/**
 * Display name of a handler or listener, for error messages.
 */
export function describeType(handler: unknown): string {
  if (typeof handler === 'function') {
    return handler.name || '<anonymous function>';
  }
  if (typeof handler === 'object' && handler !== null) {
    const type: unknown = Reflect.get(handler, 'constructor');
    return typeof type === 'function' && type.name ? type.name : '<anonymous object>';
  }
  return typeof handler;
}

function bindMethod(
  name: string,
  handler: object,
  method: MethodReference,
): (message: Message<object>) => unknown {
  const target: unknown = handler;

  if (method.kind === 'callable') {
    if (typeof target !== 'function') {
      throw new MethodNotFoundError(name, '<call>', describeType(handler));
    }
    return (message) => Reflect.apply(target, undefined, [message]);
  }

  const member: unknown = Reflect.get(handler, method.name);
  if (typeof member !== 'function') {
    throw new MethodNotFoundError(name, method.name, describeType(handler));
  }
  return (message) => Reflect.apply(member, handler, [message]);
}
