/**
 * courier-bus - Handler Locators
 *
 * Second step of handler resolution: map a logical name to a handler
 * instance. Locators are populated once at startup.
 *
 * @module application/resolution/HandlerLocator
 */

import { HandlerNotFoundError } from '../../domain/exceptions';
import type { ICommandBus } from '../cqrs/ICommandBus';
import { messageSuffixOf, splitLogicalName } from './NameExtractor';

/**
 * Builds a handler, given the bus it will be dispatched from.
 */
export type HandlerFactory = (bus: ICommandBus) => object;

/**
 * A handler class whose constructor takes the bus.
 */
export type HandlerType = new (bus: ICommandBus) => object;

/**
 * IHandlerLocator - Logical name to handler.
 *
 * Implementations throw {@link HandlerNotFoundError} when they have nothing
 * for a name.
 */
export interface IHandlerLocator {
  locate(name: string, bus: ICommandBus): object;
}

/**
 * Default locator: naming convention over a registration table of classes.
 *
 * The logical name's `Command` suffix becomes `CommandHandler` and its
 * `Query` suffix becomes `QueryHandler`; a module prefix is kept. The class
 * registered under the resulting name is instantiated with the bus, so each
 * dispatch gets a fresh handler.
 *
 * @example
 * ```typescript
 * const locator = new ConventionHandlerLocator([RegisterCustomerCommandHandler])
 *   .register(BillingInvoiceCommandHandler, 'billing.InvoiceCommandHandler');
 *
 * locator.handlerNameFor('RegisterCustomerCommand');  // 'RegisterCustomerCommandHandler'
 * locator.handlerNameFor('billing.InvoiceCommand');   // 'billing.InvoiceCommandHandler'
 * ```
 */
export class ConventionHandlerLocator implements IHandlerLocator {
  private readonly types = new Map<string, HandlerType>();

  constructor(handlerTypes: HandlerType[] | Record<string, HandlerType> = []) {
    if (Array.isArray(handlerTypes)) {
      handlerTypes.forEach((type) => this.register(type));
    } else {
      Object.entries(handlerTypes).forEach(([name, type]) => this.register(type, name));
    }
  }

  /**
   * Register a handler class, by default under its class name.
   */
  register(type: HandlerType, name: string = type.name): this {
    this.types.set(name, type);
    return this;
  }

  has(handlerName: string): boolean {
    return this.types.has(handlerName);
  }

  /**
   * Handler name the convention derives from a logical name, or `undefined`
   * when the name carries neither suffix.
   */
  handlerNameFor(messageName: string): string | undefined {
    const [prefix, unqualified] = splitLogicalName(messageName);
    return messageSuffixOf(unqualified) ? `${prefix}${unqualified}Handler` : undefined;
  }

  locate(name: string, bus: ICommandBus): object {
    const handlerName = this.handlerNameFor(name);
    if (handlerName === undefined) {
      throw new HandlerNotFoundError(name, 'the name ends in neither "Command" nor "Query"');
    }

    const type = this.types.get(handlerName);
    if (!type) {
      throw new HandlerNotFoundError(name, `${handlerName} is not registered`);
    }
    return new type(bus);
  }
}

/**
 * Static table of logical name to handler factory.
 *
 * @example
 * ```typescript
 * const locator = new MapHandlerLocator({
 *   RegisterCustomer: (bus) => new RegisterCustomerHandler(bus, customers),
 * }).registerInstance('FindCustomer', new FindCustomerHandler(customers));
 * ```
 */
export class MapHandlerLocator implements IHandlerLocator {
  private readonly factories = new Map<string, HandlerFactory>();

  constructor(factories: Record<string, HandlerFactory> = {}) {
    Object.entries(factories).forEach(([name, factory]) => this.register(name, factory));
  }

  register(name: string, factory: HandlerFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  /**
   * Register a ready-made handler, shared by every dispatch of `name`.
   */
  registerInstance(name: string, handler: object): this {
    return this.register(name, () => handler);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  locate(name: string, bus: ICommandBus): object {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new HandlerNotFoundError(name, 'no factory is registered under this name');
    }
    return factory(bus);
  }
}

/**
 * Resolves handlers through an arbitrary function. Returning `undefined`
 * means "no handler".
 *
 * @example
 * ```typescript
 * const locator = new CallbackHandlerLocator((name, bus) => container.tryResolve(name, bus));
 * ```
 */
export class CallbackHandlerLocator implements IHandlerLocator {
  constructor(private readonly factory: (name: string, bus: ICommandBus) => object | undefined) {}

  locate(name: string, bus: ICommandBus): object {
    const handler = this.factory(name, bus);
    if (handler === undefined) {
      throw new HandlerNotFoundError(name, 'the factory returned nothing');
    }
    return handler;
  }
}
