/**
 * @fileoverview Unit tests for handler locators
 */

import {
  CallbackHandlerLocator,
  CommandBus,
  ConventionHandlerLocator,
  HandlerNotFoundError,
  ICommandBus,
  MapHandlerLocator,
} from '../../../src';

class RegisterCustomerCommandHandler {
  constructor(readonly bus: ICommandBus) {}
}

class FindCustomerQueryHandler {
  constructor(readonly bus: ICommandBus) {}
}

class InvoiceCommandHandler {
  constructor(readonly bus: ICommandBus) {}
}

describe('ConventionHandlerLocator', () => {
  const bus = new CommandBus();

  it('should derive handler names from the suffix', () => {
    const locator = new ConventionHandlerLocator();

    expect(locator.handlerNameFor('RegisterCustomerCommand')).toBe('RegisterCustomerCommandHandler');
    expect(locator.handlerNameFor('FindCustomerQuery')).toBe('FindCustomerQueryHandler');
    expect(locator.handlerNameFor('billing.InvoiceCommand')).toBe('billing.InvoiceCommandHandler');
    expect(locator.handlerNameFor('RegisterCustomer')).toBeUndefined();
  });

  it('should build a fresh handler with the bus injected on every lookup', () => {
    const locator = new ConventionHandlerLocator([RegisterCustomerCommandHandler, FindCustomerQueryHandler]);

    const first = locator.locate('RegisterCustomerCommand', bus);
    const second = locator.locate('RegisterCustomerCommand', bus);

    expect(first).toBeInstanceOf(RegisterCustomerCommandHandler);
    expect(first).not.toBe(second);
    expect(first).toEqual({ bus });
    expect(locator.locate('FindCustomerQuery', bus)).toBeInstanceOf(FindCustomerQueryHandler);
  });

  it('should keep the module prefix when registered under a qualified name', () => {
    const locator = new ConventionHandlerLocator({ 'billing.InvoiceCommandHandler': InvoiceCommandHandler });

    expect(locator.has('billing.InvoiceCommandHandler')).toBe(true);
    expect(locator.locate('billing.InvoiceCommand', bus)).toBeInstanceOf(InvoiceCommandHandler);
    expect(() => locator.locate('InvoiceCommand', bus)).toThrow(HandlerNotFoundError);
  });

  it('should report names without a command or query suffix', () => {
    const locator = new ConventionHandlerLocator([RegisterCustomerCommandHandler]);

    expect(() => locator.locate('RegisterCustomer', bus)).toThrow(
      'No handler found for "RegisterCustomer": the name ends in neither "Command" nor "Query"',
    );
  });

  it('should report unregistered handlers', () => {
    const locator = new ConventionHandlerLocator();

    expect(() => locator.locate('DoUnknownThingCommand', bus)).toThrow(
      'No handler found for "DoUnknownThingCommand": DoUnknownThingCommandHandler is not registered',
    );
  });
});

describe('MapHandlerLocator', () => {
  const bus = new CommandBus();

  it('should call the registered factory with the bus', () => {
    const factory = jest.fn((given: ICommandBus) => ({ given }));
    const locator = new MapHandlerLocator({ RegisterCustomer: factory });

    expect(locator.locate('RegisterCustomer', bus)).toEqual({ given: bus });
    expect(factory).toHaveBeenCalledWith(bus);
  });

  it('should share registered instances', () => {
    const handler = { handle: jest.fn() };
    const locator = new MapHandlerLocator().registerInstance('FindCustomer', handler);

    expect(locator.has('FindCustomer')).toBe(true);
    expect(locator.locate('FindCustomer', bus)).toBe(handler);
    expect(locator.locate('FindCustomer', bus)).toBe(handler);
  });

  it('should fail for unknown names', () => {
    expect(() => new MapHandlerLocator().locate('DoUnknownThing', bus)).toThrow(
      'No handler found for "DoUnknownThing": no factory is registered under this name',
    );
  });
});

describe('CallbackHandlerLocator', () => {
  const bus = new CommandBus();

  it('should return what the callback returns', () => {
    const handler = { handle: jest.fn() };
    const locator = new CallbackHandlerLocator((name) => (name === 'FindCustomer' ? handler : undefined));

    expect(locator.locate('FindCustomer', bus)).toBe(handler);
  });

  it('should treat undefined as not found', () => {
    const locator = new CallbackHandlerLocator(() => undefined);

    expect(() => locator.locate('DoUnknownThing', bus)).toThrow(HandlerNotFoundError);
    expect(() => locator.locate('DoUnknownThing', bus)).toThrow(
      'No handler found for "DoUnknownThing": the factory returned nothing',
    );
  });
});
