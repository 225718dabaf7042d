/**
 * courier-bus - CQRS Handler Interfaces
 *
 * Handlers contain the logic for one command or query type. The bus finds a
 * handler through its handler locator and calls the method its method
 * inflector names (`handle` by default).
 *
 * @module application/cqrs/IHandler
 * @see {@link https://martinfowler.com/bliki/CQRS.html | CQRS Pattern}
 */

import { DomainEvent, EventBuffer, IEventRaiser } from '../../domain/events/DomainEvent';
import type { ICommand } from './ICommand';
import type { ICommandBus } from './ICommandBus';
import type { IQuery, QueryResultOf } from './IQuery';

/**
 * What a command handler may return: nothing, or the events it raised.
 * Any other value is a contract violation.
 */
export type CommandHandlerResult = void | DomainEvent<object> | DomainEvent<object>[];

/**
 * ICommandHandler - Handler interface for commands.
 *
 * @template TCommand - The command type this handler processes
 *
 * @example
 * ```typescript
 * class RegisterCustomerHandler implements ICommandHandler<RegisterCustomer> {
 *   constructor(private readonly customers: CustomerRepository) {}
 *
 *   async handle(command: RegisterCustomer): Promise<DomainEvent<object>> {
 *     const id = await this.customers.add(command.get('customerName'));
 *     return new CustomerRegistered({ id });
 *   }
 * }
 * ```
 */
export interface ICommandHandler<TCommand extends ICommand> {
  handle(command: TCommand): CommandHandlerResult | Promise<CommandHandlerResult>;
}

/**
 * IQueryHandler - Handler interface for queries.
 *
 * @template TQuery - The query type this handler processes
 * @template TResult - The type of result returned by the handler
 *
 * @remarks
 * Query handlers should:
 * - **Be read-only**: never modify state, only read data
 * - **Raise nothing**: a query handler that raises events is rejected
 * - **Return DTOs**: map domain objects to plain values
 */
export interface IQueryHandler<TQuery extends IQuery<unknown>, TResult = QueryResultOf<TQuery>> {
  handle(query: TQuery): TResult | Promise<TResult>;
}

/**
 * Abstract base class for command handlers.
 *
 * Holds the bus for nested dispatch and an event buffer the bus drains after
 * the handler returns. Instantiate one handler per dispatch (the convention
 * locator does) or rely on the bus draining the buffer every time.
 *
 * @template TCommand - The command type this handler processes
 *
 * @example
 * ```typescript
 * class RegisterCustomerHandler extends CommandHandlerBase<RegisterCustomerCommand> {
 *   handle(command: RegisterCustomerCommand): void {
 *     this.raise(new CustomerRegistered({ id: 1 }));
 *   }
 * }
 * ```
 */
export abstract class CommandHandlerBase<TCommand extends ICommand>
  implements ICommandHandler<TCommand>, IEventRaiser
{
  private readonly buffer = new EventBuffer();

  constructor(protected readonly bus: ICommandBus) {}

  abstract handle(command: TCommand): CommandHandlerResult | Promise<CommandHandlerResult>;

  releaseEvents(): DomainEvent<object>[] {
    return this.buffer.releaseEvents();
  }

  /**
   * Record an event to be published once this command completes.
   */
  protected raise(event: DomainEvent<object>): void {
    this.buffer.raise(event);
  }
}

/**
 * Abstract base class for query handlers.
 *
 * @template TQuery - The query type this handler processes
 * @template TResult - The type of result returned by the handler
 */
export abstract class QueryHandlerBase<TQuery extends IQuery<unknown>, TResult = QueryResultOf<TQuery>>
  implements IQueryHandler<TQuery, TResult>
{
  constructor(protected readonly bus: ICommandBus) {}

  abstract handle(query: TQuery): TResult | Promise<TResult>;
}
