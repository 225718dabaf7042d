/**
 * @fileoverview CQRS Exports
 * @description
 * Commands and their handlers for writes, queries and their handlers for
 * reads, and the bus contract both are dispatched through.
 *
 * @module courier-bus/application/cqrs
 * @see {@link https://martinfowler.com/bliki/CQRS.html | Martin Fowler - CQRS}
 *
 * @example
 * ```typescript
 * class RegisterCustomerCommand extends Command<{ customerName: string }> {}
 *
 * class RegisterCustomerCommandHandler extends CommandHandlerBase<RegisterCustomerCommand> {
 *   handle(command: RegisterCustomerCommand): void {
 *     this.raise(new CustomerRegistered({ customerName: command.get('customerName') }));
 *   }
 * }
 * ```
 */

// Command abstractions
export { Command, isCommand } from './ICommand';
export type { ICommand } from './ICommand';

// Query abstractions
export { Query, isQuery } from './IQuery';
export type { IQuery, QueryResultOf } from './IQuery';

// Handler abstractions
export { CommandHandlerBase, QueryHandlerBase } from './IHandler';
export type { CommandHandlerResult, ICommandHandler, IQueryHandler } from './IHandler';

// Bus contract
export type { ICommandBus } from './ICommandBus';
