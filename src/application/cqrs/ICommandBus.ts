/**
 * courier-bus - Command Bus Interface
 *
 * @module application/cqrs/ICommandBus
 */

import type { ICommand } from './ICommand';
import type { IQuery } from './IQuery';

/**
 * ICommandBus - Single entry point for commands and queries.
 *
 * Handlers receive the bus so they can dispatch nested messages.
 *
 * @remarks
 * A command dispatched while another command is executing in the same call
 * chain is queued and runs after the current command and its event cascade;
 * the nested `dispatch` resolves immediately. A query always runs at once.
 *
 * @example
 * ```typescript
 * class RegisterCustomerHandler extends CommandHandlerBase<RegisterCustomer> {
 *   async handle(command: RegisterCustomer): Promise<void> {
 *     const existing = await this.bus.dispatch(new FindCustomerByName({ customerName: command.get('customerName') }));
 *     if (!existing) {
 *       await this.bus.dispatch(new SendWelcomeMail({ customerName: command.get('customerName') })); // queued
 *     }
 *   }
 * }
 * ```
 */
export interface ICommandBus {
  /**
   * Run a query and resolve to its handler's result.
   */
  dispatch<TResult>(query: IQuery<TResult>): Promise<TResult>;

  /**
   * Run (or queue) a command. Resolves once it has been handled, or at
   * once when it was queued behind the command currently executing.
   */
  dispatch(command: ICommand): Promise<void>;
}
