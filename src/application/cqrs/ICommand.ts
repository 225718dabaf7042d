/**
 * courier-bus - CQRS Command
 *
 * Commands represent intentions to change the system state. They produce no
 * value to their caller and may raise domain events while being handled.
 *
 * @module application/cqrs/ICommand
 * @see {@link https://martinfowler.com/bliki/CQRS.html | CQRS Pattern}
 */

import { Message, MessageOptions } from '../../domain/messages/Message';

/**
 * ICommand - Structural marker for commands.
 *
 * The bus tells commands from queries by this discriminant alone.
 */
export interface ICommand {
  readonly kind: 'command';
}

/**
 * Abstract base class for commands.
 *
 * @template TFields - Shape of the command's fields
 *
 * @remarks
 * Commands should be:
 * - **Immutable**: enforced; fields are bound once, in the constructor
 * - **Task-based**: named with an imperative verb (`RegisterCustomer`)
 * - **Compared by value**: two commands with the same fields are equal,
 *   whenever they were created
 *
 * @example
 * ```typescript
 * class RegisterCustomer extends Command<{ customerName: string }> {}
 *
 * await bus.dispatch(new RegisterCustomer({ customerName: 'Ada' }));
 * ```
 */
export abstract class Command<TFields extends object = Record<string, unknown>>
  extends Message<TFields>
  implements ICommand
{
  declare readonly kind: 'command';

  constructor(fields: TFields, options?: MessageOptions) {
    super('command', fields, options);
  }
}

/**
 * Type guard for commands.
 */
export function isCommand(value: unknown): value is Command<object> {
  return value instanceof Command;
}
