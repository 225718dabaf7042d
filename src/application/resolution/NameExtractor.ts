/**
 * courier-bus - Name Extractors
 *
 * First step of handler resolution: map a message to its logical name.
 *
 * @module application/resolution/NameExtractor
 */

import { MessageNameNotDeterminedError } from '../../domain/exceptions';
import type { Message } from '../../domain/messages/Message';

/**
 * Suffixes that mark a logical name as a command or a query.
 */
export const MESSAGE_SUFFIXES: readonly string[] = ['Command', 'Query'];

/**
 * INameExtractor - Message to logical name.
 */
export interface INameExtractor {
  extract(message: Message<object>): string;
}

/**
 * Capability for messages that name themselves.
 *
 * @example
 * ```typescript
 * class RegisterCustomer extends Command<{ customerName: string }> implements INamedMessage {
 *   messageName(): string {
 *     return 'crm.RegisterCustomerCommand';
 *   }
 * }
 * ```
 */
export interface INamedMessage {
  messageName(): string;
}

export function isNamedMessage(value: unknown): value is INamedMessage {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'messageName') === 'function'
  );
}

/**
 * Default extractor: the message's short type name.
 */
export class ClassNameExtractor implements INameExtractor {
  extract(message: Message<object>): string {
    return message.typeName;
  }
}

/**
 * Extractor for messages implementing {@link INamedMessage}.
 */
export class NamedMessageExtractor implements INameExtractor {
  extract(message: Message<object>): string {
    if (!isNamedMessage(message)) {
      throw new MessageNameNotDeterminedError(message.typeName);
    }
    return message.messageName();
  }
}

/**
 * Split a logical name into its `.`-separated module prefix (kept with the
 * trailing dot) and its unqualified part.
 *
 * @example
 * ```typescript
 * splitLogicalName('crm.RegisterCustomerCommand'); // ['crm.', 'RegisterCustomerCommand']
 * splitLogicalName('FindCustomerQuery');           // ['', 'FindCustomerQuery']
 * ```
 */
export function splitLogicalName(name: string): [prefix: string, unqualified: string] {
  const separator = name.lastIndexOf('.');
  return [name.slice(0, separator + 1), name.slice(separator + 1)];
}

/**
 * The `Command`/`Query` suffix of an unqualified name, if it has one.
 */
export function messageSuffixOf(unqualified: string): string | undefined {
  return MESSAGE_SUFFIXES.find(
    (suffix) => unqualified.length > suffix.length && unqualified.endsWith(suffix),
  );
}
