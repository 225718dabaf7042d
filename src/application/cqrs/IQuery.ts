/**
 * courier-bus - CQRS Query
 *
 * Queries request data. Each produces exactly one result and raises no
 * events. Queries are never serialized: they run as soon as they are
 * dispatched, even while a command is executing.
 *
 * @module application/cqrs/IQuery
 * @see {@link https://martinfowler.com/bliki/CQRS.html | CQRS Pattern}
 */

import { Message, MessageOptions } from '../../domain/messages/Message';

/**
 * IQuery - Structural marker for queries.
 *
 * @template TResult - The type of result the query produces
 */
export interface IQuery<TResult = unknown> {
  readonly kind: 'query';

  /**
   * Phantom property to capture the result type.
   * This property doesn't exist at runtime but lets `dispatch` infer the
   * result type from the query.
   *
   * @internal
   */
  readonly __resultType?: TResult;
}

/**
 * Result type carried by a query.
 */
export type QueryResultOf<TQuery> = TQuery extends IQuery<infer TResult> ? TResult : never;

/**
 * Abstract base class for queries.
 *
 * @template TFields - Shape of the query's fields
 * @template TResult - The type of result the query produces
 *
 * @example
 * ```typescript
 * interface CustomerDto {
 *   id: number;
 *   name: string;
 * }
 *
 * class FindCustomer extends Query<{ id: number }, CustomerDto> {}
 *
 * const customer = await bus.dispatch(new FindCustomer({ id: 1 })); // CustomerDto
 * ```
 */
export abstract class Query<TFields extends object = Record<string, unknown>, TResult = unknown>
  extends Message<TFields>
  implements IQuery<TResult>
{
  declare readonly kind: 'query';
  declare readonly __resultType?: TResult;

  constructor(fields: TFields, options?: MessageOptions) {
    super('query', fields, options);
  }
}

/**
 * Type guard for queries.
 */
export function isQuery(value: unknown): value is Query<object> {
  return value instanceof Query;
}
