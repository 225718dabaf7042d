/**
 * courier-bus - Domain Event Middleware
 *
 * Publishes the events a command raised once its handler has returned.
 * Events that listeners raise in response are published in turn, depth
 * first, before the command's dispatch completes. When this middleware sits
 * inside {@link LockingMiddleware}, the whole cascade runs under the lock.
 *
 * @module infrastructure/middleware/DomainEventMiddleware
 */

import { ILogger, noopLogger } from '../../application/logging/ILogger';
import type { DomainEvent } from '../../domain/events/DomainEvent';
import type { IEventPublisher } from '../../domain/events/IEventPublisher';
import { EventCascadeDepthExceededError } from '../../domain/exceptions';
import { DispatchContext, KindScopedMiddleware, NextFunction } from '../pipeline/middleware';

/**
 * Default limit on listener-raised event generations.
 */
export const DEFAULT_MAX_CASCADE_DEPTH = 32;

export interface DomainEventMiddlewareOptions {
  /**
   * Events raised by the handler are generation 1, events raised by their
   * listeners generation 2, and so on.
   * @defaultValue 32
   */
  maxCascadeDepth?: number;

  logger?: ILogger;
}

/**
 * DomainEventMiddleware - Drains and publishes raised events (commands only).
 *
 * Nothing is published when the handler throws.
 */
export class DomainEventMiddleware extends KindScopedMiddleware {
  protected readonly appliesTo = 'command';

  readonly maxCascadeDepth: number;
  private readonly logger: ILogger;

  constructor(
    private readonly publisher: IEventPublisher,
    options: DomainEventMiddlewareOptions = {},
  ) {
    super();
    this.maxCascadeDepth = options.maxCascadeDepth ?? DEFAULT_MAX_CASCADE_DEPTH;
    this.logger = options.logger ?? noopLogger;

    if (!Number.isInteger(this.maxCascadeDepth) || this.maxCascadeDepth < 1) {
      throw new RangeError(`maxCascadeDepth must be a positive integer, got ${this.maxCascadeDepth}`);
    }
  }

  protected async intercept(ctx: DispatchContext, next: NextFunction): Promise<unknown> {
    const result = await next();

    const raised = ctx.events.splice(0);
    for (const event of raised) {
      await this.publishCascade(event, 1);
    }
    return result;
  }

  private async publishCascade(event: DomainEvent<object>, depth: number): Promise<void> {
    if (depth > this.maxCascadeDepth) {
      throw new EventCascadeDepthExceededError(event.typeName, this.maxCascadeDepth);
    }

    this.logger.debug(`Publishing ${event.typeName}`, { depth });
    const followUps = await this.publisher.publish(event);

    for (const followUp of followUps) {
      await this.publishCascade(followUp, depth + 1);
    }
  }
}
