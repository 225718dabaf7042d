/**
 * courier-bus - Command Bus
 *
 * Entry point for commands and queries. The handler is resolved before the
 * message enters the middleware chain, so a message without a handler is
 * neither queued nor executed; the innermost step invokes it.
 *
 * ```
 * dispatch(message)
 *   └─ HandlerResolver
 *        └─ LockingMiddleware ─ DomainEventMiddleware ─ ...app middleware
 *             └─ handler.handle(message)
 * ```
 *
 * @module application/bus/CommandBus
 */

import { DomainEvent, isDomainEvent, isEventRaiser } from '../../domain/events/DomainEvent';
import type { IEventPublisher } from '../../domain/events/IEventPublisher';
import { ContractViolation } from '../../domain/exceptions';
import { isMessage } from '../../domain/messages/Message';
import { InMemoryEventPublisher } from '../../infrastructure/events/InMemoryEventPublisher';
import {
  DEFAULT_MAX_CASCADE_DEPTH,
  DomainEventMiddleware,
} from '../../infrastructure/middleware/DomainEventMiddleware';
import { LockingMiddleware } from '../../infrastructure/middleware/LockingMiddleware';
import { PipelineBuilder } from '../../infrastructure/pipeline/builder';
import {
  DispatchContext,
  IBusMiddleware,
  MiddlewareFunction,
  createDispatchContext,
} from '../../infrastructure/pipeline/middleware';
import type { ICommand } from '../cqrs/ICommand';
import type { ICommandBus } from '../cqrs/ICommandBus';
import type { IQuery } from '../cqrs/IQuery';
import { ILogger, noopLogger } from '../logging/ILogger';
import { ConventionHandlerLocator, IHandlerLocator } from '../resolution/HandlerLocator';
import { HandlerResolver, ResolvedHandler, describeType } from '../resolution/HandlerResolver';
import { HandleInflector, IMethodInflector } from '../resolution/MethodInflector';
import { ClassNameExtractor, INameExtractor } from '../resolution/NameExtractor';

/**
 * Command bus options. Anything left out falls back to its default.
 */
export interface CommandBusOptions {
  /** @defaultValue `ClassNameExtractor` */
  nameExtractor?: INameExtractor;

  /** @defaultValue an empty `ConventionHandlerLocator` */
  handlerLocator?: IHandlerLocator;

  /** @defaultValue `HandleInflector` */
  methodInflector?: IMethodInflector;

  /**
   * Full middleware list, outermost first. Replaces the default
   * `[LockingMiddleware, DomainEventMiddleware]`; an empty list runs
   * handlers without locking or event publishing.
   */
  middleware?: Array<IBusMiddleware | MiddlewareFunction>;

  /** @defaultValue a new `InMemoryEventPublisher` */
  eventPublisher?: IEventPublisher;

  /** @defaultValue `noopLogger` */
  logger?: ILogger;

  /**
   * Passed to the default `DomainEventMiddleware`. Ignored when `middleware`
   * is given.
   * @defaultValue 32
   */
  maxCascadeDepth?: number;
}

/**
 * The default middleware list: locking outermost, so event publishing runs
 * under the lock.
 */
export function defaultMiddleware(
  publisher: IEventPublisher,
  options: { logger?: ILogger; maxCascadeDepth?: number } = {},
): IBusMiddleware[] {
  return [
    new LockingMiddleware(options.logger),
    new DomainEventMiddleware(publisher, {
      logger: options.logger,
      maxCascadeDepth: options.maxCascadeDepth,
    }),
  ];
}

/**
 * CommandBus - Dispatches commands and queries through the middleware chain.
 *
 * @example
 * ```typescript
 * const publisher = new InMemoryEventPublisher()
 *   .register('onCustomerRegistered', (event: CustomerRegistered) => audit(event));
 *
 * const bus = new CommandBus({
 *   handlerLocator: new ConventionHandlerLocator([RegisterCustomerCommandHandler]),
 *   eventPublisher: publisher,
 * });
 *
 * await bus.dispatch(new RegisterCustomerCommand({ customerName: 'Ada' }));
 * ```
 */
export class CommandBus implements ICommandBus {
  private readonly resolver: HandlerResolver;
  private readonly chain: IBusMiddleware;
  private readonly middlewareList: readonly IBusMiddleware[];
  private readonly publisher: IEventPublisher;
  private readonly busLogger: ILogger;

  constructor(options: CommandBusOptions = {}) {
    this.busLogger = options.logger ?? noopLogger;
    this.publisher = options.eventPublisher ?? new InMemoryEventPublisher();
    this.resolver = new HandlerResolver(
      options.nameExtractor ?? new ClassNameExtractor(),
      options.handlerLocator ?? new ConventionHandlerLocator(),
      options.methodInflector ?? new HandleInflector(),
    );

    const pipeline = new PipelineBuilder();
    const middleware =
      options.middleware ??
      defaultMiddleware(this.publisher, {
        logger: this.busLogger,
        maxCascadeDepth: options.maxCascadeDepth ?? DEFAULT_MAX_CASCADE_DEPTH,
      });
    middleware.forEach((entry) => pipeline.use(entry));

    this.middlewareList = pipeline.build();
    this.chain = pipeline.compose();
  }

  // ==================== Configuration ====================

  get nameExtractor(): INameExtractor {
    return this.resolver.nameExtractor;
  }

  get handlerLocator(): IHandlerLocator {
    return this.resolver.handlerLocator;
  }

  get methodInflector(): IMethodInflector {
    return this.resolver.methodInflector;
  }

  /**
   * Middleware list, outermost first.
   */
  get middleware(): readonly IBusMiddleware[] {
    return this.middlewareList;
  }

  get eventPublisher(): IEventPublisher {
    return this.publisher;
  }

  get logger(): ILogger {
    return this.busLogger;
  }

  // ==================== Dispatch ====================

  /**
   * Run a query and resolve to its handler's result.
   */
  dispatch<TResult>(query: IQuery<TResult>): Promise<TResult>;

  /**
   * Run a command, or queue it when dispatched from inside the executing
   * command. Resolves to `undefined`.
   */
  dispatch(command: ICommand): Promise<void>;

  async dispatch(message: unknown): Promise<unknown> {
    if (!isMessage(message)) {
      throw new ContractViolation(`Only commands and queries can be dispatched, got ${describeType(message)}`);
    }

    const kind = message.kind;
    if (kind === 'event') {
      throw new ContractViolation(
        `${message.typeName} is a domain event; events are published, not dispatched`,
        { messageType: message.typeName },
      );
    }

    const resolved = this.resolver.resolve(message, this);

    this.busLogger.debug(`Dispatching ${kind} ${message.typeName}`);
    const ctx = createDispatchContext(message, kind);
    const result = await this.chain.handle(ctx, () => this.invoke(ctx, resolved));

    return kind === 'query' ? result : undefined;
  }

  /**
   * Innermost step: call the resolved handler and check its side of the
   * contract.
   */
  private async invoke(ctx: DispatchContext, resolved: ResolvedHandler): Promise<unknown> {
    let result: unknown;
    let released: DomainEvent<object>[] = [];
    try {
      result = await resolved.invoke(ctx.message);
    } finally {
      // Drain even on failure so a shared handler starts clean next time.
      released = isEventRaiser(resolved.handler) ? resolved.handler.releaseEvents() : [];
    }

    if (ctx.kind === 'query') {
      if (released.length > 0) {
        throw new ContractViolation(
          `Query handler ${describeType(resolved.handler)} raised ${released.length} event(s) for ${resolved.name}`,
          { messageName: resolved.name, events: released.map((event) => event.typeName) },
        );
      }
      return result;
    }

    ctx.events.push(...released, ...returnedEvents(result, resolved.name, resolved.handler));
    return undefined;
  }
}

function returnedEvents(result: unknown, messageName: string, handler: object): DomainEvent<object>[] {
  if (result === undefined) {
    return [];
  }
  if (isDomainEvent(result)) {
    return [result];
  }
  if (Array.isArray(result) && result.every(isDomainEvent)) {
    return result;
  }
  throw new ContractViolation(
    `Command handler ${describeType(handler)} returned a value for ${messageName}; commands may only return domain events`,
    { messageName },
  );
}
