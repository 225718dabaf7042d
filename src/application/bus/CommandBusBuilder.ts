/**
 * courier-bus - Command Bus Builder
 *
 * Fluent configuration for {@link CommandBus}.
 *
 * @module application/bus/CommandBusBuilder
 */

import type { IEventPublisher } from '../../domain/events/IEventPublisher';
import { InMemoryEventPublisher } from '../../infrastructure/events/InMemoryEventPublisher';
import { DEFAULT_MAX_CASCADE_DEPTH } from '../../infrastructure/middleware/DomainEventMiddleware';
import type { IBusMiddleware, MiddlewareFunction } from '../../infrastructure/pipeline/middleware';
import { ILogger, noopLogger } from '../logging/ILogger';
import { ConventionHandlerLocator, HandlerType, IHandlerLocator } from '../resolution/HandlerLocator';
import { HandleInflector, IMethodInflector } from '../resolution/MethodInflector';
import { ClassNameExtractor, INameExtractor } from '../resolution/NameExtractor';
import { CommandBus, CommandBusOptions, defaultMiddleware } from './CommandBus';

type MiddlewareEntry = IBusMiddleware | MiddlewareFunction;

/**
 * CommandBusBuilder - Configure once at startup, then `build()`.
 *
 * @example
 * ```typescript
 * const bus = createCommandBusBuilder()
 *   .registerHandler(RegisterCustomerCommandHandler, FindCustomerQueryHandler)
 *   .withEventPublisher(publisher)
 *   .use(new LoggingMiddleware(consoleLogger))
 *   .build();
 * ```
 */
export class CommandBusBuilder {
  private readonly conventionLocator = new ConventionHandlerLocator();
  private nameExtractor: INameExtractor = new ClassNameExtractor();
  private handlerLocator: IHandlerLocator = this.conventionLocator;
  private methodInflector: IMethodInflector = new HandleInflector();
  private eventPublisher: IEventPublisher = new InMemoryEventPublisher();
  private logger: ILogger = noopLogger;
  private maxCascadeDepth = DEFAULT_MAX_CASCADE_DEPTH;
  private middleware: MiddlewareEntry[] | null = null;
  private readonly extraMiddleware: MiddlewareEntry[] = [];

  // ==================== Resolution ====================

  withNameExtractor(nameExtractor: INameExtractor): this {
    this.nameExtractor = nameExtractor;
    return this;
  }

  withHandlerLocator(handlerLocator: IHandlerLocator): this {
    this.handlerLocator = handlerLocator;
    return this;
  }

  withMethodInflector(methodInflector: IMethodInflector): this {
    this.methodInflector = methodInflector;
    return this;
  }

  /**
   * Register handler classes with the default convention locator.
   *
   * @throws {Error} If another handler locator was configured
   */
  registerHandler(...types: HandlerType[]): this {
    if (this.handlerLocator !== this.conventionLocator) {
      throw new Error('registerHandler() requires the default ConventionHandlerLocator');
    }
    types.forEach((type) => this.conventionLocator.register(type));
    return this;
  }

  getNameExtractor(): INameExtractor {
    return this.nameExtractor;
  }

  getHandlerLocator(): IHandlerLocator {
    return this.handlerLocator;
  }

  getMethodInflector(): IMethodInflector {
    return this.methodInflector;
  }

  // ==================== Middleware ====================

  /**
   * Replace the default middleware. An empty list disables locking and event
   * publishing.
   */
  withMiddleware(middleware: MiddlewareEntry[]): this {
    this.middleware = [...middleware];
    return this;
  }

  /**
   * Append a middleware inside the configured list.
   */
  use(middleware: MiddlewareEntry): this {
    this.extraMiddleware.push(middleware);
    return this;
  }

  /**
   * Whether `build()` will install the default locking and event middleware.
   */
  usesDefaultMiddleware(): boolean {
    return this.middleware === null;
  }

  /**
   * Middleware list the bus would be built with, outermost first.
   */
  getMiddleware(): MiddlewareEntry[] {
    const base =
      this.middleware ??
      defaultMiddleware(this.eventPublisher, {
        logger: this.logger,
        maxCascadeDepth: this.maxCascadeDepth,
      });
    return [...base, ...this.extraMiddleware];
  }

  // ==================== Events and logging ====================

  withEventPublisher(eventPublisher: IEventPublisher): this {
    this.eventPublisher = eventPublisher;
    return this;
  }

  withLogger(logger: ILogger): this {
    this.logger = logger;
    return this;
  }

  withMaxCascadeDepth(maxCascadeDepth: number): this {
    this.maxCascadeDepth = maxCascadeDepth;
    return this;
  }

  getEventPublisher(): IEventPublisher {
    return this.eventPublisher;
  }

  getLogger(): ILogger {
    return this.logger;
  }

  getMaxCascadeDepth(): number {
    return this.maxCascadeDepth;
  }

  // ==================== Build ====================

  build(): CommandBus {
    return new CommandBus({
      nameExtractor: this.nameExtractor,
      handlerLocator: this.handlerLocator,
      methodInflector: this.methodInflector,
      middleware: this.getMiddleware(),
      eventPublisher: this.eventPublisher,
      logger: this.logger,
      maxCascadeDepth: this.maxCascadeDepth,
    });
  }
}

export function createCommandBusBuilder(): CommandBusBuilder {
  return new CommandBusBuilder();
}

/**
 * Build a bus from plain options.
 *
 * @example
 * ```typescript
 * const bus = createCommandBus({ logger: consoleLogger, maxCascadeDepth: 8 });
 * ```
 */
export function createCommandBus(options: CommandBusOptions = {}): CommandBus {
  return new CommandBus(options);
}
