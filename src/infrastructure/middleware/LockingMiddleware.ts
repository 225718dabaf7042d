/**
 * courier-bus - Locking Middleware
 *
 * Runs commands strictly one at a time.
 *
 * ## States
 *
 * ```
 *            command (no lock held)
 *   Idle ───────────────────────────▶ Executing
 *    ▲                                    │  nested command → queued
 *    │     queue drained, no waiters      │  external command → waits
 *    └────────────────────────────────────┘
 * ```
 *
 * ## Nested vs. external commands
 *
 * A command dispatched from inside the executing command's async call chain
 * (its handler, an event listener, a query run by either) is *nested*: it is
 * queued and its `dispatch` resolves at once. The queue is drained, FIFO, by
 * the outermost dispatch after the command and its event cascade complete,
 * so the outermost `dispatch` resolves only when all of it has run.
 *
 * A command dispatched from any other call chain while the lock is held is
 * *external*: it waits on a FIFO mutex and its `dispatch` resolves when it
 * has run. The call chain is tracked with `AsyncLocalStorage`.
 *
 * Queries are never locked.
 *
 * @module infrastructure/middleware/LockingMiddleware
 */

import { AsyncLocalStorage } from 'async_hooks';
import { ILogger, noopLogger } from '../../application/logging/ILogger';
import { DispatchContext, KindScopedMiddleware, NextFunction } from '../pipeline/middleware';

/**
 * Commands queued while one outermost command holds the lock.
 *
 * @internal
 */
interface LockSegment {
  readonly queue: NextFunction[];

  /** Cleared once the segment's drain loop has finished */
  open: boolean;
}

/**
 * LockingMiddleware - Serializes command execution.
 *
 * Put it first in the middleware list so everything after it, event
 * publishing included, runs under the lock.
 *
 * @example
 * ```typescript
 * const bus = new CommandBus({
 *   middleware: [new LockingMiddleware(), new DomainEventMiddleware(publisher)],
 * });
 * ```
 */
export class LockingMiddleware extends KindScopedMiddleware {
  protected readonly appliesTo = 'command';

  private readonly scope = new AsyncLocalStorage<LockSegment>();
  private readonly waiters: Array<() => void> = [];
  private executing = false;

  constructor(private readonly logger: ILogger = noopLogger) {
    super();
  }

  /**
   * Whether a command currently holds the lock.
   */
  get isExecuting(): boolean {
    return this.executing;
  }

  /**
   * Number of external commands waiting for the lock.
   */
  get waiting(): number {
    return this.waiters.length;
  }

  protected async intercept(ctx: DispatchContext, next: NextFunction): Promise<unknown> {
    const segment = this.scope.getStore();
    if (segment?.open) {
      segment.queue.push(next);
      this.logger.debug(`Queued ${ctx.message.typeName} behind the executing command`, {
        queued: segment.queue.length,
      });
      return undefined;
    }

    await this.acquire(ctx);
    const own: LockSegment = { queue: [], open: true };

    try {
      return await this.scope.run(own, () => this.runSegment(own, next));
    } catch (error) {
      if (own.queue.length > 0) {
        this.logger.warn(`Discarding ${own.queue.length} queued command(s) after ${ctx.message.typeName} failed`);
        own.queue.length = 0;
      }
      throw error;
    } finally {
      this.release();
    }
  }

  /**
   * Run the command, then drain its queue. The segment closes in the same
   * tick the queue is found empty (or the run fails), so nothing can be
   * queued behind a drain loop that has already stopped.
   */
  private async runSegment(own: LockSegment, next: NextFunction): Promise<unknown> {
    try {
      const result = await next();
      for (let queued = own.queue.shift(); queued; queued = own.queue.shift()) {
        await queued();
      }
      return result;
    } finally {
      own.open = false;
    }
  }

  private acquire(ctx: DispatchContext): Promise<void> {
    if (!this.executing) {
      this.executing = true;
      return Promise.resolve();
    }

    this.logger.debug(`${ctx.message.typeName} is waiting for the command lock`, {
      waiting: this.waiters.length + 1,
    });
    return new Promise<void>((resolve) => {
      this.waiters.push(() => resolve());
    });
  }

  /**
   * Hand the lock to the next waiter, or go back to Idle.
   */
  private release(): void {
    const nextWaiter = this.waiters.shift();
    if (nextWaiter) {
      nextWaiter();
    } else {
      this.executing = false;
    }
  }
}
