/**
 * courier-bus - Logging Middleware
 *
 * Logs the lifecycle of every dispatch.
 */

import { ILogger, consoleLogger } from '../../application/logging/ILogger';
import { DispatchContext, IBusMiddleware, NextFunction } from '../pipeline/middleware';

export interface LoggingMiddlewareOptions {
  /** Log on entry, at debug level */
  logStart?: boolean;

  /** Append the duration to the completion line */
  logDuration?: boolean;
}

/**
 * Logging middleware - logs dispatch start, completion and failure
 *
 * @example
 * ```typescript
 * builder.use(new LoggingMiddleware(logger));
 * // [DEBUG] → command RegisterCustomer
 * // [INFO] ← command RegisterCustomer (3ms)
 * ```
 */
export class LoggingMiddleware implements IBusMiddleware {
  private readonly options: Required<LoggingMiddlewareOptions>;

  constructor(
    private readonly logger: ILogger = consoleLogger,
    options: LoggingMiddlewareOptions = {},
  ) {
    this.options = {
      logStart: true,
      logDuration: true,
      ...options,
    };
  }

  async handle(ctx: DispatchContext, next: NextFunction): Promise<unknown> {
    const start = Date.now();
    const label = `${ctx.kind} ${ctx.message.typeName}`;

    if (this.options.logStart) {
      this.logger.debug(`→ ${label}`);
    }

    try {
      const result = await next();
      const duration = Date.now() - start;
      this.logger.info(`← ${label}${this.options.logDuration ? ` (${duration}ms)` : ''}`);
      return result;
    } catch (error) {
      this.logger.error(`✗ ${label} failed`, error);
      throw error;
    }
  }
}
