/**
 * @fileoverview Unit tests for middleware composition
 */

import {
  Command,
  DispatchContext,
  IBusMiddleware,
  KindScopedMiddleware,
  MiddlewareFunction,
  NextFunction,
  PipelineBuilder,
  compose,
  createDispatchContext,
  createPipeline,
  isMiddleware,
} from '../../../src';

class PingCommand extends Command<{ seq: number }> {}

function recorder(log: string[], label: string): MiddlewareFunction {
  return async (_ctx, next) => {
    log.push(`${label}:before`);
    const result = await next();
    log.push(`${label}:after`);
    return result;
  };
}

class QueryOnly extends KindScopedMiddleware {
  protected readonly appliesTo = 'query';

  constructor(private readonly log: string[]) {
    super();
  }

  protected async intercept(_ctx: DispatchContext, next: NextFunction): Promise<unknown> {
    this.log.push('query-only');
    return next();
  }
}

describe('PipelineBuilder', () => {
  let ctx: DispatchContext;

  beforeEach(() => {
    ctx = createDispatchContext(new PingCommand({ seq: 1 }), 'command');
  });

  it('should run the first middleware outermost', async () => {
    const log: string[] = [];
    const chain = createPipeline().use(recorder(log, 'outer')).use(recorder(log, 'inner')).compose();

    const result = await chain.handle(ctx, async () => {
      log.push('handler');
      return 42;
    });

    expect(result).toBe(42);
    expect(log).toEqual(['outer:before', 'inner:before', 'handler', 'inner:after', 'outer:after']);
  });

  it('should support prepend and insertAt', () => {
    const first = recorder([], 'first');
    const middle = recorder([], 'middle');
    const last = recorder([], 'last');

    const builder = new PipelineBuilder().use(last).prepend(first).insertAt(1, middle);
    const handlers = builder.build().map((middleware) => middleware.handle);

    expect(builder.length).toBe(3);
    expect(handlers).toEqual([first, middle, last]);
    expect(() => builder.insertAt(-1, first)).toThrow(RangeError);
  });

  it('should clear the list', () => {
    const builder = new PipelineBuilder().use(recorder([], 'a')).clear();

    expect(builder.length).toBe(0);
  });

  it('should fall through to the final step when empty', async () => {
    const result = await new PipelineBuilder().compose().handle(ctx, async () => 'done');

    expect(result).toBe('done');
  });

  it('should let a middleware short-circuit', async () => {
    const final = jest.fn(async () => 'handler');
    const chain = compose(async () => 'blocked', recorder([], 'never'));

    await expect(chain.handle(ctx, final)).resolves.toBe('blocked');
    expect(final).not.toHaveBeenCalled();
  });

  it('should reject a second call to next()', async () => {
    const twice: IBusMiddleware = {
      async handle(_ctx, next) {
        await next();
        return next();
      },
    };

    await expect(compose(twice).handle(ctx, async () => undefined)).rejects.toThrow(
      'next() called multiple times in middleware',
    );
  });

  it('should share the items bag between middleware', async () => {
    const chain = compose(
      async (context, next) => {
        context.items.set('user', 'test-user');
        return next();
      },
      async (context, next) => {
        await next();
        return context.items.get('user');
      },
    );

    await expect(chain.handle(ctx, async () => undefined)).resolves.toBe('test-user');
  });
});

describe('KindScopedMiddleware', () => {
  it('should pass other kinds straight through', async () => {
    const log: string[] = [];
    const middleware = new QueryOnly(log);

    await middleware.handle(createDispatchContext(new PingCommand({ seq: 1 }), 'command'), async () => {
      log.push('handler');
      return undefined;
    });
    await middleware.handle(createDispatchContext(new PingCommand({ seq: 2 }), 'query'), async () => {
      log.push('handler');
      return undefined;
    });

    expect(log).toEqual(['handler', 'query-only', 'handler']);
  });
});

describe('isMiddleware()', () => {
  it('should recognise objects with a handle method', () => {
    expect(isMiddleware({ handle: async () => undefined })).toBe(true);
    expect(isMiddleware(async () => undefined)).toBe(false);
    expect(isMiddleware(null)).toBe(false);
  });
});
