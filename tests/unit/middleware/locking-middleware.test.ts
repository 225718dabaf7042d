/**
 * @fileoverview Unit tests for LockingMiddleware
 *
 * Nested commands (dispatched from inside the executing command's call
 * chain) are queued behind it; commands from unrelated call chains wait for
 * the lock.
 */

import {
  Command,
  DispatchContext,
  ILogger,
  LockingMiddleware,
  Query,
  createDispatchContext,
} from '../../../src';

class PingCommand extends Command<{ seq: number }> {}
class PongCommand extends Command<{ seq: number }> {}
class CountQuery extends Query<Record<string, never>, number> {}

function command(seq: number): DispatchContext {
  return createDispatchContext(new PingCommand({ seq }), 'command');
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = () => done();
  });
  return { promise, resolve };
}

function mockLogger(): jest.Mocked<ILogger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('LockingMiddleware', () => {
  let lock: LockingMiddleware;
  let logger: jest.Mocked<ILogger>;
  let log: string[];

  beforeEach(() => {
    logger = mockLogger();
    lock = new LockingMiddleware(logger);
    log = [];
  });

  describe('Idle and Executing', () => {
    it('should hold the lock only while a command runs', async () => {
      expect(lock.isExecuting).toBe(false);

      await lock.handle(command(1), async () => {
        log.push(`executing:${lock.isExecuting}`);
        return undefined;
      });

      expect(log).toEqual(['executing:true']);
      expect(lock.isExecuting).toBe(false);
    });

    it('should return the result of the rest of the chain', async () => {
      await expect(lock.handle(command(1), async () => 'result')).resolves.toBe('result');
    });
  });

  describe('Nested commands', () => {
    it('should queue a nested command and resolve its dispatch at once', async () => {
      await lock.handle(command(1), async () => {
        log.push('outer:start');
        const queued = await lock.handle(command(2), async () => {
          log.push('nested');
          return 'nested-result';
        });
        log.push(`outer:end:${String(queued)}`);
        return undefined;
      });

      expect(log).toEqual(['outer:start', 'outer:end:undefined', 'nested']);
      expect(logger.debug).toHaveBeenCalledWith('Queued PingCommand behind the executing command', {
        queued: 1,
      });
    });

    it('should drain queued commands in FIFO order, including ones they queue', async () => {
      await lock.handle(command(1), async () => {
        await lock.handle(command(2), async () => {
          log.push('second');
          await lock.handle(command(4), async () => {
            log.push('fourth');
            return undefined;
          });
          return undefined;
        });
        await lock.handle(command(3), async () => {
          log.push('third');
          return undefined;
        });
        log.push('first');
        return undefined;
      });

      expect(log).toEqual(['first', 'second', 'third', 'fourth']);
      expect(lock.isExecuting).toBe(false);
    });

    it('should treat work scheduled after the dispatch finished as external', async () => {
      let late: Promise<unknown> = Promise.resolve();

      await lock.handle(command(1), async () => {
        setTimeout(() => {
          late = lock.handle(command(2), async () => {
            log.push('late');
            return 'ran';
          });
        }, 0);
        return undefined;
      });
      await new Promise((resolve) => setTimeout(resolve, 10));

      await expect(late).resolves.toBe('ran');
      expect(log).toEqual(['late']);
    });
  });

  describe('External commands', () => {
    it('should make a concurrent command wait for the lock', async () => {
      const gate = deferred();

      const first = lock.handle(command(1), async () => {
        log.push('first:start');
        await gate.promise;
        log.push('first:end');
        return undefined;
      });
      const second = lock.handle(command(2), async () => {
        log.push('second');
        return 'second-result';
      });

      expect(lock.isExecuting).toBe(true);
      expect(lock.waiting).toBe(1);

      gate.resolve();
      await expect(second).resolves.toBe('second-result');
      await first;

      expect(log).toEqual(['first:start', 'first:end', 'second']);
      expect(lock.isExecuting).toBe(false);
      expect(lock.waiting).toBe(0);
    });

    it('should hand the lock to waiters in arrival order', async () => {
      const gate = deferred();

      const runs = [
        lock.handle(command(1), async () => {
          await gate.promise;
          log.push('1');
          return undefined;
        }),
        lock.handle(command(2), async () => {
          log.push('2');
          return undefined;
        }),
        lock.handle(command(3), async () => {
          log.push('3');
          return undefined;
        }),
      ];

      expect(lock.waiting).toBe(2);
      gate.resolve();
      await Promise.all(runs);

      expect(log).toEqual(['1', '2', '3']);
    });
  });

  describe('Failures', () => {
    it('should discard queued commands, release the lock and rethrow', async () => {
      const failing = lock.handle(command(1), async () => {
        await lock.handle(createDispatchContext(new PongCommand({ seq: 2 }), 'command'), async () => {
          log.push('discarded');
          return undefined;
        });
        throw new Error('handler failed');
      });

      await expect(failing).rejects.toThrow('handler failed');
      expect(log).toEqual([]);
      expect(lock.isExecuting).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        'Discarding 1 queued command(s) after PingCommand failed',
      );

      await lock.handle(command(3), async () => {
        log.push('after');
        return undefined;
      });
      expect(log).toEqual(['after']);
    });

    it('should stop draining when a queued command fails', async () => {
      const failing = lock.handle(command(1), async () => {
        await lock.handle(command(2), async () => {
          throw new Error('queued failed');
        });
        await lock.handle(command(3), async () => {
          log.push('never');
          return undefined;
        });
        return undefined;
      });

      await expect(failing).rejects.toThrow('queued failed');
      expect(log).toEqual([]);
      expect(lock.isExecuting).toBe(false);
    });

    it('should hand the lock to a waiter after a failure', async () => {
      const gate = deferred();

      const failing = lock.handle(command(1), async () => {
        await gate.promise;
        throw new Error('handler failed');
      });
      const waiting = lock.handle(command(2), async () => 'recovered');

      gate.resolve();
      await expect(failing).rejects.toThrow('handler failed');
      await expect(waiting).resolves.toBe('recovered');
    });
  });

  describe('Queries', () => {
    it('should run queries immediately while a command holds the lock', async () => {
      const gate = deferred();
      const running = lock.handle(command(1), async () => {
        await gate.promise;
        return undefined;
      });

      const count = await lock.handle(createDispatchContext(new CountQuery({}), 'query'), async () => 3);

      expect(count).toBe(3);
      expect(lock.isExecuting).toBe(true);

      gate.resolve();
      await running;
    });
  });
});
