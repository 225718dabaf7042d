/**
 * @fileoverview Unit tests for DomainEventMiddleware
 */

import {
  Command,
  DomainEvent,
  DomainEventMiddleware,
  EventCascadeDepthExceededError,
  IEventPublisher,
  InMemoryEventPublisher,
  createDispatchContext,
} from '../../../src';

class PlaceOrder extends Command<{ orderId: string }> {}

class OrderPlaced extends DomainEvent<{ orderId: string }> {}
class StockReserved extends DomainEvent<{ orderId: string }> {}
class InvoiceIssued extends DomainEvent<{ orderId: string }> {}
class Echo extends DomainEvent<{ hop: number }> {}

describe('DomainEventMiddleware', () => {
  let publisher: InMemoryEventPublisher;
  let published: string[];

  beforeEach(() => {
    publisher = new InMemoryEventPublisher();
    published = [];
  });

  function track(name: string): (event: DomainEvent<object>) => void {
    return (event) => {
      published.push(`${name}:${event.typeName}`);
    };
  }

  it('should publish raised events after the handler returns', async () => {
    publisher.register('onOrderPlaced', track('listener'));
    const middleware = new DomainEventMiddleware(publisher);
    const ctx = createDispatchContext(new PlaceOrder({ orderId: 'o-1' }), 'command');

    await middleware.handle(ctx, async () => {
      ctx.events.push(new OrderPlaced({ orderId: 'o-1' }));
      published.push('handler');
      return undefined;
    });

    expect(published).toEqual(['handler', 'listener:OrderPlaced']);
    expect(ctx.events).toEqual([]);
  });

  it('should publish listener events depth first', async () => {
    publisher
      .register('onOrderPlaced', (event: OrderPlaced) => {
        published.push('OrderPlaced');
        return new StockReserved({ orderId: event.get('orderId') });
      })
      .register('onStockReserved', () => {
        published.push('StockReserved');
      })
      .register('onInvoiceIssued', () => {
        published.push('InvoiceIssued');
      });
    const middleware = new DomainEventMiddleware(publisher);
    const ctx = createDispatchContext(new PlaceOrder({ orderId: 'o-1' }), 'command');

    await middleware.handle(ctx, async () => {
      ctx.events.push(new OrderPlaced({ orderId: 'o-1' }), new InvoiceIssued({ orderId: 'o-1' }));
      return undefined;
    });

    expect(published).toEqual(['OrderPlaced', 'StockReserved', 'InvoiceIssued']);
  });

  it('should publish nothing when the handler throws', async () => {
    publisher.register('onOrderPlaced', track('listener'));
    const middleware = new DomainEventMiddleware(publisher);
    const ctx = createDispatchContext(new PlaceOrder({ orderId: 'o-1' }), 'command');

    await expect(
      middleware.handle(ctx, async () => {
        ctx.events.push(new OrderPlaced({ orderId: 'o-1' }));
        throw new Error('rejected');
      }),
    ).rejects.toThrow('rejected');

    expect(published).toEqual([]);
  });

  it('should stop cascades deeper than the limit', async () => {
    publisher.register('onEcho', (event: Echo) => new Echo({ hop: event.get('hop') + 1 }));
    const middleware = new DomainEventMiddleware(publisher, { maxCascadeDepth: 3 });
    const ctx = createDispatchContext(new PlaceOrder({ orderId: 'o-1' }), 'command');

    const run = middleware.handle(ctx, async () => {
      ctx.events.push(new Echo({ hop: 1 }));
      return undefined;
    });

    await expect(run).rejects.toBeInstanceOf(EventCascadeDepthExceededError);
    await expect(run).rejects.toThrow('Event cascade exceeded 3 levels while publishing Echo');
  });

  it('should allow cascades up to the limit', async () => {
    const hops: number[] = [];
    publisher.register('onEcho', (event: Echo) => {
      hops.push(event.get('hop'));
      return event.get('hop') < 3 ? new Echo({ hop: event.get('hop') + 1 }) : undefined;
    });
    const middleware = new DomainEventMiddleware(publisher, { maxCascadeDepth: 3 });
    const ctx = createDispatchContext(new PlaceOrder({ orderId: 'o-1' }), 'command');

    await middleware.handle(ctx, async () => {
      ctx.events.push(new Echo({ hop: 1 }));
      return undefined;
    });

    expect(hops).toEqual([1, 2, 3]);
  });

  it('should leave queries alone', async () => {
    const publish = jest.fn(async () => []);
    const stub: IEventPublisher = { publish };
    const middleware = new DomainEventMiddleware(stub);
    const ctx = createDispatchContext(new PlaceOrder({ orderId: 'o-1' }), 'query');
    ctx.events.push(new OrderPlaced({ orderId: 'o-1' }));

    await expect(middleware.handle(ctx, async () => 'dto')).resolves.toBe('dto');
    expect(publish).not.toHaveBeenCalled();
  });

  it('should reject invalid depth limits', () => {
    expect(() => new DomainEventMiddleware(publisher, { maxCascadeDepth: 0 })).toThrow(RangeError);
    expect(() => new DomainEventMiddleware(publisher, { maxCascadeDepth: 1.5 })).toThrow(RangeError);
    expect(new DomainEventMiddleware(publisher).maxCascadeDepth).toBe(32);
  });
});
