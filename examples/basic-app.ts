/**
 * courier-bus v1.0.0 - Basic Example
 *
 * Demonstrates the core concepts:
 * - Commands, queries and domain events as immutable messages
 * - Handlers found by naming convention
 * - Events published after the command completes
 * - Nested commands queued behind the executing one
 */

import {
  Command,
  CommandHandlerBase,
  DomainEvent,
  InMemoryEventPublisher,
  LoggingMiddleware,
  Query,
  QueryHandlerBase,
  consoleLogger,
  createCommandBusBuilder,
} from '../src/index';

// ==================== Read Model ====================

interface CustomerDto {
  id: number;
  customerName: string;
  welcomed: boolean;
}

const customers = new Map<number, CustomerDto>();

// ==================== Messages ====================

class RegisterCustomerCommand extends Command<{ customerName: string }> {}
class SendWelcomeMailCommand extends Command<{ id: number }> {}
class FindCustomerQuery extends Query<{ id: number }, CustomerDto | undefined> {}
class CustomerRegistered extends DomainEvent<{ id: number }> {}

// ==================== Handlers ====================

class RegisterCustomerCommandHandler extends CommandHandlerBase<RegisterCustomerCommand> {
  handle(command: RegisterCustomerCommand): void {
    const id = customers.size + 1;
    customers.set(id, { id, customerName: command.get('customerName'), welcomed: false });
    this.raise(new CustomerRegistered({ id }));
  }
}

class SendWelcomeMailCommandHandler extends CommandHandlerBase<SendWelcomeMailCommand> {
  handle(command: SendWelcomeMailCommand): void {
    const customer = customers.get(command.get('id'));
    if (customer) {
      customers.set(customer.id, { ...customer, welcomed: true });
    }
  }
}

class FindCustomerQueryHandler extends QueryHandlerBase<FindCustomerQuery> {
  handle(query: FindCustomerQuery): CustomerDto | undefined {
    return customers.get(query.get('id'));
  }
}

// ==================== Wiring ====================

const publisher = new InMemoryEventPublisher();

const bus = createCommandBusBuilder()
  .registerHandler(
    RegisterCustomerCommandHandler,
    SendWelcomeMailCommandHandler,
    FindCustomerQueryHandler,
  )
  .withEventPublisher(publisher)
  .withLogger(consoleLogger)
  .use(new LoggingMiddleware(consoleLogger))
  .build();

// The listener's command is queued and runs once the registration is done
publisher.register('onCustomerRegistered', async (event: CustomerRegistered) => {
  await bus.dispatch(new SendWelcomeMailCommand({ id: event.get('id') }));
});

// ==================== Run ====================

async function main(): Promise<void> {
  await bus.dispatch(new RegisterCustomerCommand({ customerName: 'Ada' }));

  const customer = await bus.dispatch(new FindCustomerQuery({ id: 1 }));
  console.log('Customer:', customer);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
