export { InMemoryEventPublisher } from './InMemoryEventPublisher';
