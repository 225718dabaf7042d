export { CommandBus, defaultMiddleware } from './CommandBus';
export type { CommandBusOptions } from './CommandBus';
export { CommandBusBuilder, createCommandBusBuilder, createCommandBus } from './CommandBusBuilder';
