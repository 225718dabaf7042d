/**
 * courier-bus - Exception Module
 *
 * Error taxonomy shared by messages, resolution and middleware
 */

export {
  BusException,
  ImmutabilityViolation,
  UndefinedProperty,
  HandlerNotFoundError,
  MethodNotFoundError,
  ContractViolation,
  MessageNameNotDeterminedError,
  EventCascadeDepthExceededError,
} from './exceptions';
