/**
 * courier-bus - Exception Types
 *
 * Every failure the bus reports is a subclass of {@link BusException}.
 * The bus is a fail-fast router: none of these are retried or recovered
 * internally, they surface to the caller of `dispatch`.
 */

/**
 * Base class for all bus errors
 */
export class BusException extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A message field was written, redefined or deleted after construction,
 * or a reserved field name was supplied to the constructor.
 */
export class ImmutabilityViolation extends BusException {
  constructor(
    public readonly messageType: string,
    public readonly property: string,
    reason = 'messages are immutable once constructed',
  ) {
    super(`Cannot set "${property}" on ${messageType}: ${reason}`, {
      messageType,
      property,
    });
  }
}

/**
 * A field was read that was never bound during construction
 */
export class UndefinedProperty extends BusException {
  constructor(
    public readonly messageType: string,
    public readonly property: string,
  ) {
    super(`${messageType} has no property "${property}"`, {
      messageType,
      property,
    });
  }
}

/**
 * The handler locator could not supply a handler for a logical name
 */
export class HandlerNotFoundError extends BusException {
  constructor(
    public readonly messageName: string,
    reason?: string,
    options?: { cause?: unknown },
  ) {
    super(
      `No handler found for "${messageName}"${reason ? `: ${reason}` : ''}`,
      { messageName },
      options,
    );
  }
}

/**
 * The located handler has no callable member under the inflected name
 */
export class MethodNotFoundError extends BusException {
  constructor(
    public readonly messageName: string,
    public readonly methodName: string,
    public readonly handlerType: string,
  ) {
    super(
      `Handler ${handlerType} has no method "${methodName}" for "${messageName}"`,
      { messageName, methodName, handlerType },
    );
  }
}

/**
 * A handler broke the command/query contract: a query raised events,
 * a command returned a reply, or something other than a command or
 * query was dispatched.
 */
export class ContractViolation extends BusException {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

/**
 * The name extractor could not derive a logical name from a message
 */
export class MessageNameNotDeterminedError extends BusException {
  constructor(public readonly messageType: string) {
    super(`Cannot determine a logical name for ${messageType}`, { messageType });
  }
}

/**
 * Listeners kept raising events past the configured cascade depth
 */
export class EventCascadeDepthExceededError extends BusException {
  constructor(
    public readonly eventType: string,
    public readonly maxDepth: number,
  ) {
    super(
      `Event cascade exceeded ${maxDepth} levels while publishing ${eventType}`,
      { eventType, maxDepth },
    );
  }
}
