/**
 * courier-bus - Method Inflectors
 *
 * Last step of handler resolution: decide what to call on the located
 * handler.
 *
 * @module application/resolution/MethodInflector
 */

import { messageSuffixOf, splitLogicalName } from './NameExtractor';

/**
 * What to invoke: a named method of the handler, or the handler itself.
 */
export type MethodReference = { kind: 'method'; name: string } | { kind: 'callable' };

/**
 * IMethodInflector - Handler and logical name to method.
 */
export interface IMethodInflector {
  inflect(handler: object, messageName: string): MethodReference;
}

/**
 * Default inflector: every handler exposes `handle`.
 */
export class HandleInflector implements IMethodInflector {
  inflect(): MethodReference {
    return { kind: 'method', name: 'handle' };
  }
}

/**
 * `handle` followed by the unqualified logical name, so one handler can
 * service several message types.
 *
 * @example
 * ```typescript
 * new HandleClassNameInflector().inflect(handler, 'crm.RegisterCustomerCommand');
 * // { kind: 'method', name: 'handleRegisterCustomerCommand' }
 * ```
 */
export class HandleClassNameInflector implements IMethodInflector {
  inflect(_handler: object, messageName: string): MethodReference {
    return { kind: 'method', name: `handle${this.methodSuffix(messageName)}` };
  }

  protected methodSuffix(messageName: string): string {
    return splitLogicalName(messageName)[1];
  }
}

/**
 * Like {@link HandleClassNameInflector}, with a trailing `Command`/`Query`
 * removed: `RegisterCustomerCommand` maps to `handleRegisterCustomer`.
 */
export class HandleClassNameWithoutSuffixInflector extends HandleClassNameInflector {
  protected override methodSuffix(messageName: string): string {
    const unqualified = super.methodSuffix(messageName);
    const suffix = messageSuffixOf(unqualified);
    return suffix ? unqualified.slice(0, -suffix.length) : unqualified;
  }
}

/**
 * The handler is a function and is called directly.
 */
export class InvokeInflector implements IMethodInflector {
  inflect(): MethodReference {
    return { kind: 'callable' };
  }
}
