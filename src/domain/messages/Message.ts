/**
 * courier-bus - Message Base Contract
 *
 * Commands, queries and domain events are all immutable value objects
 * built on {@link Message}. A message binds its caller-supplied fields
 * once, in the constructor, and is sealed before the constructor returns.
 *
 * @module domain/messages/Message
 */

import { isDeepStrictEqual } from 'util';
import { ImmutabilityViolation, UndefinedProperty } from '../exceptions';
import { currentMicroseconds } from './clock';

/**
 * Discriminant shared by every message variant.
 */
export type MessageKind = 'command' | 'query' | 'event';

/**
 * Field names owned by the message itself. Application code cannot bind them.
 *
 * - `constructed`: sealing sentinel
 * - `name`: short type name
 * - `raisedon`: microsecond timestamp
 */
export const RESERVED_FIELDS: readonly string[] = ['constructed', 'name', 'raisedon'];

/**
 * Construction options for a message.
 */
export interface MessageOptions {
  /**
   * Timestamp to stamp the message with, in microseconds since the epoch.
   * Defaults to the current time. Set it when rebuilding a message that was
   * recorded earlier.
   */
  raisedAt?: number;
}

/**
 * Serialized form of a message, keyed by the reserved field names.
 */
export type MessageSnapshot<TFields extends object> = TFields & {
  name: string;
  raisedon: number;
};

/**
 * Abstract base for all messages.
 *
 * @template TFields - Shape of the caller-supplied fields
 *
 * @remarks
 * Subclasses must not declare instance fields: all data lives in the field
 * table handed to the constructor. The instance returned by the constructor
 * is a sealing proxy, so any later write, redefinition or deletion fails
 * with {@link ImmutabilityViolation}.
 *
 * A subclass may declare a getter named after a field. {@link Message.get}
 * prefers that getter over the raw table, and the getter can reach the raw
 * value through {@link Message.field}.
 *
 * @example
 * ```typescript
 * class RegisterCustomer extends Command<{ customerName: string; email?: string }> {
 *   get email(): string {
 *     return this.has('email') ? this.field('email') ?? '' : 'unknown';
 *   }
 * }
 *
 * const command = new RegisterCustomer({ customerName: 'Ada' });
 * command.get('customerName');  // 'Ada'
 * command.get('email'); // 'unknown' (accessor wins)
 * command.set('customerName', 'Grace'); // throws ImmutabilityViolation
 * ```
 */
export abstract class Message<TFields extends object = Record<string, unknown>> {
  /**
   * Message variant.
   */
  readonly kind: MessageKind;

  /**
   * Short type name of the concrete class.
   */
  readonly typeName: string;

  /**
   * Microseconds since the Unix epoch at construction.
   */
  readonly raisedAt: number;

  /**
   * Always `true` once the constructor has returned.
   */
  readonly constructed: boolean;

  private readonly fields: TFields;

  protected constructor(kind: MessageKind, fields: TFields, options: MessageOptions = {}) {
    const typeName = new.target.name;

    for (const key of Object.keys(fields)) {
      if (RESERVED_FIELDS.includes(key)) {
        throw new ImmutabilityViolation(typeName, key, 'the name is reserved');
      }
    }

    this.kind = kind;
    this.typeName = typeName;
    this.raisedAt = options.raisedAt ?? currentMicroseconds();
    const table = { ...fields };
    Object.freeze(table);
    this.fields = table;
    this.constructed = true;

    return new Proxy(this, sealed(typeName));
  }

  /**
   * Read a field, preferring a subclass getter of the same name.
   *
   * @throws {UndefinedProperty} If the field was never bound and no getter exists
   */
  get<K extends keyof TFields & string>(key: K): TFields[K] {
    const accessor = this.findAccessor(key);
    if (accessor) {
      return accessor.call(this);
    }
    return this.field(key);
  }

  /**
   * Whether a field was bound at construction.
   */
  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.fields, key);
  }

  /**
   * Messages are sealed; this always throws.
   *
   * @throws {ImmutabilityViolation}
   */
  set(key: string, _value: unknown): never {
    throw new ImmutabilityViolation(this.typeName, key);
  }

  /**
   * Value equality with another message of the same concrete class.
   */
  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }
    if (!(other instanceof Message)) {
      return false;
    }
    if (Object.getPrototypeOf(other) !== Object.getPrototypeOf(this)) {
      return false;
    }
    if (this.comparesRaisedAt() && other.raisedAt !== this.raisedAt) {
      return false;
    }
    return valuesEqual(this.fields, other.toObject());
  }

  /**
   * Shallow copy of the bound fields.
   */
  toObject(): TFields {
    return { ...this.fields };
  }

  toJSON(): MessageSnapshot<TFields> {
    return { ...this.fields, name: this.typeName, raisedon: this.raisedAt };
  }

  /**
   * Raw field lookup, bypassing accessors.
   */
  protected field<K extends keyof TFields & string>(key: K): TFields[K] {
    if (!this.has(key)) {
      throw new UndefinedProperty(this.typeName, key);
    }
    return this.fields[key];
  }

  /**
   * Whether {@link Message.raisedAt} takes part in {@link Message.equals}.
   */
  protected comparesRaisedAt(): boolean {
    return false;
  }

  private findAccessor(key: string): PropertyDescriptor['get'] {
    let prototype: object | null = Object.getPrototypeOf(this);
    while (prototype !== null && prototype !== Message.prototype) {
      const descriptor = Object.getOwnPropertyDescriptor(prototype, key);
      if (descriptor?.get) {
        return descriptor.get;
      }
      prototype = Object.getPrototypeOf(prototype);
    }
    return undefined;
  }
}

/**
 * Type guard for any message variant.
 */
export function isMessage(value: unknown): value is Message<object> {
  return value instanceof Message;
}

function sealed<T extends object>(typeName: string): ProxyHandler<T> {
  return {
    set(_target, property) {
      throw new ImmutabilityViolation(typeName, String(property));
    },
    defineProperty(_target, property) {
      throw new ImmutabilityViolation(typeName, String(property));
    },
    deleteProperty(_target, property) {
      throw new ImmutabilityViolation(typeName, String(property));
    },
    setPrototypeOf() {
      throw new ImmutabilityViolation(typeName, '[[Prototype]]');
    },
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function valuesEqual(left: unknown, right: unknown): boolean {
  if (left instanceof Message && right instanceof Message) {
    return left.equals(right);
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return (
      left.length === right.length &&
      left.every((item, index) => valuesEqual(item, right[index]))
    );
  }
  if (isPlainRecord(left) && isPlainRecord(right)) {
    const keys = Object.keys(left);
    return (
      keys.length === Object.keys(right).length &&
      keys.every(
        (key) =>
          Object.prototype.hasOwnProperty.call(right, key) &&
          valuesEqual(left[key], right[key]),
      )
    );
  }
  return isDeepStrictEqual(left, right);
}
