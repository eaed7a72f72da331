// ValueObject base class

import { ValidationError } from '../errors.js';
import { defaultRuntime } from '../runtime.js';
import { runtimeTypeOf } from '../reflection.js';
import { LIST_END, LIST_START, RECORD_END, RECORD_START, TRUNCATED } from './accessor-compiler.js';
import { VALUE_OBJECT } from './brand.js';

/**
 * An immutable domain value compared by its components, not by identity.
 *
 * Components are the instance's own enumerable properties in declaration
 * order. Every instance of a subclass must assign the same set of
 * properties in its constructor, and should validate them there.
 *
 * Example:
 * ```typescript
 * class Money extends ValueObject {
 *   readonly amount: number;
 *   readonly currency: string;
 *
 *   constructor(amount: number, currency: string) {
 *     super();
 *     this.amount = ValueObject.require(amount, 'amount');
 *     this.currency = ValueObject.require(currency, 'currency');
 *   }
 * }
 *
 * new Money(100, 'USD').equals(new Money(100, 'USD')); // true
 * ```
 */
export abstract class ValueObject {
  get [VALUE_OBJECT](): true {
    return true;
  }

  equals(other: ValueObject | null | undefined): boolean {
    return defaultRuntime.values.equals(this, other);
  }

  hashCode(): number {
    return defaultRuntime.values.hashOf(this);
  }

  /**
   * Text key that represents the state of this value, suitable for caches.
   * Components are joined with `|`; strings are single-quoted.
   */
  cacheKey(): string {
    return defaultRuntime.accessors
      .extract(this)
      .map((component) => cacheKeyPart(component))
      .join('|');
  }

  toString(): string {
    const properties = defaultRuntime.accessors.getProperties(runtimeTypeOf(this)) ?? Object.keys(this);
    const pairs = properties.map((key) => `${key}: ${String(Reflect.get(this, key))}`);
    return `{${pairs.join(', ')}}`;
  }

  /**
   * Shallow copy with the same prototype.
   */
  clone(): this {
    return Object.assign(Object.create(Object.getPrototypeOf(this)), this);
  }

  static equals(a: ValueObject | null | undefined, b: ValueObject | null | undefined): boolean {
    return defaultRuntime.values.equals(a, b);
  }

  /**
   * Constructor guard for required components.
   *
   * @throws ValidationError if the value is null or undefined
   */
  protected static require<T>(value: T | null | undefined, field: string): T {
    if (value === null || value === undefined) {
      throw new ValidationError(`${field} is required`, { field });
    }
    return value;
  }
}

function cacheKeyPart(component: unknown): string {
  switch (component) {
    case LIST_START:
      return '[';
    case LIST_END:
      return ']';
    case RECORD_START:
      return '{';
    case RECORD_END:
      return '}';
    case TRUNCATED:
      return '...';
  }

  if (component === null || component === undefined) {
    return '';
  }
  if (typeof component === 'string') {
    return `'${component}'`;
  }
  if (component instanceof ValueObject) {
    return component.cacheKey();
  }
  if (component instanceof Date) {
    return Number.isNaN(component.getTime()) ? 'Invalid Date' : component.toISOString();
  }
  return String(component);
}
