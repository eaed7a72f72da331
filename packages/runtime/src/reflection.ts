// Runtime type helpers

/**
 * A runtime type is the constructor an object was created by.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export type RuntimeType = Function;

/**
 * Get the constructor of an object, or Object for null-prototype objects.
 */
export function runtimeTypeOf(value: object): RuntimeType {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto === 'object' && proto !== null && typeof proto.constructor === 'function') {
    return proto.constructor;
  }
  return Object;
}

export function typeNameOf(type: RuntimeType): string {
  return type.name.length > 0 ? type.name : '(anonymous)';
}

/**
 * Check if a value is a plain object literal (Object or null prototype).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check if a value is an object that can be iterated (arrays, sets, maps...).
 * Strings are primitives and never match.
 */
export function isIterableObject(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  );
}
