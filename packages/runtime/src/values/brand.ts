// Value-object brand, kept apart from the base class so the engines can
// recognise value objects without importing it.

export const VALUE_OBJECT: unique symbol = Symbol.for('plinth.valueObject');

export function isValueObject(value: unknown): value is { readonly [VALUE_OBJECT]: true } {
  return typeof value === 'object' && value !== null && Reflect.get(value, VALUE_OBJECT) === true;
}
