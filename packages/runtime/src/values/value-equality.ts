// Structural equality and hashing for value objects

import type { AccessorCacheStats } from '@plinth/protocol';
import { combineHashes, hashNumber, hashPrimitive } from '../hashing.js';
import { runtimeTypeOf } from '../reflection.js';
import type { AccessorCompiler } from './accessor-compiler.js';
import { flattenStructured, isStructuredValue } from './accessor-compiler.js';
import { isValueObject } from './brand.js';

/**
 * Compares value objects by their ordered components.
 *
 * Two instances are equal when they share a concrete runtime type and their
 * component sequences are pairwise equal. Nested value objects are compared
 * through this same engine; `Date` components by time; numbers by
 * SameValueZero; collections and records structurally.
 */
export class ValueEquality {
  constructor(private readonly accessors: AccessorCompiler) {}

  equals(a: object | null | undefined, b: object | null | undefined): boolean {
    if (a === b) {
      return true;
    }
    if (a === null || a === undefined || b === null || b === undefined) {
      return false;
    }
    if (runtimeTypeOf(a) !== runtimeTypeOf(b)) {
      return false;
    }

    return this.sequenceEquals(this.accessors.extract(a), this.accessors.extract(b));
  }

  hashOf(value: object): number {
    return combineHashes(this.accessors.extract(value).map((component) => this.hashComponent(component)));
  }

  /**
   * Equality of two single component values, as used inside `equals`.
   */
  valuesEqual(x: unknown, y: unknown): boolean {
    if (x === y) {
      return true;
    }
    if (x === null || x === undefined) {
      return y === null || y === undefined;
    }
    if (y === null || y === undefined) {
      return false;
    }
    if (typeof x === 'number' && typeof y === 'number') {
      return Number.isNaN(x) && Number.isNaN(y);
    }
    if (typeof x !== 'object' || typeof y !== 'object') {
      return false;
    }

    if (isValueObject(x) && isValueObject(y)) {
      return this.equals(x, y);
    }
    if (x instanceof Date && y instanceof Date) {
      return this.valuesEqual(x.getTime(), y.getTime());
    }
    if (isStructuredValue(x) && isStructuredValue(y)) {
      return this.sequenceEquals(flattenStructured(x), flattenStructured(y));
    }
    return false;
  }

  getCacheStats(): AccessorCacheStats {
    return this.accessors.getCacheStats();
  }

  clearCaches(): void {
    this.accessors.clearCaches();
  }

  private sequenceEquals(left: readonly unknown[], right: readonly unknown[]): boolean {
    if (left.length !== right.length) {
      return false;
    }
    for (let i = 0; i < left.length; i++) {
      if (!this.valuesEqual(left[i], right[i])) {
        return false;
      }
    }
    return true;
  }

  private hashComponent(component: unknown): number {
    if (typeof component !== 'object' || component === null) {
      return hashPrimitive(component);
    }
    if (isValueObject(component)) {
      return this.hashOf(component);
    }
    if (component instanceof Date) {
      return hashNumber(component.getTime());
    }
    if (isStructuredValue(component)) {
      return combineHashes(flattenStructured(component).map((item) => this.hashComponent(item)));
    }
    return hashPrimitive(component);
  }
}
