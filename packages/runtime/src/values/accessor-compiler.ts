// Accessor compiler - builds cached component extractors for value-object types

import type { AccessorCacheStats } from '@plinth/protocol';
import { AccessorCompilationError } from '../errors.js';
import type { DomainLogger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import type { RuntimeType } from '../reflection.js';
import { isIterableObject, isPlainObject, runtimeTypeOf, typeNameOf } from '../reflection.js';
import { isValueObject } from './brand.js';

/**
 * Markers that delimit a flattened collection inside a component sequence.
 * Symbols cannot collide with real component values.
 */
export const LIST_START: unique symbol = Symbol('plinth.list.start');
export const LIST_END: unique symbol = Symbol('plinth.list.end');
export const RECORD_START: unique symbol = Symbol('plinth.record.start');
export const RECORD_END: unique symbol = Symbol('plinth.record.end');
/** Stands in for content nested deeper than the flatten limit */
export const TRUNCATED: unique symbol = Symbol('plinth.truncated');

const MAX_FLATTEN_DEPTH = 16;

/**
 * Returns the ordered equality components of one instance.
 */
export type ComponentExtractor = (instance: object) => unknown[];

type AccessorEntry = {
  /** Component property names in declaration order */
  properties: readonly string[];
  /** Compiled extractor, or null when the type is disabled */
  extractor: ComponentExtractor | null;
};

export type AccessorCompilerOptions = {
  /**
   * Allow code generation. When false every type is disabled on first sight.
   */
  enabled?: boolean;

  logger?: DomainLogger;

  /**
   * Builds the extractor for a type. Defaults to `compileExtractor`; a hook
   * that throws leaves the type on reflective extraction.
   */
  compile?: (type: RuntimeType, properties: readonly string[]) => ComponentExtractor;
};

/**
 * Check if a component value needs structural handling that compiled
 * extractors do not specialise (collections and interface-shaped records).
 */
export function isStructuredValue(value: unknown): value is object {
  if (isValueObject(value)) {
    return false;
  }
  return isIterableObject(value) || isPlainObject(value);
}

/**
 * Flatten a collection or record into a marker-delimited sequence.
 * Nested collections are flattened recursively; anything deeper than the
 * limit (including cycles) collapses to a single TRUNCATED marker.
 */
export function flattenStructured(value: object, into: unknown[] = [], depth = 0): unknown[] {
  if (depth >= MAX_FLATTEN_DEPTH) {
    into.push(TRUNCATED);
    return into;
  }

  if (isIterableObject(value)) {
    into.push(LIST_START);
    for (const item of value) {
      if (isStructuredValue(item)) {
        flattenStructured(item, into, depth + 1);
      } else {
        into.push(item);
      }
    }
    into.push(LIST_END);
    return into;
  }

  // Records compare without regard to key order
  into.push(RECORD_START);
  for (const key of Object.keys(value).sort()) {
    const item: unknown = Reflect.get(value, key);
    into.push(key);
    if (isStructuredValue(item)) {
      flattenStructured(item, into, depth + 1);
    } else {
      into.push(item);
    }
  }
  into.push(RECORD_END);
  return into;
}

/**
 * Reflective extraction: read each property by name and flatten
 * structured values.
 */
export function extractByReflection(instance: object, properties: readonly string[]): unknown[] {
  const components: unknown[] = [];
  for (const key of properties) {
    const value: unknown = Reflect.get(instance, key);
    if (isStructuredValue(value)) {
      flattenStructured(value, components);
    } else {
      components.push(value);
    }
  }
  return components;
}

/**
 * Splice structured components into the sequence the way reflective
 * extraction does. Returns the input when nothing is structured.
 */
export function flattenComponents(components: unknown[]): unknown[] {
  if (!components.some(isStructuredValue)) {
    return components;
  }

  const flattened: unknown[] = [];
  for (const value of components) {
    if (isStructuredValue(value)) {
      flattenStructured(value, flattened);
    } else {
      flattened.push(value);
    }
  }
  return flattened;
}

/**
 * Generate an extractor that reads every property directly:
 * `instance => [instance["a"], instance["b"], ...]`
 *
 * @throws AccessorCompilationError if code generation fails
 */
export function compileExtractor(type: RuntimeType, properties: readonly string[]): ComponentExtractor {
  if (properties.length === 0) {
    return () => [];
  }

  const reads = properties.map((key) => `instance[${JSON.stringify(key)}]`);
  const body = `return [${reads.join(', ')}];`;

  // eslint-disable-next-line @typescript-eslint/ban-types
  let factory: Function;
  try {
    factory = new Function('instance', body);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AccessorCompilationError(typeNameOf(type), message, error);
  }

  return (instance: object): unknown[] => factory(instance);
}

/**
 * Compiles and caches one extractor per value-object type.
 *
 * The first instance seen decides the component list. A type whose
 * components need structural handling, or whose extractor fails to compile,
 * is marked disabled and uses reflective extraction from then on. Failure
 * is never surfaced to callers.
 */
export class AccessorCompiler {
  private readonly entries = new Map<RuntimeType, AccessorEntry>();
  private readonly enabled: boolean;
  private readonly logger: DomainLogger;
  private readonly compile: (type: RuntimeType, properties: readonly string[]) => ComponentExtractor;
  private optimizedCount = 0;
  private disabledCount = 0;

  constructor(options: AccessorCompilerOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.logger = options.logger ?? consoleLogger;
    this.compile = options.compile ?? compileExtractor;
  }

  /**
   * Get the ordered equality components of a value object. Both paths
   * return the same sequence for the same instance.
   */
  extract(instance: object): unknown[] {
    const type = runtimeTypeOf(instance);
    let entry = this.entries.get(type);

    if (entry === undefined) {
      entry = this.createEntry(type, instance);
      this.entries.set(type, entry);
    }

    if (entry.extractor !== null) {
      // A compiled type may still hold a collection in a later instance
      return flattenComponents(entry.extractor(instance));
    }
    return extractByReflection(instance, entry.properties);
  }

  /**
   * Component property names for a type, or undefined if not seen yet.
   */
  getProperties(type: RuntimeType): readonly string[] | undefined {
    return this.entries.get(type)?.properties;
  }

  /**
   * Whether a type is served by a compiled extractor.
   * Returns undefined for types not seen yet.
   */
  isOptimized(type: RuntimeType): boolean | undefined {
    const entry = this.entries.get(type);
    return entry === undefined ? undefined : entry.extractor !== null;
  }

  getCacheStats(): AccessorCacheStats {
    return {
      optimizedTypes: this.optimizedCount,
      disabledTypes: this.disabledCount,
      totalTypes: this.entries.size,
    };
  }

  /**
   * Drop every cached extractor. Types are recompiled lazily.
   */
  clearCaches(): void {
    this.entries.clear();
    this.optimizedCount = 0;
    this.disabledCount = 0;
  }

  private createEntry(type: RuntimeType, sample: object): AccessorEntry {
    const properties = Object.keys(sample);

    if (!this.enabled) {
      return this.disable(properties);
    }

    const structured = properties.find((key) => isStructuredValue(Reflect.get(sample, key)));
    if (structured !== undefined) {
      this.logger.debug('Value object uses reflective extraction', {
        type: typeNameOf(type),
        property: structured,
      });
      return this.disable(properties);
    }

    try {
      const extractor = this.compile(type, properties);
      this.optimizedCount++;
      return { properties, extractor };
    } catch (error) {
      this.logger.warn('Accessor compilation failed, using reflection', {
        type: typeNameOf(type),
        error: error instanceof Error ? error.message : String(error),
      });
      return this.disable(properties);
    }
  }

  private disable(properties: readonly string[]): AccessorEntry {
    this.disabledCount++;
    return { properties, extractor: null };
  }
}
