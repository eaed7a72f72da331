// Type resolution - maps runtime types (including ORM proxies) to domain types

import type { TypeCacheStats } from '@plinth/protocol';
import { ValidationError } from '../errors.js';
import type { DomainLogger } from '../logger.js';
import { consoleLogger } from '../logger.js';
import type { RuntimeType } from '../reflection.js';
import { runtimeTypeOf, typeNameOf } from '../reflection.js';

/**
 * Static property that places a type in a namespace.
 * Only a type's own property counts; subclasses do not inherit it.
 */
export const TYPE_NAMESPACE: unique symbol = Symbol.for('plinth.typeNamespace');

export const DEFAULT_PROXY_NAMESPACE = 'DynamicProxies';
export const DEFAULT_TYPE_CACHE_CAPACITY = 1024;

export type TypeResolutionCacheOptions = {
  /**
   * Maximum distinct types stored. Once full, new types are resolved on
   * every call but never stored.
   */
  capacity?: number;

  /**
   * Namespace that marks ORM-generated proxy subclasses
   */
  proxyNamespace?: string;

  logger?: DomainLogger;
};

/**
 * Read a type's own namespace, if it declares one.
 */
export function namespaceOf(type: RuntimeType): string | undefined {
  if (!Object.hasOwn(type, TYPE_NAMESPACE)) {
    return undefined;
  }
  const namespace: unknown = Reflect.get(type, TYPE_NAMESPACE);
  return typeof namespace === 'string' ? namespace : undefined;
}

/**
 * Place a type in a namespace.
 */
export function setTypeNamespace<T extends RuntimeType>(type: T, namespace: string): T {
  Object.defineProperty(type, TYPE_NAMESPACE, {
    value: namespace,
    enumerable: false,
    configurable: true,
    writable: false,
  });
  return type;
}

/**
 * Mark a subclass as an ORM dynamic proxy of its immediate base class.
 *
 * ```ts
 * class OrderProxy_123 extends Order {}
 * markProxyType(OrderProxy_123);
 * ```
 */
export function markProxyType<T extends RuntimeType>(
  type: T,
  namespace: string = DEFAULT_PROXY_NAMESPACE
): T {
  return setTypeNamespace(type, namespace);
}

/**
 * Resolves the "real" domain type of an object, collapsing one level of
 * proxy subclassing, and caches the answer per runtime type.
 *
 * Proxies are exactly one level below their domain type. A type outside the
 * proxy namespace resolves to itself; so does a proxy-namespaced type whose
 * base is not a class.
 */
export class TypeResolutionCache {
  private readonly realTypes = new Map<RuntimeType, RuntimeType>();
  private readonly proxyFlags = new Map<RuntimeType, boolean>();
  private readonly capacity: number;
  private readonly proxyNamespace: string;
  private readonly proxyNamespaceFirstChar: number;
  private readonly logger: DomainLogger;
  private hits = 0;
  private misses = 0;
  private capacityReported = false;

  constructor(options: TypeResolutionCacheOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_TYPE_CACHE_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError('capacity must be a positive integer', {
        field: 'capacity',
        details: { capacity },
      });
    }

    const proxyNamespace = options.proxyNamespace ?? DEFAULT_PROXY_NAMESPACE;
    if (proxyNamespace.length === 0) {
      throw new ValidationError('proxyNamespace must not be empty', { field: 'proxyNamespace' });
    }

    this.capacity = capacity;
    this.proxyNamespace = proxyNamespace;
    this.proxyNamespaceFirstChar = proxyNamespace.charCodeAt(0);
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Resolve the real type of an object.
   */
  resolve(instance: object): RuntimeType {
    return this.resolveType(runtimeTypeOf(instance));
  }

  resolveType(type: RuntimeType): RuntimeType {
    const isProxy = this.proxyFlags.get(type);

    // Fast path: known non-proxy
    if (isProxy === false) {
      this.hits++;
      return type;
    }

    // Fast path: known proxy
    if (isProxy === true) {
      const realType = this.realTypes.get(type);
      if (realType !== undefined) {
        this.hits++;
        return realType;
      }
    }

    this.misses++;
    const realType = this.determineRealType(type);

    if (this.proxyFlags.size < this.capacity) {
      this.realTypes.set(type, realType);
      this.proxyFlags.set(type, realType !== type);
    } else if (!this.capacityReported) {
      this.capacityReported = true;
      this.logger.warn('Type resolution cache is full; new types will not be cached', {
        capacity: this.capacity,
        type: typeNameOf(type),
      });
    }

    return realType;
  }

  /**
   * Whether a runtime type is a recognised proxy.
   */
  isProxyType(type: RuntimeType): boolean {
    return this.resolveType(type) !== type;
  }

  getCacheStats(): TypeCacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRatio: total > 0 ? this.hits / total : 0,
      size: this.proxyFlags.size,
      capacity: this.capacity,
    };
  }

  /**
   * Remove every cached mapping and reset the counters.
   * Later resolutions repopulate the cache lazily.
   */
  clearCaches(): void {
    this.realTypes.clear();
    this.proxyFlags.clear();
    this.hits = 0;
    this.misses = 0;
    this.capacityReported = false;
  }

  private determineRealType(type: RuntimeType): RuntimeType {
    const namespace = namespaceOf(type);

    // Most types have no namespace or a different one; reject on length and
    // first character before comparing the whole string
    if (
      namespace === undefined ||
      namespace.length !== this.proxyNamespace.length ||
      namespace.charCodeAt(0) !== this.proxyNamespaceFirstChar ||
      namespace !== this.proxyNamespace
    ) {
      return type;
    }

    const base: unknown = Object.getPrototypeOf(type);
    if (typeof base === 'function' && base !== Function.prototype) {
      return base;
    }
    return type;
  }
}
