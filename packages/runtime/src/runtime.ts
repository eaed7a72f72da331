// Domain runtime - one set of equality, identity and codec engines

import type { AccessorCacheStats, TypeCacheStats } from '@plinth/protocol';
import { ChangeSetCodec } from './audit/change-set-codec.js';
import type { DomainConfig } from './config.js';
import { DEFAULT_DOMAIN_CONFIG, loadDomainConfig } from './config.js';
import { EntityIdentity } from './entities/entity-identity.js';
import { TypeResolutionCache } from './entities/type-resolution.js';
import type { DomainLogger } from './logger.js';
import { consoleLogger, scopeLogger } from './logger.js';
import { AccessorCompiler } from './values/accessor-compiler.js';
import { ValueEquality } from './values/value-equality.js';

export type DomainCacheStats = {
  accessors: AccessorCacheStats;
  types: TypeCacheStats;
};

/**
 * The engines behind ValueObject, Entity and AuditTrail.
 * Each runtime owns its caches; nothing is shared between runtimes.
 */
export type DomainRuntime = {
  readonly config: DomainConfig;
  readonly accessors: AccessorCompiler;
  readonly values: ValueEquality;
  readonly types: TypeResolutionCache;
  readonly entities: EntityIdentity;
  readonly codec: ChangeSetCodec;

  getCacheStats(): DomainCacheStats;

  /**
   * Empty every cache. Safe between any two operations.
   */
  clearCaches(): void;
};

export type DomainRuntimeOptions = {
  logger?: DomainLogger;
};

/**
 * Create a runtime. Missing config values take the built-in defaults.
 *
 * Usage:
 * ```ts
 * const runtime = createDomainRuntime({ typeCacheCapacity: 64 }, { logger: silentLogger });
 * runtime.values.equals(a, b);
 * ```
 */
export function createDomainRuntime(
  config: Partial<DomainConfig> = {},
  options: DomainRuntimeOptions = {}
): DomainRuntime {
  const resolved: DomainConfig = { ...DEFAULT_DOMAIN_CONFIG, ...config };
  const logger = options.logger ?? consoleLogger;

  const accessors = new AccessorCompiler({
    enabled: resolved.accessorCompilation,
    logger: scopeLogger(logger, 'accessors'),
  });
  const types = new TypeResolutionCache({
    capacity: resolved.typeCacheCapacity,
    proxyNamespace: resolved.proxyNamespace,
    logger: scopeLogger(logger, 'types'),
  });
  const values = new ValueEquality(accessors);
  const entities = new EntityIdentity(types);
  const codec = new ChangeSetCodec({
    inlineLimit: resolved.spanInlineLimit,
    logger: scopeLogger(logger, 'codec'),
  });

  return {
    config: resolved,
    accessors,
    values,
    types,
    entities,
    codec,
    getCacheStats: () => ({
      accessors: accessors.getCacheStats(),
      types: types.getCacheStats(),
    }),
    clearCaches: () => {
      accessors.clearCaches();
      types.clearCaches();
    },
  };
}

/**
 * Process-wide runtime used by the ValueObject, Entity and AuditTrail base
 * classes, configured from the environment at module load.
 */
export const defaultRuntime: DomainRuntime = createDomainRuntime(loadDomainConfig());
