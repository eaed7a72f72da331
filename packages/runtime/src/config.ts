// Domain runtime configuration
//
// Values come from environment variables with defaults, validated with zod.

import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Typed configuration for a DomainRuntime.
 */
export type DomainConfig = {
  /**
   * Maximum distinct runtime types the type-resolution cache stores.
   * Types seen after the cache is full are resolved on every call.
   */
  typeCacheCapacity: number;

  /**
   * Namespace that marks ORM-generated proxy subclasses
   */
  proxyNamespace: string;

  /**
   * Whether value-object accessors may be compiled with code generation.
   * When false every type uses reflective extraction.
   */
  accessorCompilation: boolean;

  /**
   * Largest column count that span writes encode by direct concatenation
   */
  spanInlineLimit: number;
};

export const DEFAULT_DOMAIN_CONFIG: DomainConfig = {
  typeCacheCapacity: 1024,
  proxyNamespace: 'DynamicProxies',
  accessorCompilation: true,
  spanInlineLimit: 3,
};

const envSchema = z.object({
  PLINTH_TYPE_CACHE_CAPACITY: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_DOMAIN_CONFIG.typeCacheCapacity),
  PLINTH_PROXY_NAMESPACE: z.string().min(1).default(DEFAULT_DOMAIN_CONFIG.proxyNamespace),
  PLINTH_ACCESSOR_COMPILATION: z.enum(['enabled', 'disabled']).default('enabled'),
  PLINTH_SPAN_INLINE_LIMIT: z.coerce
    .number()
    .int()
    .min(0)
    .max(16)
    .default(DEFAULT_DOMAIN_CONFIG.spanInlineLimit),
});

export type DomainEnv = Record<string, string | undefined>;

/**
 * Load configuration from environment variables.
 *
 * Usage:
 * ```ts
 * const config = loadDomainConfig(process.env);
 * const runtime = createDomainRuntime(config);
 * ```
 *
 * @throws ValidationError if a variable is set to an invalid value
 */
export function loadDomainConfig(env: DomainEnv = process.env): DomainConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid domain configuration: ${issues.join('; ')}`, {
      details: { issues },
    });
  }

  const parsed = result.data;
  return {
    typeCacheCapacity: parsed.PLINTH_TYPE_CACHE_CAPACITY,
    proxyNamespace: parsed.PLINTH_PROXY_NAMESPACE,
    accessorCompilation: parsed.PLINTH_ACCESSOR_COMPILATION === 'enabled',
    spanInlineLimit: parsed.PLINTH_SPAN_INLINE_LIMIT,
  };
}
