// Entity exports

export { Entity } from './entity.js';
export { AuditableEntity } from './auditable-entity.js';
export { UserAuditableEntity } from './user-auditable-entity.js';
export { EntityIdentity } from './entity-identity.js';
export type { Identifiable } from './entity-identity.js';

// Proxy type resolution
export {
  TypeResolutionCache,
  TYPE_NAMESPACE,
  DEFAULT_PROXY_NAMESPACE,
  DEFAULT_TYPE_CACHE_CAPACITY,
  namespaceOf,
  setTypeNamespace,
  markProxyType,
} from './type-resolution.js';
export type { TypeResolutionCacheOptions } from './type-resolution.js';
