// Diagnostic snapshots exposed by the runtime caches

/**
 * Counters for the value-object accessor cache.
 */
export type AccessorCacheStats = {
  /** Types served by a compiled extractor */
  optimizedTypes: number;
  /** Types permanently using reflective extraction */
  disabledTypes: number;
  /** All types seen since the last clear */
  totalTypes: number;
};

/**
 * Counters for the entity type-resolution cache.
 */
export type TypeCacheStats = {
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 when nothing was resolved yet */
  hitRatio: number;
  /** Distinct types currently cached */
  size: number;
  /** Maximum distinct types the cache will hold */
  capacity: number;
};
