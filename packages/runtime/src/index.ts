// @plinth/runtime
// Value equality, entity identity and audit change-set encoding

// Runtime (the engines behind the base classes)
export { createDomainRuntime, defaultRuntime } from './runtime.js';
export type { DomainRuntime, DomainRuntimeOptions, DomainCacheStats } from './runtime.js';

// Configuration
export { loadDomainConfig, DEFAULT_DOMAIN_CONFIG } from './config.js';
export type { DomainConfig, DomainEnv } from './config.js';

// Error types
export {
  DomainError,
  ValidationError,
  InvalidStateError,
  AccessorCompilationError,
  isDomainError,
} from './errors.js';

// Logging
export { consoleLogger, silentLogger, createCapturingLogger, scopeLogger } from './logger.js';
export type { DomainLogger, LogEntry } from './logger.js';

// Value objects
export * from './values/index.js';

// Entities
export * from './entities/index.js';

// Audit trails
export * from './audit/index.js';
