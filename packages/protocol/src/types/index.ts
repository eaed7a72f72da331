// Re-export all protocol types

export * from './common.js';
export * from './audit.js';
export * from './diagnostics.js';
