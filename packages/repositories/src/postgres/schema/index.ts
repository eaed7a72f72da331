// Re-export all schema tables
export * from './audit-trails.js';
