// @plinth/protocol
// Shared types and schemas for entities, value objects and audit change sets

export * from './types/index.js';
export * from './validation/audit.js';
