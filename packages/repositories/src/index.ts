// @plinth/repositories
// Persistence contracts and adapters for audit trails.
//
// Interfaces define WHAT operations are available; the Postgres and
// in-memory implementations fulfill them. Value blobs pass through
// untouched: encoding and decoding belong to @plinth/runtime.

export * from './interfaces/index.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';
