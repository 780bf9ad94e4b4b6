// @colonia/repositories
// Persistence boundary for saved games.
//
// The runtime never touches storage; the server hands a SaveGame to a
// GameRepository and gets one back. Implementations: in-memory, Postgres
// (drizzle-orm over postgres.js) and a directory of save bundles.

export * from './interfaces/index.js';
export { createInMemoryGameRepository } from './in-memory/index.js';
export * as postgres from './postgres/index.js';
export * as bundle from './bundle/index.js';
