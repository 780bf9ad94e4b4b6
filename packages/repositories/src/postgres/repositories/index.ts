// Postgres repository implementations
export { PgGameRepository, entityToRow, rowToEntity, type GameEntityRow } from './game-repository.js';
