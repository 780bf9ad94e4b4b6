// Database schema
export { games, gameEntities } from './games.js';
