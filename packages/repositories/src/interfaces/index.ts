// Repository interfaces
export type { GameRepository, SavedGameFilter } from './game-repository.js';
export { summarizeSave } from './game-repository.js';
