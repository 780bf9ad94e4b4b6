// Save format - the durable representation of a session

import type { Id, Timestamp } from './common.js';
import type { GameEntity } from './entities.js';
import type { GameRules } from './rules.js';
import type { TurnState } from './turns.js';

/**
 * Everything needed to rebuild the registry with identical ids.
 */
export type RegistrySnapshot = {
  /**
   * Next value of the id counter
   */
  nextId: number;

  /**
   * Ids that were disposed; they stay reserved
   */
  disposedIds: Id[];

  /**
   * Live entities, parents before children
   */
  entities: GameEntity[];
};

export type SaveGame = {
  format: 'colonia.save';
  gameId: Id;
  savedAt: Timestamp;
  rules: GameRules;
  turn: TurnState;
  registry: RegistrySnapshot;

  /**
   * Explored tiles per player
   */
  explored: Record<Id, Id[]>;

  /**
   * Last accepted request seq per player
   */
  requestSeq: Record<Id, number>;
};

/**
 * Listing entry for stored games.
 */
export type SavedGameSummary = {
  gameId: Id;
  turn: number;
  playerCount: number;
  savedAt: Timestamp;
};
