import type { Id, SaveGame, SavedGameSummary } from '@colonia/protocol';

/**
 * Filter for listing stored games
 */
export type SavedGameFilter = {
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for saved games.
 *
 * A save is stored whole: saving a game id again replaces the previous
 * snapshot. Loading returns exactly what was saved, so ids, the id
 * counter and explored sets survive the round trip.
 */
export interface GameRepository {
  /**
   * Store a snapshot, replacing any earlier one for the same game
   */
  save(save: SaveGame): Promise<void>;

  /**
   * Load the latest snapshot of a game
   * @returns The snapshot or null when the game was never saved
   */
  load(gameId: Id): Promise<SaveGame | null>;

  /**
   * List stored games, most recently saved first
   */
  list(filter?: SavedGameFilter): Promise<SavedGameSummary[]>;

  /**
   * Remove a stored game
   * @returns false when there was nothing to remove
   */
  delete(gameId: Id): Promise<boolean>;
}

/**
 * Summary row for a snapshot.
 */
export function summarizeSave(save: SaveGame): SavedGameSummary {
  return {
    gameId: save.gameId,
    turn: save.turn.turn,
    playerCount: save.turn.order.length,
    savedAt: save.savedAt,
  };
}
